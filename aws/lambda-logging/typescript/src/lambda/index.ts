/**
 * Lambda handler middleware.
 *
 * @module lambda
 */

import { z } from 'zod';
import { configFromEnvironment } from '../config/index.js';
import type { LoggerRegistry } from '../logging/index.js';
import { setup, type FormatterFactory } from '../setup/index.js';
import type { FieldMap } from '../types/index.js';

/**
 * The parts of the Lambda context object that end up in log entries.
 */
export interface LambdaContext {
  awsRequestId?: string;
  functionName?: string;
  functionVersion?: string;
  invokedFunctionArn?: string;
}

/**
 * Options for `wrap`.
 */
export interface WrapOptions {
  /** Extra fields for every entry of the invocation */
  fields?: FieldMap;
  /** Formatter factory passed to `setup` */
  formatter?: FormatterFactory | null;
  /** Auxiliary logger names passed to `setup` */
  auxiliaryLoggers?: readonly string[];
  /** Registry to configure (default: the process-wide one) */
  registry?: LoggerRegistry;
  /** Environment to read levels from (default `process.env`) */
  env?: NodeJS.ProcessEnv;
}

const ApiGatewayEventSchema = z.object({
  requestContext: z.object({
    requestId: z.string().min(1),
  }),
});

/**
 * Request id of an invocation: the API Gateway request id when the event
 * carries one, else the Lambda request id.
 */
export function extractRequestId(event: unknown, context: LambdaContext): string | undefined {
  const parsed = ApiGatewayEventSchema.safeParse(event);
  return parsed.success ? parsed.data.requestContext.requestId : context.awsRequestId;
}

/**
 * Wrap a Lambda handler so that every invocation configures logging with the
 * invocation's request metadata before the handler runs.
 *
 * @example
 * ```typescript
 * const log = getLogger('orders');
 *
 * export const handler = wrap(async (event: OrderEvent) => {
 *   log.info({ order: event.orderId, status: 'received' });
 *   return { statusCode: 202 };
 * });
 * ```
 */
export function wrap<TEvent, TResult, TContext extends LambdaContext = LambdaContext>(
  handler: (event: TEvent, context: TContext) => TResult,
  options: WrapOptions = {}
): (event: TEvent, context: TContext) => TResult {
  return (event, context) => {
    const environment = configFromEnvironment(options.env);

    setup({
      level: environment.level,
      auxiliaryLevel: environment.auxiliaryLevel,
      formatter: options.formatter,
      auxiliaryLoggers: options.auxiliaryLoggers,
      registry: options.registry,
      fields: {
        aws_request_id: extractRequestId(event, context),
        function_name: context.functionName,
        function_version: context.functionVersion,
        invoked_function_arn: context.invokedFunctionArn,
        ...options.fields,
      },
    });

    return handler(event, context);
  };
}
