import type { StructuredLogger } from "../logger.js";
import type { InteractContext, Interactor } from "./usecase.js";

/**
 * Cross-cutting wrapper applied around every handler of a registry. The same
 * chain wraps the failing handler, so a middleware observes decode and
 * validation failures exactly like regular calls (`context.failure` is then
 * set and the wrapped handler rejects with it).
 */
export type Middleware = (next: Interactor) => Interactor;

/**
 * Composes the middlewares around the interactor. The first middleware of the
 * list is the outermost one.
 */
export function composeMiddlewares(interactor: Interactor, middlewares: readonly Middleware[]): Interactor {
  return middlewares.reduceRight<Interactor>((next, middleware) => middleware(next), interactor);
}

/**
 * Handler used on the failing path: it rejects with the failure injected in
 * its context so the middleware chain around it can observe, transform or
 * swallow it.
 */
export function createFailingInteractor(): Interactor {
  return {
    async interact(context: InteractContext): Promise<void> {
      throw context.failure;
    },
  };
}

/** Options accepted by {@link createLoggingMiddleware}. */
export interface LoggingMiddlewareOptions {
  /** Clock returning nanoseconds; injectable so tests get stable durations. */
  readonly now?: () => bigint;
}

function elapsedMs(startedAt: bigint, now: () => bigint): number {
  return Number(now() - startedAt) / 1_000_000;
}

/**
 * Logs every handler invocation with its duration. Successful calls are
 * logged at `info`, rejected ones (failing path included) at `warn` with the
 * failure message.
 */
export function createLoggingMiddleware(
  logger: StructuredLogger,
  options: LoggingMiddlewareOptions = {},
): Middleware {
  const now = options.now ?? (() => process.hrtime.bigint());
  return (next) => ({
    async interact(context, input, output) {
      const startedAt = now();
      try {
        const result = await next.interact(context, input, output);
        logger.info("jsonrpc_call_completed", {
          method: context.method,
          duration_ms: elapsedMs(startedAt, now),
        });
        return result;
      } catch (error) {
        logger.warn("jsonrpc_call_failed", {
          method: context.method,
          duration_ms: elapsedMs(startedAt, now),
          failure_path: context.failure !== undefined,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }
    },
  });
}
