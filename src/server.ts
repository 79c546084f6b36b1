import { readRawBody } from "./http/body.js";
import type { CallContext } from "./infra/rpcContext.js";
import { StructuredLogger } from "./logger.js";
import { dispatchBatch, reportDroppedNotification } from "./rpc/batch.js";
import { Dispatcher } from "./rpc/dispatcher.js";
import { InternalError, InvalidRequestError, ParseError, toJsonRpc, type RpcError } from "./rpc/errors.js";
import type { Middleware } from "./rpc/middleware.js";
import type { PayloadPort } from "./rpc/payload.js";
import {
  JsonRpcRequestSchema,
  describeVersionMismatch,
  isNotification,
  type JsonRpcId,
} from "./rpc/protocol.js";
import { MethodRegistry, type MethodCollector, type MethodEntry, type RegisterOptions } from "./rpc/registry.js";
import type { InteractFn, Interactor } from "./rpc/usecase.js";
import { loadEndpointSettingsFromEnv, type EndpointSettings } from "./serverOptions.js";
import type { ValidationPort } from "./validation/port.js";

/** Leading bytes ignored before deciding between single and batch framing. */
const LEADING_WHITESPACE = /^[ \t\r\n]+/;

export interface JsonRpcEndpointOptions {
  /** Registry to serve; a fresh one is built from `middlewares` and `collectors` otherwise. */
  readonly registry?: MethodRegistry;
  readonly middlewares?: readonly Middleware[];
  readonly collectors?: readonly MethodCollector[];
  readonly validator?: ValidationPort;
  readonly skipParamsValidation?: boolean;
  readonly skipResultValidation?: boolean;
  /** Largest accepted batch; `0` (default) leaves batches unbounded. */
  readonly maxBatchSize?: number;
  /** Limit applied by {@link JsonRpcEndpoint.handleStream}; `0` disables it. */
  readonly maxBodyBytes?: number;
  readonly logger?: StructuredLogger;
}

/**
 * Serialised answer to one body. `body` is `null` when nothing must be sent
 * back (a single notification). `fatal` is set when not even an error
 * envelope could be serialised; transports surface it as a plain-text error.
 */
export interface EndpointReply {
  readonly body: string | null;
  readonly fatal?: string;
}

/**
 * JSON-RPC 2.0 endpoint: frames a raw body as a single request or a batch,
 * enforces the protocol version, dispatches, and serialises the reply.
 *
 * Methods are registered first; the registry is sealed by the first request.
 * {@link handle} and {@link handleStream} never reject: every failure becomes
 * a JSON-RPC error in the reply.
 */
export class JsonRpcEndpoint {
  readonly registry: MethodRegistry;
  private readonly dispatcher: Dispatcher;
  private readonly logger?: StructuredLogger;
  private readonly maxBatchSize: number;
  private readonly maxBodyBytes: number;

  constructor(options: JsonRpcEndpointOptions = {}) {
    this.registry =
      options.registry ?? new MethodRegistry({ middlewares: options.middlewares, collectors: options.collectors });
    this.dispatcher = new Dispatcher({
      registry: this.registry,
      validator: options.validator,
      skipParamsValidation: options.skipParamsValidation,
      skipResultValidation: options.skipResultValidation,
    });
    this.logger = options.logger;
    this.maxBatchSize = options.maxBatchSize ?? 0;
    this.maxBodyBytes = options.maxBodyBytes ?? 0;
  }

  /** Registers a use case; see {@link MethodRegistry.add}. */
  add(useCase: Interactor): MethodEntry {
    return this.registry.add(useCase);
  }

  /** Registers a handler under an explicit name; see {@link MethodRegistry.register}. */
  register<I, O>(
    name: string,
    handler: Interactor<I, O> | InteractFn<I, O>,
    input?: PayloadPort<I>,
    output?: PayloadPort<O>,
    options?: RegisterOptions,
  ): MethodEntry {
    return this.registry.register(name, handler, input, output, options);
  }

  /** Reads a whole byte stream, then handles it as a body. */
  async handleStream(stream: AsyncIterable<Uint8Array | string>, context: CallContext = {}): Promise<EndpointReply> {
    let body: Uint8Array;
    try {
      ({ raw: body } = await readRawBody(stream, this.maxBodyBytes));
    } catch (error) {
      return this.reject(new ParseError(`failed to read request body: ${reasonOf(error)}`));
    }
    return this.handle(body, context);
  }

  /** Handles one raw body (a single request or a batch). */
  async handle(body: string | Uint8Array, context: CallContext = {}): Promise<EndpointReply> {
    this.registry.seal();

    const text = (typeof body === "string" ? body : new TextDecoder().decode(body)).replace(LEADING_WHITESPACE, "");
    if (text.length === 0) {
      return this.reject(new ParseError("empty body"));
    }

    if (text.startsWith("[")) {
      const outcome = await dispatchBatch(this.dispatcher, context, text, {
        maxBatchSize: this.maxBatchSize,
        logger: this.logger,
      });
      return outcome.ok ? this.serialise(outcome.responses, null) : this.reject(outcome.error);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      return this.reject(new ParseError(`failed to unmarshal request: ${reasonOf(error)}`));
    }
    const decoded = JsonRpcRequestSchema.safeParse(raw);
    if (!decoded.success) {
      const reason = decoded.error.issues
        .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
        .join("; ");
      return this.reject(new ParseError(`failed to unmarshal request: ${reason}`));
    }

    const request = decoded.data;
    const id = request.id ?? null;
    const mismatch = describeVersionMismatch(request);
    if (mismatch !== null) {
      return this.reject(new InvalidRequestError(mismatch), id);
    }

    const response = await this.dispatcher.invoke(context, request);
    if (isNotification(request)) {
      reportDroppedNotification(this.logger, request, response);
      return { body: null };
    }
    return this.serialise(response, id);
  }

  /** Answers a body that could not be dispatched. */
  private reject(error: RpcError, id: JsonRpcId = null): EndpointReply {
    this.logger?.warn("jsonrpc_request_rejected", { code: error.code, message: error.message });
    return this.serialise(toJsonRpc(id, error), id);
  }

  /**
   * Serialises the reply. A payload without a JSON form is replaced by an
   * internal error; if that fails too the reply turns fatal.
   */
  private serialise(payload: unknown, id: JsonRpcId): EndpointReply {
    try {
      return { body: JSON.stringify(payload) };
    } catch (error) {
      const reason = reasonOf(error);
      this.logger?.error("jsonrpc_response_serialisation_failed", { message: reason });
      try {
        return { body: JSON.stringify(toJsonRpc(id, new InternalError(reason))) };
      } catch (fallbackError) {
        return { body: null, fatal: reasonOf(fallbackError) };
      }
    }
  }
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Builds an endpoint whose settings come from the environment (see
 * {@link loadEndpointSettingsFromEnv}); explicit options take precedence.
 * A structured logger is created from the settings unless one is supplied.
 */
export function createEndpoint(
  options: JsonRpcEndpointOptions = {},
  settings: EndpointSettings = loadEndpointSettingsFromEnv(),
): JsonRpcEndpoint {
  return new JsonRpcEndpoint({
    ...options,
    skipParamsValidation: options.skipParamsValidation ?? settings.skipParamsValidation,
    skipResultValidation: options.skipResultValidation ?? settings.skipResultValidation,
    maxBatchSize: options.maxBatchSize ?? settings.maxBatchSize,
    maxBodyBytes: options.maxBodyBytes ?? settings.maxBodyBytes,
    logger:
      options.logger ??
      new StructuredLogger({
        level: settings.logLevel,
        logFile: settings.logFile,
        redactionEnabled: settings.logRedaction,
      }),
  });
}
