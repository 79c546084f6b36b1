import { runWithRpcCall, type CallContext } from "../infra/rpcContext.js";
import type { ValidationPort } from "../validation/port.js";
import {
  InternalError,
  InvalidParamsError,
  MethodNotFoundError,
  describeErrorData,
  toJsonRpc,
  type RpcError,
} from "./errors.js";
import { PayloadDecodeError, allocatePayload, decodePayload, encodePayload } from "./payload.js";
import { successResponse, type JsonRpcRequest, type JsonRpcResponse, type JsonValue } from "./protocol.js";
import type { MethodEntry, MethodRegistry } from "./registry.js";
import type { InteractContext } from "./usecase.js";

export interface DispatcherOptions {
  readonly registry: MethodRegistry;
  /** Schema validator consulted for params and results. */
  readonly validator?: ValidationPort;
  readonly skipParamsValidation?: boolean;
  readonly skipResultValidation?: boolean;
}

/** Internal outcome of one processing step: a value, or the error to emit. */
type Step<T> = { ok: true; value: T } | { ok: false; error: RpcError };

function unmarshalParamsError(data: unknown): RpcError {
  return new InvalidParamsError("failed to unmarshal parameters", data);
}

/** Signal handed to handlers when the transport supplied none; never aborts. */
const IDLE_SIGNAL = new AbortController().signal;

/**
 * Runs one decoded request against its registered method: decode, validate,
 * invoke, encode, validate. Every failure is converted into a JSON-RPC error
 * response at the step where it happens; {@link invoke} never rejects.
 */
export class Dispatcher {
  private readonly registry: MethodRegistry;
  private readonly validator?: ValidationPort;
  private readonly skipParamsValidation: boolean;
  private readonly skipResultValidation: boolean;

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.validator = options.validator;
    this.skipParamsValidation = options.skipParamsValidation ?? false;
    this.skipResultValidation = options.skipResultValidation ?? false;
  }

  /**
   * Dispatches a request whose protocol version was already checked. The
   * response echoes the request `id` (`null` for notifications, whose
   * responses callers discard).
   */
  async invoke(context: CallContext, request: JsonRpcRequest): Promise<JsonRpcResponse> {
    const id = request.id ?? null;
    const method = request.method ?? "";
    const entry = this.registry.lookup(method);
    if (!entry) {
      return toJsonRpc(id, new MethodNotFoundError(method));
    }

    const callContext: InteractContext = {
      ...context,
      signal: context.signal ?? IDLE_SIGNAL,
      method,
      id: request.id,
    };

    return runWithRpcCall(callContext, async () => {
      let outcome: Step<JsonValue>;
      try {
        outcome = await this.run(entry, callContext, request.params);
      } catch (error) {
        // Only reachable through a misbehaving validator or output factory.
        outcome = { ok: false, error: new InternalError(undefined, describeErrorData(error)) };
      }
      return outcome.ok ? successResponse(id, outcome.value) : toJsonRpc(id, outcome.error);
    });
  }

  private async run(entry: MethodEntry, context: InteractContext, params: JsonValue | undefined): Promise<Step<JsonValue>> {
    const validateParams = this.validator !== undefined && !this.skipParamsValidation;
    let input: unknown;
    // Value constraints are reported by the params schema when one is registered.
    let deferredDecodeFailure: PayloadDecodeError | undefined;
    if (entry.input) {
      try {
        input = decodePayload(entry.input, params);
      } catch (error) {
        if (
          !(error instanceof PayloadDecodeError) ||
          !error.constraintOnly ||
          !validateParams ||
          this.validator?.hasSchema(entry.name, "params") !== true
        ) {
          return this.fail(entry, context, error, unmarshalParamsError);
        }
        deferredDecodeFailure = error;
      }
    }

    if (this.validator && validateParams) {
      const issues = this.validator.validateParams(entry.name, params ?? null);
      if (issues) {
        return this.fail(entry, context, issues, (data) => new InvalidParamsError("invalid parameters", data));
      }
    }
    if (deferredDecodeFailure) {
      return this.fail(entry, context, deferredDecodeFailure, unmarshalParamsError);
    }

    let output: unknown = entry.output ? allocatePayload(entry.output) : undefined;

    try {
      const returned = await entry.handler.interact(context, input, output);
      if (returned !== undefined) {
        output = returned;
      }
    } catch (error) {
      return { ok: false, error: new InternalError("operation failed", describeErrorData(error)) };
    }

    let result: JsonValue;
    try {
      result = encodePayload(output);
    } catch (error) {
      return { ok: false, error: new InternalError("failed to marshal result", describeErrorData(error)) };
    }

    if (this.validator && !this.skipResultValidation) {
      const issues = this.validator.validateResult(entry.name, result);
      if (issues) {
        return this.fail(entry, context, issues, (data) => new InternalError("invalid result", data));
      }
    }

    return { ok: true, value: result };
  }

  /**
   * Passes a decode or validation failure through the failing handler so the
   * registry middlewares observe it, then builds the error from whatever the
   * chain rejected with. A chain that swallows the failure leaves the error
   * without data.
   */
  private async fail(
    entry: MethodEntry,
    context: InteractContext,
    failure: unknown,
    build: (data: unknown) => RpcError,
  ): Promise<Step<never>> {
    let surfaced: unknown;
    try {
      await entry.failingHandler.interact({ ...context, failure }, undefined, undefined);
    } catch (error) {
      surfaced = error;
    }
    return { ok: false, error: build(describeErrorData(surfaced)) };
  }
}
