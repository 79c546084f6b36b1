import { AsyncLocalStorage } from "node:async_hooks";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { JsonRpcId } from "../rpc/protocol.js";

/**
 * Context supplied by the transport for one inbound body. Every handler
 * invocation triggered by that body receives it, including the failing-path
 * invocations used to surface decode and validation errors.
 */
export interface CallContext {
  /** Cancellation signal owned by the transport (client gone, deadline, ...). */
  readonly signal?: AbortSignal;
  /** Correlation identifier assigned by the transport, if any. */
  readonly requestId?: string;
  /** Logical transport tag (e.g. "http") for diagnostics. */
  readonly transport?: string;
  /** Optional HTTP-like headers exposed to handlers. */
  readonly headers?: Readonly<Record<string, string>>;
}

/** Per-call snapshot published while a method is being dispatched. */
export interface RpcCallSnapshot extends CallContext {
  /** Method targeted by the request. */
  readonly method: string;
  /** JSON-RPC identifier of the request; `undefined` for notifications. */
  readonly id?: JsonRpcId;
}

/**
 * AsyncLocalStorage exposing the call being dispatched to nested code (loggers,
 * helpers invoked by handlers) without threading it through every signature.
 */
const storage = new AsyncLocalStorage<RpcCallSnapshot>();

/**
 * Executes the callback while exposing the supplied snapshot via
 * AsyncLocalStorage.
 */
export function runWithRpcCall<T>(snapshot: RpcCallSnapshot, callback: () => T): T {
  return storage.run(snapshot, callback);
}

/** Retrieves the call associated with the current async execution. */
export function getRpcCall(): RpcCallSnapshot | undefined {
  return storage.getStore();
}
