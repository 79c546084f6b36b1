import { errorResponse, type JsonRpcErrorObject, type JsonRpcId, type JsonRpcResponse } from "./protocol.js";

/**
 * Canonical taxonomy of the JSON-RPC 2.0 errors emitted by the endpoint. Each
 * entry provides the protocol code and the default message wired to that
 * category. The codes are fixed by the JSON-RPC 2.0 specification.
 */
export const JSON_RPC_ERROR_TAXONOMY = {
  PARSE_ERROR: { code: -32700, message: "Parse error" },
  INVALID_REQUEST: { code: -32600, message: "Invalid Request" },
  METHOD_NOT_FOUND: { code: -32601, message: "Method not found" },
  INVALID_PARAMS: { code: -32602, message: "Invalid params" },
  INTERNAL: { code: -32603, message: "Internal error" },
} as const;

/** Union type describing the supported JSON-RPC error categories. */
export type RpcErrorCategory = keyof typeof JSON_RPC_ERROR_TAXONOMY;

/**
 * Capability exposed by failures that carry field-level context, such as
 * {@link ValidationErrors}. The context is preserved verbatim in the `data`
 * member of the wire error. Any object qualifies, `Error` instance or not.
 */
export interface ErrorWithFields {
  readonly message?: string;
  fields(): Record<string, unknown>;
}

/** Type guard for {@link ErrorWithFields}. */
export function hasFields(error: unknown): error is ErrorWithFields {
  return (
    typeof error === "object" &&
    error !== null &&
    "fields" in error &&
    typeof error.fields === "function" &&
    (!("message" in error) || error.message === undefined || typeof error.message === "string")
  );
}

/** `data` payload attached to errors built from an {@link ErrorWithFields}. */
export interface StructuredErrorData {
  error: string;
  context: Record<string, unknown>;
}

/**
 * Converts an arbitrary failure into the `data` member of a wire error.
 * Structured errors keep their context; anything else degrades to its message.
 * `undefined` (a failure swallowed by middleware) yields no data at all.
 */
export function describeErrorData(error: unknown): StructuredErrorData | string | undefined {
  if (error === undefined || error === null) {
    return undefined;
  }
  if (hasFields(error)) {
    return { error: error.message ?? String(error), context: error.fields() };
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Base class for the typed JSON-RPC errors. Concrete subclasses fix the
 * category; the optional `data` is emitted as-is.
 */
export class RpcError extends Error {
  readonly category: RpcErrorCategory;
  readonly code: number;
  readonly data: unknown;

  constructor(category: RpcErrorCategory, message?: string, data?: unknown) {
    const taxonomy = JSON_RPC_ERROR_TAXONOMY[category];
    super(message ?? taxonomy.message);
    this.name = "RpcError";
    this.category = category;
    this.code = taxonomy.code;
    this.data = data;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Wire representation of the error, omitting `data` when unset. */
  toErrorObject(): JsonRpcErrorObject {
    const object: JsonRpcErrorObject = { code: this.code, message: this.message };
    if (this.data !== undefined) {
      object.data = this.data;
    }
    return object;
  }
}

/** Malformed body, transport read failure or empty payload. */
export class ParseError extends RpcError {
  constructor(message?: string, data?: unknown) {
    super("PARSE_ERROR", message, data);
  }
}

/** Body that is valid JSON but not a valid request (or batch of requests). */
export class InvalidRequestError extends RpcError {
  constructor(message?: string, data?: unknown) {
    super("INVALID_REQUEST", message, data);
  }
}

/** Request naming a method absent from the registry. */
export class MethodNotFoundError extends RpcError {
  constructor(method: string) {
    super("METHOD_NOT_FOUND", `method not found: ${method}`);
  }
}

/** Parameters that could not be decoded or failed their schema. */
export class InvalidParamsError extends RpcError {
  constructor(message?: string, data?: unknown) {
    super("INVALID_PARAMS", message, data);
  }
}

/** Handler, encoding, result validation or serialisation failure. */
export class InternalError extends RpcError {
  constructor(message?: string, data?: unknown) {
    super("INTERNAL", message, data);
  }
}

/**
 * Programmer error raised while building the endpoint (missing method name,
 * registration after the registry was sealed, collector failure). It is never
 * converted into a wire error.
 */
export class RegistrationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RegistrationError";
  }
}

/**
 * Instantiates the typed error class matching the category so callers can
 * rely on `instanceof` guards.
 */
export function createRpcError(category: RpcErrorCategory, message?: string, data?: unknown): RpcError {
  switch (category) {
    case "PARSE_ERROR":
      return new ParseError(message, data);
    case "INVALID_REQUEST":
      return new InvalidRequestError(message, data);
    case "INVALID_PARAMS":
      return new InvalidParamsError(message, data);
    case "INTERNAL":
      return new InternalError(message, data);
    default:
      return new RpcError(category, message, data);
  }
}

/** Formats an {@link RpcError} into a JSON-RPC error response. */
export function toJsonRpc(id: JsonRpcId, error: RpcError): JsonRpcResponse {
  return errorResponse(id, error.toErrorObject());
}
