import { z } from "zod";

/** Protocol version every request must advertise to be dispatched. */
export const JSONRPC_VERSION = "2.0";

/** JSON value as produced by `JSON.parse`. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Identifier echoed between a request and its response. A missing identifier
 * marks a notification; `null` is a regular identity that still gets a reply.
 */
export type JsonRpcId = string | number | null;

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);

const JsonRpcRequestShape = z.object({
  jsonrpc: z.string().optional(),
  method: z.string().optional(),
  params: JsonValueSchema.optional(),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
});

/**
 * Shape of one request object on the wire. Every field is optional at this
 * stage: a missing `jsonrpc` surfaces later as a version mismatch and a
 * missing `method` as an unknown method, which keeps the framing errors
 * limited to values of the wrong JSON type. A `null` request reads as an
 * empty object.
 */
export const JsonRpcRequestSchema = z.preprocess((value) => (value === null ? {} : value), JsonRpcRequestShape);

/** Batch bodies must decode as a list of request objects. */
export const JsonRpcBatchSchema = z.array(JsonRpcRequestSchema);

export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;

/** Error member of a JSON-RPC response. */
export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

/** JSON-RPC response. Exactly one of `result` and `error` is present. */
export type JsonRpcResponse =
  | { jsonrpc: typeof JSONRPC_VERSION; result: JsonValue; id: JsonRpcId }
  | { jsonrpc: typeof JSONRPC_VERSION; error: JsonRpcErrorObject; id: JsonRpcId };

/** Returns true when the request expects no response. */
export function isNotification(request: JsonRpcRequest): boolean {
  return request.id === undefined;
}

/** Builds a success response, keeping the wire key order `jsonrpc, result, id`. */
export function successResponse(id: JsonRpcId, result: JsonValue): JsonRpcResponse {
  return { jsonrpc: JSONRPC_VERSION, result, id };
}

/** Builds an error response, keeping the wire key order `jsonrpc, error, id`. */
export function errorResponse(id: JsonRpcId, error: JsonRpcErrorObject): JsonRpcResponse {
  return { jsonrpc: JSONRPC_VERSION, error, id };
}

/** Narrows a response to its error member. */
export function isErrorResponse(
  response: JsonRpcResponse,
): response is Extract<JsonRpcResponse, { error: JsonRpcErrorObject }> {
  return "error" in response;
}

/**
 * Returns the reason a request must be rejected for its protocol version, or
 * `null` when it advertises {@link JSONRPC_VERSION}.
 */
export function describeVersionMismatch(request: JsonRpcRequest): string | null {
  if (request.jsonrpc === JSONRPC_VERSION) {
    return null;
  }
  return `invalid jsonrpc value: ${JSON.stringify(request.jsonrpc ?? "")}`;
}
