import type { CallContext } from "../infra/rpcContext.js";
import type { StructuredLogger } from "../logger.js";
import type { Dispatcher } from "./dispatcher.js";
import { InvalidRequestError, toJsonRpc, type RpcError } from "./errors.js";
import {
  JsonRpcBatchSchema,
  describeVersionMismatch,
  isErrorResponse,
  isNotification,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from "./protocol.js";

export interface BatchOptions {
  /** Largest accepted number of elements; `0` disables the cap. */
  readonly maxBatchSize?: number;
  /** Receives the failures of notifications, which have no wire channel. */
  readonly logger?: StructuredLogger;
}

/** Either the ordered responses of a batch, or the error rejecting it whole. */
export type BatchOutcome = { ok: true; responses: JsonRpcResponse[] } | { ok: false; error: RpcError };

/**
 * Logs the error of a notification. The protocol offers no way to report it,
 * so the log is the only trace left.
 */
export function reportDroppedNotification(
  logger: StructuredLogger | undefined,
  request: JsonRpcRequest,
  response: JsonRpcResponse,
): void {
  if (!logger || !isErrorResponse(response)) {
    return;
  }
  logger.debug("jsonrpc_notification_failed", {
    method: request.method ?? null,
    code: response.error.code,
    message: response.error.message,
  });
}

/**
 * Decodes a batch body and dispatches every element concurrently. Elements
 * are isolated from each other: a version mismatch is answered locally, a
 * failing element never affects its siblings. The responses keep the request
 * order and skip notifications.
 */
export async function dispatchBatch(
  dispatcher: Dispatcher,
  context: CallContext,
  body: string,
  options: BatchOptions = {},
): Promise<BatchOutcome> {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new InvalidRequestError(`failed to unmarshal request: ${reason}`) };
  }

  const decoded = JsonRpcBatchSchema.safeParse(raw);
  if (!decoded.success) {
    const reason = decoded.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ");
    return { ok: false, error: new InvalidRequestError(`failed to unmarshal request: ${reason}`) };
  }

  const requests = decoded.data;
  const maxBatchSize = options.maxBatchSize ?? 0;
  if (maxBatchSize > 0 && requests.length > maxBatchSize) {
    return {
      ok: false,
      error: new InvalidRequestError(`batch of ${requests.length} requests exceeds the limit of ${maxBatchSize}`),
    };
  }

  const settled = await Promise.all(
    requests.map(async (request): Promise<JsonRpcResponse> => {
      const mismatch = describeVersionMismatch(request);
      if (mismatch !== null) {
        return toJsonRpc(request.id ?? null, new InvalidRequestError(mismatch));
      }
      return dispatcher.invoke(context, request);
    }),
  );

  const responses: JsonRpcResponse[] = [];
  settled.forEach((response, index) => {
    const request = requests[index];
    if (!request) {
      return;
    }
    if (isNotification(request)) {
      reportDroppedNotification(options.logger, request, response);
      return;
    }
    responses.push(response);
  });
  return { ok: true, responses };
}
