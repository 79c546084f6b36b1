import type { IncomingHttpHeaders } from "node:http";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { CallContext } from "./infra/rpcContext.js";
import type { JsonRpcEndpoint } from "./server.js";

/** Content type of every JSON-RPC reply. */
export const JSON_CONTENT_TYPE = "application/json; charset=utf-8";

/** Subset of `IncomingMessage` read by {@link createHttpHandler}. */
export interface HttpRequestLike extends AsyncIterable<Uint8Array | string> {
  readonly headers: IncomingHttpHeaders;
}

/** Subset of `ServerResponse` written by {@link createHttpHandler}. */
export interface HttpResponseLike {
  statusCode: number;
  readonly writableEnded?: boolean;
  setHeader(name: string, value: string): unknown;
  end(chunk?: string): unknown;
  once?(event: "close", listener: () => void): unknown;
}

export interface HttpHandlerOptions {
  /** Header carrying the caller's correlation identifier. */
  readonly requestIdHeader?: string;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  if (Array.isArray(value)) {
    return value.length > 0 ? value.join(", ") : undefined;
  }
  return value;
}

function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const normalised = headerValue(value);
    if (normalised !== undefined) {
      flat[name.toLowerCase()] = normalised;
    }
  }
  return flat;
}

/**
 * Adapts an endpoint to a `node:http` request listener. Routing and server
 * bootstrap stay with the caller:
 *
 * ```ts
 * createServer(createHttpHandler(endpoint)).listen(8080);
 * ```
 *
 * Replies are `200` with the JSON payload (an empty body when the request was
 * a notification). The only non-JSON answer is a plain-text `500` for replies
 * whose error envelope could not be serialised. Handlers receive a signal
 * aborted when the client goes away before the reply was written.
 */
export function createHttpHandler(
  endpoint: JsonRpcEndpoint,
  options: HttpHandlerOptions = {},
): (req: HttpRequestLike, res: HttpResponseLike) => Promise<void> {
  const requestIdHeader = (options.requestIdHeader ?? "x-request-id").toLowerCase();

  return async function handle(req, res): Promise<void> {
    const controller = new AbortController();
    res.once?.("close", () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    const context: CallContext = {
      signal: controller.signal,
      transport: "http",
      requestId: headerValue(req.headers[requestIdHeader]),
      headers: flattenHeaders(req.headers),
    };

    const reply = await endpoint.handleStream(req, context);
    if (reply.fatal !== undefined) {
      res.statusCode = 500;
      res.setHeader("Content-Type", "text/plain; charset=utf-8");
      res.end(reply.fatal);
      return;
    }

    res.statusCode = 200;
    res.setHeader("Content-Type", JSON_CONTENT_TYPE);
    res.end(reply.body ?? "");
  };
}
