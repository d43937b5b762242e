// SPDX-License-Identifier: Apache-2.0
import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";

export const REQUEST_ID_HEADER = "X-Request-Id";

export type RequestIdVariables = { requestId: string };

const als = new AsyncLocalStorage<string>();

/**
 * Returns the request ID for the current async context, or null if outside a request.
 */
export function getRequestId(): string | null {
  return als.getStore() ?? null;
}

/**
 * Hono middleware that tags every request with an ID.
 * An incoming `X-Request-Id` is reused so callers can correlate; otherwise a short
 * random ID is minted. The ID lands in AsyncLocalStorage (read by the logger), in the
 * Hono context as `requestId`, and on the response header.
 */
export function requestIdMiddleware(): MiddlewareHandler<{ Variables: RequestIdVariables }> {
  return async (c, next) => {
    const id = c.req.header(REQUEST_ID_HEADER) ?? randomUUID().slice(0, 12);
    c.set("requestId", id);
    c.header(REQUEST_ID_HEADER, id);
    await als.run(id, next);
  };
}
