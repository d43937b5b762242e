// SPDX-License-Identifier: Apache-2.0
import type { EventEmitter } from "node:events";
import { type ServerType, serve } from "@hono/node-server";
import type { ServiceEnv } from "@spigot/service-kit";
import type { Hono } from "hono";

/**
 * Serves the app and resolves once the socket is bound. A bind failure such as
 * EADDRINUSE rejects instead of surfacing as an unhandled `error` event.
 */
export function listen(app: Hono<ServiceEnv>, port: number, hostname?: string): Promise<ServerType> {
  return new Promise((resolve, reject) => {
    const server = serve({ fetch: app.fetch, port, hostname }, () => {
      events.off("error", reject);
      resolve(server);
    });
    const events: EventEmitter = server;
    events.once("error", reject);
  });
}
