// SPDX-License-Identifier: Apache-2.0
/**
 * createServiceApp — shared Hono factory.
 *
 * Wires the standard middleware so a service's app module only declares its own
 * routes.
 *
 * Middleware and routes, in order:
 *   1. requestIdMiddleware
 *   2. bodyLimit (1 MB unless overridden)
 *   3. metricsMiddleware
 *   4. GET /           health check (unless skipHealthCheck)
 *   5. GET /v1/metrics per-endpoint counters
 *
 * Unmatched routes and uncaught handler errors answer with the failure envelope.
 */

import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { failure, internalError, notFound } from "./errors.ts";
import { createLogger, errorFields } from "./logger.ts";
import { MetricsRegistry, metricsHandler, metricsMiddleware } from "./metrics.ts";
import { type RequestIdVariables, requestIdMiddleware } from "./request-id.ts";

export type ServiceEnv = { Variables: RequestIdVariables };

export interface ServiceAppConfig {
  /** Service name, e.g. "faucet". Used in logs, health check and metrics. */
  serviceName: string;
  /** Maximum accepted request body. Defaults to 1 MB. */
  maxBodyBytes?: number;
  /**
   * Skip the default GET / health check route.
   * Use when the service registers a health check with its own fields.
   */
  skipHealthCheck?: boolean;
}

export function createServiceApp(config: ServiceAppConfig): Hono<ServiceEnv> {
  const { serviceName, maxBodyBytes = 1024 * 1024, skipHealthCheck = false } = config;
  const logger = createLogger(serviceName, { module: "http" });
  const metrics = new MetricsRegistry();

  const app = new Hono<ServiceEnv>();

  app.use("*", requestIdMiddleware());

  app.use(
    "*",
    bodyLimit({
      maxSize: maxBodyBytes,
      onError: (c) => c.json(failure("payload_too_large", "Request too large"), 413),
    }),
  );

  app.use("*", metricsMiddleware(metrics));

  if (!skipHealthCheck) {
    app.get("/", (c) => c.json({ service: serviceName, status: "ok" }));
  }

  app.get("/v1/metrics", metricsHandler(metrics, serviceName));

  app.notFound((c) => c.json(notFound(`No route for ${c.req.method} ${c.req.path}`), 404));

  app.onError((err, c) => {
    logger.error("Unhandled error", { path: c.req.path, ...errorFields(err) });
    return c.json(internalError(), 500);
  });

  return app;
}
