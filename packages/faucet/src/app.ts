// SPDX-License-Identifier: Apache-2.0
import {
  type Logger,
  type ServiceEnv,
  createLogger,
  createServiceApp,
  errorFields,
  failure,
  internalError,
  invalidRequest,
} from "@spigot/service-kit";
import type { Context, Hono } from "hono";
import { formatEther } from "viem";
import type {
  BalanceResponse,
  DisbursementResponse,
  EligibilityResponse,
  HealthResponse,
} from "./api.ts";
import { CooldownActiveError, FaucetError, InvalidAddressError } from "./errors.ts";
import type { FaucetService } from "./service.ts";

export const SERVICE_NAME = "faucet";

function readAddress(body: unknown): string | null {
  if (typeof body !== "object" || body === null || !("address" in body)) return null;
  return typeof body.address === "string" && body.address.length > 0 ? body.address : null;
}

function errorResponse(c: Context<ServiceEnv>, err: unknown, logger: Logger): Response {
  if (err instanceof CooldownActiveError) {
    const retryAfter = Math.ceil(err.remainingMs / 1000);
    logger.info("Cooldown active", { address: err.address, retry_after: retryAfter });
    c.header("Retry-After", String(retryAfter));
    return c.json(failure(err.code, err.message, { retry_after: retryAfter }), err.status);
  }
  if (err instanceof InvalidAddressError) {
    logger.debug("Rejected address", { address: err.address });
    return c.json(failure(err.code, err.message), err.status);
  }
  if (err instanceof FaucetError) {
    return c.json(failure(err.code, err.message), err.status);
  }
  logger.error("Unexpected error", { path: c.req.path, ...errorFields(err) });
  return c.json(internalError(), 500);
}

/** HTTP surface of the faucet. Every per-request failure becomes a JSON failure body. */
export function createFaucetApp(service: FaucetService): Hono<ServiceEnv> {
  const app = createServiceApp({ serviceName: SERVICE_NAME, skipHealthCheck: true });
  const logger = createLogger(SERVICE_NAME, { module: "http" });

  // GET / — Health check (custom: includes faucet address + chain)
  app.get("/", (c) => {
    const body: HealthResponse = {
      service: SERVICE_NAME,
      status: "ok",
      address: service.address,
      chain_id: service.chainId,
    };
    return c.json(body);
  });

  // POST /v1/faucet/request — Send the configured amount to { address }
  app.post("/v1/faucet/request", async (c) => {
    let address: string | null;
    try {
      address = readAddress(await c.req.json());
    } catch (err) {
      logger.warn("JSON parse failed on POST /v1/faucet/request", errorFields(err));
      return c.json(invalidRequest("Invalid request format"), 400);
    }
    if (address === null) {
      return c.json(invalidRequest("address is required"), 400);
    }

    try {
      const result = await service.requestDisbursement(address);
      const body: DisbursementResponse = {
        success: true,
        message: "Tokens sent successfully!",
        tx_hash: result.txHash,
      };
      return c.json(body, 200);
    } catch (err) {
      return errorResponse(c, err, logger);
    }
  });

  // GET /v1/faucet/status — Cooldown status for an address
  app.get("/v1/faucet/status", (c) => {
    const address = c.req.query("address");
    if (!address) {
      return c.json(invalidRequest("address query param required"), 400);
    }
    try {
      const eligibility = service.checkEligibility(address);
      const body: EligibilityResponse = {
        address: eligibility.address,
        available: eligibility.available,
        retry_after_ms: eligibility.retryAfterMs,
      };
      return c.json(body);
    } catch (err) {
      return errorResponse(c, err, logger);
    }
  });

  // GET /v1/faucet/balance — Faucet account balance
  app.get("/v1/faucet/balance", async (c) => {
    try {
      const balance = await service.getBalance();
      const body: BalanceResponse = {
        address: service.address,
        balance_wei: balance.toString(),
        balance: formatEther(balance),
      };
      return c.json(body);
    } catch (err) {
      return errorResponse(c, err, logger);
    }
  });

  return app;
}
