// SPDX-License-Identifier: Apache-2.0
import { type Logger, type ServiceEnv, createLogger, errorFields } from "@spigot/service-kit";
import type { Hono } from "hono";
import { formatEther } from "viem";
import { createFaucetAccount } from "./account.ts";
import { createFaucetApp } from "./app.ts";
import type { FaucetConfig } from "./config.ts";
import { type Clock, CooldownTable } from "./cooldown.ts";
import { ConfigurationError, causeMessage } from "./errors.ts";
import { type LedgerClient, withDeadline } from "./ledger.ts";
import { FaucetService } from "./service.ts";
import { ViemLedgerClient } from "./viem-ledger.ts";

export interface FaucetDeps {
  /** Defaults to a ViemLedgerClient on config.rpcUrl. */
  ledger?: LedgerClient;
  now?: Clock;
  logger?: Logger;
}

export interface Faucet {
  config: FaucetConfig;
  service: FaucetService;
  app: Hono<ServiceEnv>;
}

/**
 * Assembles a running faucet: account from the key, chain id from the node, then the
 * engine and its HTTP app. A bad key or an unreachable node throws ConfigurationError;
 * an unreadable balance is only logged.
 */
export async function initializeFaucet(config: FaucetConfig, deps: FaucetDeps = {}): Promise<Faucet> {
  const log = deps.logger ?? createLogger("faucet", { module: "init" });
  const account = createFaucetAccount(config.privateKey);
  const ledger =
    deps.ledger ?? new ViemLedgerClient({ rpcUrl: config.rpcUrl, timeoutMs: config.ledgerTimeoutMs });

  let chainId: number;
  try {
    chainId = await withDeadline("chain_id", config.ledgerTimeoutMs, () => ledger.getChainId());
  } catch (err) {
    throw new ConfigurationError(`failed to get chain ID: ${causeMessage(err)}`, { cause: err });
  }

  const service = new FaucetService({
    ledger,
    account,
    chainId,
    amount: config.amount,
    cooldowns: new CooldownTable({ cooldownMs: config.cooldownMs, now: deps.now }),
    ledgerTimeoutMs: config.ledgerTimeoutMs,
    logger: log.child({ module: "engine" }),
  });

  log.info("Faucet initialized", {
    address: service.address,
    chain_id: chainId,
    amount_wei: config.amount,
    cooldown_ms: config.cooldownMs,
  });

  try {
    const balance = await service.getBalance();
    log.info("Faucet balance", { address: service.address, balance: `${formatEther(balance)} ETH` });
  } catch (err) {
    log.warn("Failed to get balance, continuing without it", errorFields(err));
  }

  return { config, service, app: createFaucetApp(service) };
}
