// SPDX-License-Identifier: Apache-2.0
import { ConfigurationError } from "./errors.ts";

export interface FaucetConfig {
  rpcUrl: string;
  /** Hex private key as configured (with or without 0x). Never log this. */
  privateKey: string;
  /** Wei per disbursement. */
  amount: bigint;
  cooldownMs: number;
  port: number;
  /** Deadline for each individual ledger call. */
  ledgerTimeoutMs: number;
}

export type Env = Record<string, string | undefined>;

const HOUR_MS = 60 * 60 * 1000;

const DEFAULTS = {
  RPC_URL: "http://localhost:8545",
  FAUCET_AMOUNT: "1000000000000000000", // 1 ETH
  COOLDOWN_HOURS: "24",
  PORT: "8080",
  LEDGER_TIMEOUT_MS: "10000",
} as const;

function readUnsigned(env: Env, key: keyof typeof DEFAULTS): string {
  const raw = (env[key] ?? "").trim() || DEFAULTS[key];
  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`invalid ${key}: expected a non-negative integer, got "${raw}"`);
  }
  return raw;
}

/**
 * Builds the faucet configuration from an environment record.
 * Everything except PRIVATE_KEY has a default; the key itself is validated later,
 * when the account is derived from it.
 */
export function loadConfig(env: Env = process.env): FaucetConfig {
  const privateKey = env.PRIVATE_KEY?.trim();
  if (!privateKey) {
    throw new ConfigurationError("PRIVATE_KEY environment variable is required");
  }

  const port = Number(readUnsigned(env, "PORT"));
  if (port < 1 || port > 65535) {
    throw new ConfigurationError(`invalid PORT: ${port} is outside 1-65535`);
  }

  const ledgerTimeoutMs = Number(readUnsigned(env, "LEDGER_TIMEOUT_MS"));
  if (ledgerTimeoutMs === 0) {
    throw new ConfigurationError("invalid LEDGER_TIMEOUT_MS: must be greater than zero");
  }

  return {
    rpcUrl: (env.RPC_URL ?? "").trim() || DEFAULTS.RPC_URL,
    privateKey,
    amount: BigInt(readUnsigned(env, "FAUCET_AMOUNT")),
    cooldownMs: Number(readUnsigned(env, "COOLDOWN_HOURS")) * HOUR_MS,
    port,
    ledgerTimeoutMs,
  };
}
