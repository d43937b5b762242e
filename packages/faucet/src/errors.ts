// SPDX-License-Identifier: Apache-2.0
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { ErrorCode } from "./api.ts";

export class FaucetError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly status: ContentfulStatusCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "FaucetError";
  }
}

/** Startup-fatal: bad credential, bad numbers, unreachable node. */
export class ConfigurationError extends FaucetError {
  constructor(message: string, options?: ErrorOptions) {
    super("configuration_error", 500, message, options);
    this.name = "ConfigurationError";
  }
}

export class InvalidAddressError extends FaucetError {
  constructor(public readonly address: string) {
    super("invalid_address", 400, "invalid Ethereum address");
    this.name = "InvalidAddressError";
  }
}

export class CooldownActiveError extends FaucetError {
  /** Remaining wait rounded to the nearest minute. */
  readonly remainingMinutes: number;

  constructor(
    public readonly address: string,
    public readonly remainingMs: number,
  ) {
    const remainingMinutes = Math.round(remainingMs / 60_000);
    super("cooldown_active", 429, `address ${address} can request again in ${remainingMinutes} minutes`);
    this.name = "CooldownActiveError";
    this.remainingMinutes = remainingMinutes;
  }
}

export type LedgerQuery = "nonce" | "gas_price" | "gas_estimate" | "balance";

const QUERY_CODES: Record<LedgerQuery, ErrorCode> = {
  nonce: "nonce_fetch_failed",
  gas_price: "gas_price_fetch_failed",
  gas_estimate: "gas_estimate_failed",
  balance: "balance_query_failed",
};

const QUERY_LABELS: Record<LedgerQuery, string> = {
  nonce: "failed to get nonce",
  gas_price: "failed to get gas price",
  gas_estimate: "failed to estimate gas",
  balance: "failed to get balance",
};

/** A read against the ledger node failed. Nothing was submitted. */
export class LedgerQueryError extends FaucetError {
  constructor(
    public readonly query: LedgerQuery,
    cause: unknown,
  ) {
    super(QUERY_CODES[query], 502, `${QUERY_LABELS[query]}: ${causeMessage(cause)}`, { cause });
    this.name = "LedgerQueryError";
  }
}

export class SigningError extends FaucetError {
  constructor(cause: unknown) {
    super("signing_failed", 500, `failed to sign transaction: ${causeMessage(cause)}`, { cause });
    this.name = "SigningError";
  }
}

/** The node refused or never acknowledged the signed transaction. Safe to retry. */
export class SubmissionError extends FaucetError {
  constructor(cause: unknown) {
    super("submission_failed", 502, `failed to send transaction: ${causeMessage(cause)}`, { cause });
    this.name = "SubmissionError";
  }
}

/** viem errors carry a multi-line message; the first line is the part worth showing. */
export function causeMessage(cause: unknown): string {
  if (cause instanceof Error) {
    const shortMessage = "shortMessage" in cause ? cause.shortMessage : undefined;
    if (typeof shortMessage === "string" && shortMessage.length > 0) return shortMessage;
    return cause.message.split("\n")[0] ?? cause.message;
  }
  return String(cause);
}
