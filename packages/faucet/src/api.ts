/**
 * Faucet HTTP contract: request/response bodies and error codes.
 */

// ─── Error codes ──────────────────────────────────────────────────────────

export const ERROR_CODES = [
  "invalid_request",
  "invalid_address",
  "cooldown_active",
  "nonce_fetch_failed",
  "gas_price_fetch_failed",
  "gas_estimate_failed",
  "balance_query_failed",
  "signing_failed",
  "submission_failed",
  "configuration_error",
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export interface FailureResponse {
  success: false;
  /** Machine-readable error code. */
  code: ErrorCode | "internal_error";
  /** Human-readable error message. */
  message: string;
  /** Seconds until the address may request again. Only present on 429 responses. */
  retry_after?: number;
}

// ─── Disbursement ─────────────────────────────────────────────────────────

export interface DisbursementRequest {
  /** Recipient EVM address (0x + 40 hex chars). */
  address: string;
}

export interface DisbursementResponse {
  success: true;
  message: string;
  /** Hash of the submitted transfer. */
  tx_hash: string;
}

// ─── Status ───────────────────────────────────────────────────────────────

export interface EligibilityResponse {
  /** The queried address, checksummed. */
  address: string;
  /** Whether a request for this address would pass the cooldown check right now. */
  available: boolean;
  /** Milliseconds until the cooldown expires. 0 if available. */
  retry_after_ms: number;
}

// ─── Balance ──────────────────────────────────────────────────────────────

export interface BalanceResponse {
  /** Faucet account address. */
  address: string;
  /** Balance in wei as a decimal string. */
  balance_wei: string;
  /** Balance in ether, e.g. "1.5". */
  balance: string;
}

export interface HealthResponse {
  service: string;
  status: "ok";
  address: string;
  chain_id: number;
}
