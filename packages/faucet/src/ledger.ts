// SPDX-License-Identifier: Apache-2.0
/**
 * LedgerClient — the faucet's view of the chain node.
 * The engine depends on this contract only; ViemLedgerClient is the JSON-RPC
 * implementation and tests supply an in-process fake.
 */

import type { Address, Hex } from "viem";

export interface TransferCall {
  from: Address;
  to: Address;
  value: bigint;
}

export interface LedgerClient {
  /** Next nonce for the account, counting transactions still in the mempool. */
  getPendingNonce(account: Address): Promise<number>;
  suggestGasPrice(): Promise<bigint>;
  estimateGas(call: TransferCall): Promise<bigint>;
  /** Broadcast a signed, serialized transaction. Not idempotent. */
  submitTransaction(signedTx: Hex): Promise<void>;
  getBalance(account: Address): Promise<bigint>;
  getChainId(): Promise<number>;
}

export class DeadlineExceededError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "DeadlineExceededError";
  }
}

/**
 * Runs one ledger call under its own deadline. On expiry the returned promise rejects
 * with DeadlineExceededError; the abandoned call is left to the transport's own timeout.
 */
export async function withDeadline<T>(
  operation: string,
  timeoutMs: number,
  call: () => Promise<T>,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DeadlineExceededError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([call(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
