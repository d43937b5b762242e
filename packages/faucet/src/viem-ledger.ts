// SPDX-License-Identifier: Apache-2.0
import { type Address, type Hex, createPublicClient, http } from "viem";
import type { LedgerClient, TransferCall } from "./ledger.ts";

export interface ViemLedgerOptions {
  rpcUrl: string;
  /** Per-request HTTP timeout handed to the viem transport. */
  timeoutMs: number;
}

function createClient(options: ViemLedgerOptions) {
  return createPublicClient({
    transport: http(options.rpcUrl, { timeout: options.timeoutMs, retryCount: 0 }),
  });
}

/** LedgerClient over a viem PublicClient talking JSON-RPC to one node. */
export class ViemLedgerClient implements LedgerClient {
  private readonly client: ReturnType<typeof createClient>;

  constructor(options: ViemLedgerOptions) {
    this.client = createClient(options);
  }

  getPendingNonce(account: Address): Promise<number> {
    return this.client.getTransactionCount({ address: account, blockTag: "pending" });
  }

  suggestGasPrice(): Promise<bigint> {
    return this.client.getGasPrice();
  }

  estimateGas(call: TransferCall): Promise<bigint> {
    return this.client.estimateGas({ account: call.from, to: call.to, value: call.value });
  }

  async submitTransaction(signedTx: Hex): Promise<void> {
    await this.client.sendRawTransaction({ serializedTransaction: signedTx });
  }

  getBalance(account: Address): Promise<bigint> {
    return this.client.getBalance({ address: account });
  }

  getChainId(): Promise<number> {
    return this.client.getChainId();
  }
}
