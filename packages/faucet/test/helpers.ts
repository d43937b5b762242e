import { type Address, type Hex, parseTransaction } from "viem";
import type { PrivateKeyAccount } from "viem/accounts";
import { createFaucetAccount } from "../src/account.ts";
import { CooldownTable } from "../src/cooldown.ts";
import type { LedgerClient, TransferCall } from "../src/ledger.ts";
import { FaucetService } from "../src/service.ts";

// Placeholder key: 32 bytes of 0x11, valid scalar, never funded anywhere
export const TEST_PRIVATE_KEY = "11".repeat(32);
export const TEST_CHAIN_ID = 31337;
export const TEST_AMOUNT = 1000n;
export const HOUR_MS = 60 * 60 * 1000;
export const MINUTE_MS = 60 * 1000;

export const GAS_PRICE = 2_000_000_000n;
export const GAS_LIMIT = 21_000n;

export type LedgerMethod = keyof LedgerClient;

/**
 * In-process ledger. Pending nonce is startNonce + number of accepted submissions,
 * the way a node counts mempool transactions. Every call yields to the event loop
 * first so concurrent requests really interleave.
 */
export class FakeLedger implements LedgerClient {
  readonly calls: LedgerMethod[] = [];
  readonly submitted: Hex[] = [];
  readonly estimates: TransferCall[] = [];
  readonly failures = new Map<LedgerMethod, Error>();
  readonly hanging = new Set<LedgerMethod>();
  balance = 5_000_000_000_000_000_000n;
  chainId = TEST_CHAIN_ID;

  constructor(private readonly startNonce = 0) {}

  private async enter(method: LedgerMethod): Promise<void> {
    this.calls.push(method);
    await new Promise((resolve) => setTimeout(resolve, 0));
    if (this.hanging.has(method)) {
      await new Promise<never>(() => {});
    }
    const failure = this.failures.get(method);
    if (failure) throw failure;
  }

  async getPendingNonce(_account: Address): Promise<number> {
    await this.enter("getPendingNonce");
    return this.startNonce + this.submitted.length;
  }

  async suggestGasPrice(): Promise<bigint> {
    await this.enter("suggestGasPrice");
    return GAS_PRICE;
  }

  async estimateGas(call: TransferCall): Promise<bigint> {
    await this.enter("estimateGas");
    this.estimates.push(call);
    return GAS_LIMIT;
  }

  async submitTransaction(signedTx: Hex): Promise<void> {
    await this.enter("submitTransaction");
    this.submitted.push(signedTx);
  }

  async getBalance(_account: Address): Promise<bigint> {
    await this.enter("getBalance");
    return this.balance;
  }

  async getChainId(): Promise<number> {
    await this.enter("getChainId");
    return this.chainId;
  }

  /** Decoded submitted transactions, in submission order. */
  transactions() {
    return this.submitted.map((signed) => parseTransaction(signed));
  }
}

/** Manually advanced clock. */
export class TestClock {
  constructor(public current = 0) {}

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface Harness {
  ledger: FakeLedger;
  account: PrivateKeyAccount;
  clock: TestClock;
  cooldowns: CooldownTable;
  service: FaucetService;
}

export function createHarness(
  options: { cooldownMs?: number; ledgerTimeoutMs?: number; ledger?: FakeLedger } = {},
): Harness {
  const ledger = options.ledger ?? new FakeLedger();
  const account = createFaucetAccount(TEST_PRIVATE_KEY);
  const clock = new TestClock();
  const cooldowns = new CooldownTable({ cooldownMs: options.cooldownMs ?? HOUR_MS, now: clock.now });
  const service = new FaucetService({
    ledger,
    account,
    chainId: TEST_CHAIN_ID,
    amount: TEST_AMOUNT,
    cooldowns,
    ledgerTimeoutMs: options.ledgerTimeoutMs ?? 1_000,
  });
  return { ledger, account, clock, cooldowns, service };
}

/** Distinct lowercase (checksum-free) addresses: 0x…01, 0x…02, … */
export function addressN(n: number): string {
  return `0x${n.toString(16).padStart(40, "0")}`;
}
