// SPDX-License-Identifier: Apache-2.0
import { type Logger, createLogger, errorFields } from "@spigot/service-kit";
import { type Address, type Hash, type Hex, getAddress, isAddress } from "viem";
import type { PrivateKeyAccount } from "viem/accounts";
import { signTransfer, transactionHash } from "./account.ts";
import type { CooldownTable } from "./cooldown.ts";
import {
  CooldownActiveError,
  InvalidAddressError,
  type LedgerQuery,
  LedgerQueryError,
  SigningError,
  SubmissionError,
} from "./errors.ts";
import { type LedgerClient, withDeadline } from "./ledger.ts";
import { KeyedMutex, Mutex } from "./mutex.ts";

export interface FaucetServiceOptions {
  ledger: LedgerClient;
  account: PrivateKeyAccount;
  chainId: number;
  /** Wei sent per disbursement. */
  amount: bigint;
  cooldowns: CooldownTable;
  ledgerTimeoutMs: number;
  logger?: Logger;
}

export interface Disbursement {
  address: Address;
  txHash: Hash;
  nonce: number;
  /** Cooldown timestamp recorded for the address. */
  recordedAt: number;
}

export interface Eligibility {
  address: Address;
  available: boolean;
  retryAfterMs: number;
}

/**
 * Validates and checksums a recipient. Rejects anything that is not 0x + 40 hex chars,
 * and mixed-case input whose EIP-55 checksum does not match.
 */
export function normalizeAddress(input: string): Address {
  if (!isAddress(input)) {
    throw new InvalidAddressError(input);
  }
  return getAddress(input);
}

/**
 * Disbursement engine: one fixed-amount transfer per eligible address per cooldown.
 *
 * Two locks, always taken in this order:
 *   - a per-address lock held across check → build → sign → submit → record, so two
 *     concurrent requests for one address produce one transfer;
 *   - the submit pipeline, held from nonce fetch through submission, so concurrent
 *     transfers from the faucet account never share a nonce.
 *
 * The cooldown is recorded only after the node accepted the transaction. Any failure
 * before that leaves the table untouched and the caller may retry at once.
 */
export class FaucetService {
  readonly address: Address;
  readonly chainId: number;
  readonly amount: bigint;
  private readonly ledger: LedgerClient;
  private readonly account: PrivateKeyAccount;
  private readonly cooldowns: CooldownTable;
  private readonly ledgerTimeoutMs: number;
  private readonly log: Logger;
  private readonly addressLocks = new KeyedMutex();
  private readonly pipeline = new Mutex();

  constructor(options: FaucetServiceOptions) {
    this.ledger = options.ledger;
    this.account = options.account;
    this.address = options.account.address;
    this.chainId = options.chainId;
    this.amount = options.amount;
    this.cooldowns = options.cooldowns;
    this.ledgerTimeoutMs = options.ledgerTimeoutMs;
    this.log = options.logger ?? createLogger("faucet", { module: "engine" });
  }

  async requestDisbursement(input: string): Promise<Disbursement> {
    const address = normalizeAddress(input);

    return this.addressLocks.runExclusive(address, async () => {
      const check = this.cooldowns.check(address);
      if (!check.allowed) {
        throw new CooldownActiveError(address, check.retryAfterMs);
      }

      const { txHash, nonce } = await this.pipeline.runExclusive(() => this.transfer(address));
      const recordedAt = this.cooldowns.record(address);

      this.log.info("Disbursement submitted", {
        to: address,
        tx_hash: txHash,
        nonce,
        amount_wei: this.amount,
      });
      return { address, txHash, nonce, recordedAt };
    });
  }

  /** Read-only cooldown check; no lock, no ledger call. */
  checkEligibility(input: string): Eligibility {
    const address = normalizeAddress(input);
    const check = this.cooldowns.check(address);
    return { address, available: check.allowed, retryAfterMs: check.retryAfterMs };
  }

  async getBalance(): Promise<bigint> {
    return this.query("balance", () => this.ledger.getBalance(this.address));
  }

  private async transfer(to: Address): Promise<{ txHash: Hash; nonce: number }> {
    const nonce = await this.query("nonce", () => this.ledger.getPendingNonce(this.address));
    const gasPrice = await this.query("gas_price", () => this.ledger.suggestGasPrice());
    const gas = await this.query("gas_estimate", () =>
      this.ledger.estimateGas({ from: this.address, to, value: this.amount }),
    );

    let signedTx: Hex;
    try {
      signedTx = await signTransfer(this.account, {
        nonce,
        to,
        value: this.amount,
        gas,
        gasPrice,
        chainId: this.chainId,
      });
    } catch (err) {
      this.log.error("Signing failed", { to, nonce, ...errorFields(err) });
      throw new SigningError(err);
    }

    try {
      await withDeadline("submit", this.ledgerTimeoutMs, () =>
        this.ledger.submitTransaction(signedTx),
      );
    } catch (err) {
      this.log.warn("Submission failed", { to, nonce, ...errorFields(err) });
      throw new SubmissionError(err);
    }

    return { txHash: transactionHash(signedTx), nonce };
  }

  private async query<T>(query: LedgerQuery, call: () => Promise<T>): Promise<T> {
    try {
      return await withDeadline(query, this.ledgerTimeoutMs, call);
    } catch (err) {
      this.log.warn("Ledger query failed", { query, ...errorFields(err) });
      throw new LedgerQueryError(query, err);
    }
  }
}
