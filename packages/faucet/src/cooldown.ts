// SPDX-License-Identifier: Apache-2.0
/**
 * Per-address cooldown table.
 *
 * Maps a recipient address to the time of its last successful disbursement.
 * In-memory only: a restart forgets every cooldown. Entries whose cooldown has
 * already elapsed are pruned lazily, at most once per `pruneIntervalMs`; an
 * elapsed entry and a missing one give the same answer, so pruning never changes
 * an eligibility decision.
 *
 * Every method is synchronous, so a check or a record never interleaves with
 * another request on the event loop.
 */

export type Clock = () => number;

export interface CooldownCheck {
  allowed: boolean;
  /** Milliseconds until the address may be served again. 0 if allowed. */
  retryAfterMs: number;
}

export interface CooldownTableOptions {
  cooldownMs: number;
  now?: Clock;
  /** Default: one hour. */
  pruneIntervalMs?: number;
}

export class CooldownTable {
  readonly cooldownMs: number;
  private readonly now: Clock;
  private readonly pruneIntervalMs: number;
  private readonly lastDrips = new Map<string, number>();
  private lastPrune: number;

  constructor(options: CooldownTableOptions) {
    this.cooldownMs = options.cooldownMs;
    this.now = options.now ?? Date.now;
    this.pruneIntervalMs = options.pruneIntervalMs ?? 60 * 60 * 1000;
    this.lastPrune = this.now();
  }

  check(address: string): CooldownCheck {
    const now = this.now();
    this.maybePrune(now);

    const lastDrip = this.lastDrips.get(address);
    if (lastDrip === undefined) {
      return { allowed: true, retryAfterMs: 0 };
    }

    const elapsed = now - lastDrip;
    if (elapsed >= this.cooldownMs) {
      return { allowed: true, retryAfterMs: 0 };
    }

    return { allowed: false, retryAfterMs: this.cooldownMs - elapsed };
  }

  /** Stamp the address with the current time. Call only after the transfer was accepted. */
  record(address: string): number {
    const at = this.now();
    this.lastDrips.set(address, at);
    return at;
  }

  lastDripAt(address: string): number | null {
    return this.lastDrips.get(address) ?? null;
  }

  get size(): number {
    return this.lastDrips.size;
  }

  private maybePrune(now: number): void {
    if (now - this.lastPrune < this.pruneIntervalMs) return;
    this.lastPrune = now;
    for (const [address, at] of this.lastDrips) {
      if (now - at >= this.cooldownMs) {
        this.lastDrips.delete(address);
      }
    }
  }
}
