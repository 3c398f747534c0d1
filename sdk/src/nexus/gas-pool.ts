/**
 * Pool of owned gas coins shared by the client's actions.
 *
 * Coins are handed out first-in first-out. `acquire` waits until a coin is
 * released when the pool is empty; waiters are served in arrival order.
 *
 * @module
 */

import { ConfigurationError } from "../errors.js";
import type { ObjectRef } from "../types/object.js";

/** A checked-out coin. Actions update `ref` after the coin is spent on gas. */
export interface GasCoinLease {
  ref: ObjectRef;
}

export class GasPool {
  private readonly coins: ObjectRef[];
  private readonly waiters: Array<(coin: ObjectRef) => void> = [];

  constructor(
    coins: readonly ObjectRef[],
    readonly budget: bigint,
  ) {
    if (coins.length === 0) {
      throw new ConfigurationError("At least one gas coin is required");
    }
    if (budget <= 0n) {
      throw new ConfigurationError("Gas budget must be positive");
    }
    this.coins = [...coins];
  }

  /** Coins currently idle in the pool */
  get available(): number {
    return this.coins.length;
  }

  acquire(): Promise<ObjectRef> {
    const coin = this.coins.shift();
    if (coin !== undefined) return Promise.resolve(coin);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  release(coin: ObjectRef): void {
    const waiter = this.waiters.shift();
    if (waiter !== undefined) {
      waiter(coin);
      return;
    }
    this.coins.push(coin);
  }

  /**
   * Run `fn` with a checked-out coin. The lease's current `ref` goes back to
   * the pool once `fn` settles, whether it resolved or threw.
   */
  async withGasCoin<T>(fn: (lease: GasCoinLease) => Promise<T>): Promise<T> {
    const lease: GasCoinLease = { ref: await this.acquire() };
    try {
      return await fn(lease);
    } finally {
      this.release(lease.ref);
    }
  }
}
