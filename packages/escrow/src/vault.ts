/**
 * @circulate/escrow — Escrow vault.
 *
 * Per-loan deposits keyed by loan key, plus one pooled forfeiture balance.
 *
 * Rules:
 * - At most one deposit per loan key
 * - release and forfeit remove the deposit in full
 * - Forfeitures are pooled; the pool is not itemised per loan
 * - Only the current steward withdraws from the pool
 * - A failed pool payout leaves the pool unchanged
 */

import type { AccessPolicy, AccountId, Currency, LoanKey, Money } from "@circulate/types";
import { isAccountId, isStewardAccess } from "@circulate/types";
import { assertPositiveAmount, toMoney } from "./money-math.js";
import type { EscrowSnapshot, FundsSink, PoolWithdrawal } from "./types.js";
import { EscrowError } from "./types.js";

export class EscrowVault {
  private readonly _currency: Currency;
  private readonly _decimals: number;
  private readonly _deposits: Map<LoanKey, bigint> = new Map();
  private _pool = 0n;

  constructor(currency: Currency, decimals: number) {
    this._currency = currency;
    this._decimals = decimals;
  }

  get currency(): Currency {
    return this._currency;
  }

  get decimals(): number {
    return this._decimals;
  }

  // ─── Deposits ──────────────────────────────────────────────────────────

  /**
   * Hold a deposit under a loan key.
   */
  lock(key: LoanKey, amount: Money): void {
    const scaled = assertPositiveAmount(amount, this._currency, this._decimals);
    if (this._deposits.has(key)) {
      throw new EscrowError("ACTIVE_LOAN_EXISTS", `A deposit is already held for ${key}`);
    }
    this._deposits.set(key, scaled);
  }

  /**
   * Remove and return the deposit held for a key, for refund to the borrower.
   */
  release(key: LoanKey): Money {
    const scaled = this.take(key);
    return this.money(scaled);
  }

  /**
   * Move the deposit held for a key into the forfeiture pool.
   */
  forfeit(key: LoanKey): Money {
    const scaled = this.take(key);
    this._pool += scaled;
    return this.money(scaled);
  }

  // ─── Pool ──────────────────────────────────────────────────────────────

  /**
   * Pay `amount` out of the forfeiture pool to `to`. Steward only.
   *
   * The payout is the last step; if it throws the pool is restored
   * and the error propagates.
   */
  withdrawPool(
    access: AccessPolicy,
    to: AccountId,
    amount: Money,
    sink: FundsSink,
  ): PoolWithdrawal {
    if (!isStewardAccess(access)) {
      throw new EscrowError("NOT_STEWARD", `Only the steward may withdraw from the pool; "${access.actor}" is not`);
    }
    if (!isAccountId(to)) {
      throw new EscrowError("INVALID_ACCOUNT", "Withdrawal recipient must be a non-empty account id");
    }
    const scaled = assertPositiveAmount(amount, this._currency, this._decimals);
    if (scaled > this._pool) {
      throw new EscrowError(
        "INSUFFICIENT_POOL",
        `Pool holds ${this.money(this._pool).amount}, cannot withdraw ${amount.amount}`,
      );
    }

    this._pool -= scaled;
    try {
      sink.payOut(to, this.money(scaled));
    } catch (err) {
      this._pool += scaled;
      throw err;
    }
    return { to, amount: this.money(scaled), poolBalance: this.poolBalance() };
  }

  // ─── Queries ───────────────────────────────────────────────────────────

  escrowedFor(key: LoanKey): Money | undefined {
    const scaled = this._deposits.get(key);
    return scaled === undefined ? undefined : this.money(scaled);
  }

  hasDeposit(key: LoanKey): boolean {
    return this._deposits.has(key);
  }

  poolBalance(): Money {
    return this.money(this._pool);
  }

  totalEscrowed(): Money {
    let total = 0n;
    for (const scaled of this._deposits.values()) {
      total += scaled;
    }
    return this.money(total);
  }

  snapshot(): EscrowSnapshot {
    return {
      deposits: [...this._deposits.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([key, scaled]) => ({ key, amount: this.money(scaled) })),
      totalEscrowed: this.totalEscrowed(),
      poolBalance: this.poolBalance(),
    };
  }

  // ─── Internals ─────────────────────────────────────────────────────────

  private take(key: LoanKey): bigint {
    const scaled = this._deposits.get(key);
    if (scaled === undefined) {
      throw new EscrowError("NO_SUCH_LOAN", `No deposit is held for ${key}`);
    }
    this._deposits.delete(key);
    return scaled;
  }

  private money(scaled: bigint): Money {
    return toMoney(scaled, this._currency, this._decimals);
  }
}
