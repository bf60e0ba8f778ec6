/**
 * @circulate/escrow — In-memory funds sink.
 *
 * Holds a wallet balance per account and the engine's own balance.
 * Used by tests, the simulator and the HTTP service when no external
 * payment rail is attached.
 */

import type { AccountId, Currency, Money } from "@circulate/types";
import { isAccountId } from "@circulate/types";
import { assertPositiveAmount, toMoney } from "./money-math.js";
import type { FundsSink } from "./types.js";
import { EscrowError } from "./types.js";

export class InMemoryFundsSink implements FundsSink {
  private readonly _currency: Currency;
  private readonly _decimals: number;
  private readonly _wallets: Map<AccountId, bigint> = new Map();
  private _engine = 0n;

  constructor(currency: Currency, decimals: number) {
    this._currency = currency;
    this._decimals = decimals;
  }

  /**
   * Add value to an account's wallet from outside the engine.
   */
  fund(account: AccountId, amount: Money): Money {
    if (!isAccountId(account)) {
      throw new EscrowError("INVALID_ACCOUNT", "Account id must be a non-empty string");
    }
    const scaled = assertPositiveAmount(amount, this._currency, this._decimals);
    const balance = this.walletOf(account) + scaled;
    this._wallets.set(account, balance);
    return this.money(balance);
  }

  /**
   * @throws EscrowError INSUFFICIENT_FUNDS when the sender's wallet is short
   */
  received(from: AccountId, amount: Money): void {
    const scaled = assertPositiveAmount(amount, this._currency, this._decimals);
    const wallet = this.walletOf(from);
    if (wallet < scaled) {
      throw new EscrowError(
        "INSUFFICIENT_FUNDS",
        `"${from}" cannot send ${amount.amount} ${amount.currency}; wallet holds ${this.money(wallet).amount}`,
      );
    }
    this._wallets.set(from, wallet - scaled);
    this._engine += scaled;
  }

  /**
   * @throws EscrowError INSUFFICIENT_FUNDS when the engine balance is short
   */
  payOut(to: AccountId, amount: Money): void {
    const scaled = assertPositiveAmount(amount, this._currency, this._decimals);
    if (this._engine < scaled) {
      throw new EscrowError(
        "INSUFFICIENT_FUNDS",
        `Engine balance ${this.money(this._engine).amount} cannot cover payout of ${amount.amount}`,
      );
    }
    this._engine -= scaled;
    this._wallets.set(to, this.walletOf(to) + scaled);
  }

  balanceOf(account: AccountId): Money {
    return this.money(this.walletOf(account));
  }

  engineBalance(): Money {
    return this.money(this._engine);
  }

  private walletOf(account: AccountId): bigint {
    return this._wallets.get(account) ?? 0n;
  }

  private money(scaled: bigint): Money {
    return toMoney(scaled, this._currency, this._decimals);
  }
}
