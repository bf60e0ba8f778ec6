/**
 * @circulate/lending — Policy store.
 *
 * Holds the lending policy, the custodian (branch) account and the
 * steward/curator chain, and builds the AccessPolicy values every
 * privileged operation is checked against.
 *
 * Rules:
 * - Only the current steward changes anything here
 * - loanDuration, extensionDuration and depositAmount must be non-zero
 * - gracePeriod and maxExtensions may be zero
 * - Renouncing stewardship is permanent
 * - Every change returns an (old, new) record for the audit trail
 */

import type { AccessPolicy, AccountId, Currency, Money } from "@circulate/types";
import { isAccountId } from "@circulate/types";
import { parseAmount } from "@circulate/escrow";
import type {
  CustodianChange,
  LendingPolicy,
  NumericPolicySetting,
  PolicyChange,
  PolicySnapshot,
  PolicyUpdate,
  StewardChange,
} from "./types.js";
import { LendingError } from "./types.js";

export interface PolicyStoreOptions {
  readonly steward: AccountId;
  readonly policy: LendingPolicy;
  readonly custodian?: AccountId | undefined;
  readonly curators?: readonly AccountId[] | undefined;
}

/** Settings that must stay strictly positive. */
const NON_ZERO: ReadonlySet<NumericPolicySetting> = new Set(["loanDuration", "extensionDuration"]);

export class PolicyStore {
  private _policy: LendingPolicy;
  private _custodian: AccountId | null;
  private _steward: AccountId | null;
  private readonly _curators: Set<AccountId>;
  private readonly _currency: Currency;
  private readonly _decimals: number;

  constructor(options: PolicyStoreOptions) {
    assertAccount(options.steward, "Steward");
    if (options.custodian !== undefined) {
      assertAccount(options.custodian, "Custodian");
    }
    for (const curator of options.curators ?? []) {
      assertAccount(curator, "Curator");
    }

    this._currency = options.policy.depositAmount.currency;
    this._decimals = options.policy.depositAmount.decimals;
    for (const setting of ["loanDuration", "gracePeriod", "extensionDuration", "maxExtensions"] as const) {
      validateNumeric(setting, options.policy[setting]);
    }
    this.validateDeposit(options.policy.depositAmount);

    this._policy = { ...options.policy };
    this._steward = options.steward;
    this._custodian = options.custodian ?? null;
    this._curators = new Set(options.curators ?? []);
  }

  // ─── Reads ─────────────────────────────────────────────────────────────

  getPolicy(): LendingPolicy {
    return this._policy;
  }

  get currency(): Currency {
    return this._currency;
  }

  get decimals(): number {
    return this._decimals;
  }

  custodian(): AccountId | null {
    return this._custodian;
  }

  steward(): AccountId | null {
    return this._steward;
  }

  curators(): readonly AccountId[] {
    return [...this._curators].sort();
  }

  /**
   * Build the access policy for an actor from the current role holders.
   */
  accessFor(actor: AccountId): AccessPolicy {
    return { actor, steward: this._steward, curators: new Set(this._curators) };
  }

  snapshot(): PolicySnapshot {
    return {
      policy: this._policy,
      custodian: this._custodian,
      steward: this._steward,
      curators: this.curators(),
    };
  }

  // ─── Policy Settings ───────────────────────────────────────────────────

  /**
   * Change one policy setting.
   *
   * @throws LendingError INVALID_POLICY_VALUE, CURRENCY_MISMATCH
   */
  update(access: AccessPolicy, update: PolicyUpdate): PolicyChange {
    this.assertSteward(access);

    if (update.setting === "depositAmount") {
      this.validateDeposit(update.value);
      const oldValue = this._policy.depositAmount;
      this._policy = { ...this._policy, depositAmount: update.value };
      return { setting: "depositAmount", oldValue, newValue: update.value };
    }

    validateNumeric(update.setting, update.value);
    const oldValue = this._policy[update.setting];
    this._policy = { ...this._policy, [update.setting]: update.value };
    return { setting: update.setting, oldValue, newValue: update.value };
  }

  setLoanDuration(access: AccessPolicy, seconds: number): PolicyChange {
    return this.update(access, { setting: "loanDuration", value: seconds });
  }

  setDepositAmount(access: AccessPolicy, amount: Money): PolicyChange {
    return this.update(access, { setting: "depositAmount", value: amount });
  }

  setGracePeriod(access: AccessPolicy, seconds: number): PolicyChange {
    return this.update(access, { setting: "gracePeriod", value: seconds });
  }

  setExtensionDuration(access: AccessPolicy, seconds: number): PolicyChange {
    return this.update(access, { setting: "extensionDuration", value: seconds });
  }

  setMaxExtensions(access: AccessPolicy, count: number): PolicyChange {
    return this.update(access, { setting: "maxExtensions", value: count });
  }

  // ─── Custodian ─────────────────────────────────────────────────────────

  setCustodian(access: AccessPolicy, account: AccountId): CustodianChange {
    this.assertSteward(access);
    assertAccount(account, "Custodian");
    const oldCustodian = this._custodian;
    this._custodian = account;
    return { oldCustodian, newCustodian: account };
  }

  // ─── Roles ─────────────────────────────────────────────────────────────

  /**
   * Grant the curator role. Returns false when the account already had it.
   */
  grantCurator(access: AccessPolicy, account: AccountId): boolean {
    this.assertSteward(access);
    assertAccount(account, "Curator");
    if (this._curators.has(account)) return false;
    this._curators.add(account);
    return true;
  }

  /**
   * Revoke the curator role. Returns false when the account did not have it.
   */
  revokeCurator(access: AccessPolicy, account: AccountId): boolean {
    this.assertSteward(access);
    return this._curators.delete(account);
  }

  transferStewardship(access: AccessPolicy, next: AccountId): StewardChange {
    const oldSteward = this.assertSteward(access);
    assertAccount(next, "Steward");
    this._steward = next;
    return { oldSteward, newSteward: next };
  }

  /**
   * Give up stewardship for good. Nothing steward-only can happen afterwards.
   */
  renounceStewardship(access: AccessPolicy): StewardChange {
    const oldSteward = this.assertSteward(access);
    this._steward = null;
    return { oldSteward, newSteward: null };
  }

  // ─── Internals ─────────────────────────────────────────────────────────

  private assertSteward(access: AccessPolicy): AccountId {
    const steward = this._steward;
    if (steward === null) {
      throw new LendingError("STEWARD_RENOUNCED", "Stewardship has been renounced");
    }
    if (access.actor !== steward) {
      throw new LendingError("NOT_STEWARD", `Only the steward may change lending policy; "${access.actor}" is not`);
    }
    return steward;
  }

  private validateDeposit(amount: Money): void {
    if (amount.currency !== this._currency || amount.decimals !== this._decimals) {
      throw new LendingError(
        "CURRENCY_MISMATCH",
        `Deposit must be in ${this._currency}/${this._decimals}, got ${amount.currency}/${amount.decimals}`,
      );
    }
    if (parseAmount(amount.amount, amount.decimals) <= 0n) {
      throw new LendingError("INVALID_POLICY_VALUE", `depositAmount must be positive, got "${amount.amount}"`);
    }
  }
}

function validateNumeric(setting: NumericPolicySetting, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new LendingError("INVALID_POLICY_VALUE", `${setting} must be a non-negative integer, got ${value}`);
  }
  if (value === 0 && NON_ZERO.has(setting)) {
    throw new LendingError("INVALID_POLICY_VALUE", `${setting} must not be zero`);
  }
}

function assertAccount(account: AccountId, role: string): void {
  if (!isAccountId(account)) {
    throw new LendingError("INVALID_ACCOUNT", `${role} account id must be a non-empty string`);
  }
}
