/**
 * @circulate/escrow
 *
 * Deposit escrow, forfeiture pool, value transfer and money math.
 */

export type {
  FundsSink,
  EscrowedDeposit,
  PoolWithdrawal,
  EscrowSnapshot,
  EscrowErrorCode,
} from "./types.js";
export { EscrowError } from "./types.js";

export {
  parseAmount,
  formatAmount,
  toMoney,
  zeroMoney,
  assertCurrency,
  normalizeMoney,
  compareMoney,
  assertPositiveAmount,
} from "./money-math.js";

export { EscrowVault } from "./vault.js";
export { InMemoryFundsSink } from "./funds-sink.js";
