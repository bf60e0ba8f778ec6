/**
 * Error kinds.
 *
 * Every package throws its own error class carrying a string `code`.
 * Callers that only care about the category (an HTTP layer choosing a
 * status, a simulator counting rejections) map the code to its kind.
 */

export type ErrorKind = "authorization" | "not_found" | "state_conflict" | "value";

const KIND_BY_CODE: ReadonlyMap<string, ErrorKind> = new Map<string, ErrorKind>([
  ["NOT_STEWARD", "authorization"],
  ["NOT_CURATOR", "authorization"],
  ["NOT_MEMBER", "authorization"],

  ["NO_SUCH_ITEM", "not_found"],
  ["NO_SUCH_LOAN", "not_found"],

  ["ACTIVE_LOAN_EXISTS", "state_conflict"],
  ["NO_ACTIVE_LOAN", "state_conflict"],
  ["MAX_EXTENSIONS_REACHED", "state_conflict"],
  ["NOT_HOLDER", "state_conflict"],
  ["ITEM_PAUSED", "state_conflict"],
  ["UNAVAILABLE", "state_conflict"],
  ["REENTRANT_CALL", "state_conflict"],
  ["STEWARD_RENOUNCED", "state_conflict"],

  ["DEPOSIT_TOO_LOW", "value"],
  ["INVALID_POLICY_VALUE", "value"],
  ["BRANCH_UNSET", "value"],
  ["INVALID_ACCOUNT", "value"],
  ["INVALID_METADATA", "value"],
  ["INVALID_QUANTITY", "value"],
  ["INVALID_AMOUNT", "value"],
  ["CURRENCY_MISMATCH", "value"],
  ["INSUFFICIENT_POOL", "value"],
  ["INSUFFICIENT_UNITS", "value"],
  ["INSUFFICIENT_FUNDS", "value"],
]);

/**
 * Kind of a domain error code, or undefined for codes outside the
 * lending domain (event store failures, unknown errors).
 */
export function errorKindOf(code: string): ErrorKind | undefined {
  return KIND_BY_CODE.get(code);
}

/**
 * Read the `code` of a domain error without knowing its class.
 */
export function domainErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
