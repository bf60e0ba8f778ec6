/**
 * Authentication types.
 *
 * The HTTP layer only establishes WHO is calling. What that account may
 * do is decided by the lending engine from its steward, curator and
 * membership records.
 */

/**
 * Resolved caller, set by the auth middleware.
 */
export interface AuthContext {
  /** How the caller was identified */
  readonly type: "api-key" | "header";
  readonly accountId: string;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly accountId: string;
}
