/**
 * Short-lived backend credential.
 */
export interface Credential {
  value: string;
  /** Epoch milliseconds after which the backend rejects the credential. */
  expiresAt: number;
  /** Milliseconds before `expiresAt` at which a replacement is fetched. */
  refreshMargin: number;
}

/**
 * Attached to each authenticated request by the auth guard.
 */
export interface AuthContext {
  credential: Credential;
  /** `operator` when the configured account token is in use. */
  source: 'operator' | 'caller';
}
