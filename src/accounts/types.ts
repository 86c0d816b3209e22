/**
 * Types for Account Context
 */

/**
 * Credential bundle of one exchange account
 */
export interface AccountCredentials {
  readonly name: string;
  readonly apiKey: string;
  readonly apiSecret: string;
  readonly passphrase: string;
  readonly isSubAccount: boolean;

  /** UID of the owning main account; required for sub-accounts */
  readonly mainAccountUid?: string;
}
