import {
  CredentialRecord,
  NewVerificationAttempt,
  Provider,
  ProviderStatusUpdate,
  VerificationAttempt
} from '../types';

export interface ProviderStore {
  /** Active providers in ascending id order. */
  listActiveProviders(): Promise<Provider[]>;
  findProvider(id: number): Promise<Provider | undefined>;
  /** The latest insurance or bond record on file, if any. */
  findCredential(
    providerId: number,
    credentialType: CredentialRecord['credentialType']
  ): Promise<CredentialRecord | undefined>;
  /**
   * Appends one log row and, when given, applies the status update in the
   * same transaction.
   */
  recordAttempt(
    attempt: NewVerificationAttempt,
    statusUpdate?: ProviderStatusUpdate
  ): Promise<VerificationAttempt>;
  /** Log rows for a provider in creation order. */
  listAttempts(providerId: number): Promise<VerificationAttempt[]>;
}
