import { ProviderStore } from "../store/ProviderStore";
import { CredentialRecord, Provider, VerificationAttempt } from "../types";
import { log } from "../utils/logger";
import { isExpiredOn } from "./classifier";

export type CheckedCredential = CredentialRecord["credentialType"];

export const CHECKED_CREDENTIALS: readonly CheckedCredential[] = ["insurance", "bond"];

export interface CredentialCheck {
  credentialType: CheckedCredential;
  outcome: "verified" | "expired" | "not-found";
  expirationDate: string | null;
  attempt: VerificationAttempt;
}

export interface CredentialCheckerOptions {
  store: ProviderStore;
  now?: () => Date;
}

/**
 * Expiry checks for the insurance and bond records a provider keeps on file.
 * No external lookup is involved. Each check appends one log row tagged with
 * its credential type and never changes the provider's license status.
 */
export class CredentialChecker {
  private readonly store: ProviderStore;
  private readonly now: () => Date;

  constructor(options: CredentialCheckerOptions) {
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
  }

  async check(provider: Provider, credentialType: CheckedCredential): Promise<CredentialCheck> {
    const asOf = this.now();
    const record = await this.store.findCredential(provider.id, credentialType);
    const expirationDate = record?.expirationDate ?? null;
    const outcome = !record ? "not-found" : isExpiredOn(expirationDate, asOf) ? "expired" : "verified";

    const attempt = await this.store.recordAttempt({
      providerId: provider.id,
      trade: provider.trade,
      credentialType,
      createdAt: asOf.toISOString(),
      outcome,
      errorKind: null,
      errorDetail: null,
      retryCount: 0,
      rawResponse: null,
      licenseRecord: null,
      operatorAttention: false
    });

    log({
      stage: "credential_check",
      level: outcome === "verified" ? "info" : "warn",
      provider_id: provider.id,
      credential_type: credentialType,
      outcome,
      expiration_date: expirationDate
    });

    return { credentialType, outcome, expirationDate, attempt };
  }

  async checkAll(provider: Provider): Promise<CredentialCheck[]> {
    const checks: CredentialCheck[] = [];
    for (const credentialType of CHECKED_CREDENTIALS) {
      checks.push(await this.check(provider, credentialType));
    }
    return checks;
  }
}
