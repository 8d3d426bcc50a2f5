export type Trade = "painter" | "roofer";

// "unknown": a search summary row, not yet confirmed against its detail page
export type LicenseStatus = "active" | "expired" | "revoked" | "not-found" | "unknown";

export interface LicenseRecord {
  holderName: string;
  licenseNumber: string;
  licenseClass: string;         // DPOR "Rank", e.g. "Class A"
  status: LicenseStatus;
  rawStatus: string;            // status text as shown by the source, "" when absent
  expirationDate: string | null; // YYYY-MM-DD
  specialties: string[];        // e.g. ["Painting and Wallcovering"]
  firmType: string;
  address: string;
}

export type ProviderStatus =
  | "unverified"
  | "verified"
  | "expired"
  | "mismatch"
  | "not-found";

export interface Provider {
  id: number;
  trade: string;                // owned by the directory, may name a trade we cannot look up yet
  claimedLicenseNumber: string | null;
  claimedName: string;          // legal or business name
  tradeSpecialties: string[];
  status: ProviderStatus;
  lastVerifiedAt: string | null; // ISO timestamp
  active: boolean;
}

export interface ProviderIdentity {
  licenseNumber?: string | null;
  name: string;
  specialties: string[];
}

export interface QueryFields {
  licenseNumber?: string | null;
  holderName?: string | null;
}

export type VerificationOutcome =
  | "verified"
  | "expired"
  | "mismatch"
  | "not-found"
  | "transient-failure";

export type TerminalOutcome =
  | Exclude<VerificationOutcome, "transient-failure">
  | "lookup-error";

export type VerificationState =
  | "pending"
  | "querying"
  | "parsing"
  | "matching"
  | "classifying"
  | "terminal";

export type LookupErrorKind =
  | "network"
  | "timeout"
  | "upstream"
  | "parse"
  | "invalid-query"
  | "unknown-trade"
  | "retry-exhausted";

export type CredentialType = "license" | "insurance" | "bond";

/** Insurance or bond on file for a provider; only the expiry is checked. */
export interface CredentialRecord {
  providerId: number;
  credentialType: Exclude<CredentialType, "license">;
  reference: string;            // policy or bond number
  expirationDate: string | null; // YYYY-MM-DD
}

export interface NewVerificationAttempt {
  providerId: number;
  trade: string;
  credentialType: CredentialType;
  createdAt: string;
  outcome: TerminalOutcome;
  errorKind: LookupErrorKind | null;
  errorDetail: string | null;
  retryCount: number;
  rawResponse: string | null;   // truncated snapshot for audit
  licenseRecord: LicenseRecord | null;
  operatorAttention: boolean;
}

export interface VerificationAttempt extends NewVerificationAttempt {
  id: number;
}

export interface ProviderStatusUpdate {
  status: Exclude<ProviderStatus, "unverified">;
  lastVerifiedAt: string;
}

export type PublicStatus = "verified" | "expired" | "unverified";

export function toPublicStatus(status: ProviderStatus): PublicStatus {
  if (status === "verified") return "verified";
  if (status === "expired") return "expired";
  return "unverified";
}
