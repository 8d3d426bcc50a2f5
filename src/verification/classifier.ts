import { LicenseRecord, VerificationOutcome } from "../types";

/**
 * True when `expirationDate` (YYYY-MM-DD) falls before the UTC calendar day of
 * `asOf`. Something expiring today is still valid; a missing date never
 * expires.
 */
export function isExpiredOn(expirationDate: string | null, asOf: Date): boolean {
  if (Number.isNaN(asOf.getTime())) {
    throw new RangeError("asOf is not a valid date");
  }
  if (expirationDate === null) return false;
  const expiresOn = Date.parse(`${expirationDate}T00:00:00Z`);
  if (Number.isNaN(expiresOn)) {
    throw new RangeError(`Invalid expiration date: "${expirationDate}"`);
  }
  const today = new Date(0);
  today.setUTCFullYear(asOf.getUTCFullYear(), asOf.getUTCMonth(), asOf.getUTCDate());
  return expiresOn < today.getTime();
}

/**
 * Maps the matched record (or its absence) to an outcome as of a date.
 * Revocation wins over expiry. A search summary whose detail page was never
 * read carries status "unknown" and confirms nothing.
 */
export function classify(matched: LicenseRecord | null, asOf: Date): VerificationOutcome {
  if (Number.isNaN(asOf.getTime())) {
    throw new RangeError("asOf is not a valid date");
  }
  if (!matched) return "not-found";
  if (matched.status === "revoked") return "mismatch";
  if (matched.status === "not-found" || matched.status === "unknown") return "not-found";
  if (matched.status === "expired") return "expired";
  return isExpiredOn(matched.expirationDate, asOf) ? "expired" : "verified";
}
