import { LicenseRecord, ProviderIdentity } from "../types";
import { nameSimilarity, normalizeLicenseNumber } from "./nameUtils";

export const DEFAULT_NAME_THRESHOLD = 0.75;

export interface MatchOptions {
  threshold?: number;
}

interface ScoredCandidate {
  record: LicenseRecord;
  score: number;
  specialtyMatch: boolean;
  order: number;
}

/**
 * Picks the candidate that plausibly belongs to the claimed identity.
 *
 * With a claimed license number only exact number matches are eligible and
 * names are not consulted. Without one, holder names are compared with
 * {@link nameSimilarity} and must reach the threshold. Among eligible
 * candidates: best score, then a matching trade specialty, then the latest
 * expiration date, then source order.
 *
 * Pulls the whole candidate sequence, so a ParseError from a lazy parser
 * surfaces here.
 */
export function match(
  candidates: Iterable<LicenseRecord>,
  claimed: ProviderIdentity,
  options: MatchOptions = {}
): LicenseRecord | null {
  const threshold = options.threshold ?? DEFAULT_NAME_THRESHOLD;
  const claimedNumber = normalizeLicenseNumber(claimed.licenseNumber ?? "");
  const specialties = new Set(claimed.specialties.map((s) => s.trim().toLowerCase()));

  const eligible: ScoredCandidate[] = [];
  let order = 0;
  for (const record of candidates) {
    const score = claimedNumber
      ? normalizeLicenseNumber(record.licenseNumber) === claimedNumber ? 1 : 0
      : nameSimilarity(record.holderName, claimed.name);
    const accepted = claimedNumber ? score === 1 : score >= threshold;
    if (accepted) {
      eligible.push({
        record,
        score,
        specialtyMatch: record.specialties.some((s) => specialties.has(s.trim().toLowerCase())),
        order
      });
    }
    order++;
  }

  eligible.sort(compareCandidates);
  return eligible[0]?.record ?? null;
}

function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.specialtyMatch !== b.specialtyMatch) return a.specialtyMatch ? -1 : 1;
  const byExpiration = compareExpiration(b.record.expirationDate, a.record.expirationDate);
  if (byExpiration !== 0) return byExpiration;
  return a.order - b.order;
}

// Ascending by date; a missing date sorts before any date
function compareExpiration(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a < b ? -1 : 1;
}
