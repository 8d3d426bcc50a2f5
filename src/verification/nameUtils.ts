// Entity suffixes dropped before comparing business names
const ENTITY_SUFFIXES = new Set([
  "llc", "inc", "incorporated", "co", "company", "corp", "corporation",
  "ltd", "lp", "llp", "pllc", "pc"
]);

export const normalizeName = (value: string): string => {
  const tokens = value
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, " ")
    .split(/\s+/)
    .filter(Boolean);
  const significant = tokens.filter((token) => !ENTITY_SUFFIXES.has(token));
  return (significant.length > 0 ? significant : tokens).sort().join(" ");
};

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Token-sort similarity in [0, 1]: case, punctuation, entity suffixes and
 * word order are ignored. 1 means the normalised names are identical.
 */
export function nameSimilarity(a: string, b: string): number {
  const left = normalizeName(a);
  const right = normalizeName(b);
  if (!left || !right) return 0;
  const longest = Math.max(left.length, right.length);
  return 1 - levenshtein(left, right) / longest;
}

export const normalizeLicenseNumber = (value: string): string =>
  value.toUpperCase().replace(/[^A-Z0-9]/g, "");
