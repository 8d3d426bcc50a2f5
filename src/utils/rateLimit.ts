import Bottleneck from "bottleneck";

/**
 * One request at a time, and at least `minTime` ms between request starts.
 * Shared by every lookup in the process so retries are spaced too.
 */
export function createLimiter(minTime = 1200): Bottleneck {
  return new Bottleneck({
    minTime,
    maxConcurrent: 1
  });
}
