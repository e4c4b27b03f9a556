/** Fallback minimum sampling interval in seconds (100 Hz). */
export const DEFAULT_SAMPLE_INTERVAL = 0.01;

/**
 * Decide whether a motion observation should be kept.
 *
 * Stateless: the caller owns `lastAcceptedTime` and advances it only when
 * this returns true. `minInterval` must be positive; the session
 * configuration substitutes {@link DEFAULT_SAMPLE_INTERVAL} otherwise.
 */
export function shouldAcceptSample(
  candidateTime: number,
  lastAcceptedTime: number,
  minInterval: number,
): boolean {
  return candidateTime - lastAcceptedTime >= minInterval;
}
