/**
 * Largest delay `setTimeout` honours. Longer delays fire after 1ms.
 */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Clamp a timeout into the range `setTimeout` accepts
 */
export function boundedTimeout(ms: number): number {
  return Math.min(Math.max(ms, 0), MAX_TIMEOUT_MS);
}
