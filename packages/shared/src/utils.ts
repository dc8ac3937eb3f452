/**
 * Small helpers shared by the pipeline stages.
 */

/**
 * Recursively freeze a plain object graph.
 */
export function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze<unknown>(child);
    }
  }
  return value;
}

/** Round to 4 decimals so confidences compare and serialize cleanly. */
export function roundConfidence(value: number): number {
  return Math.round(value * 10000) / 10000;
}

export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
