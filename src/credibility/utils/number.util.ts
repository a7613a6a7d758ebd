export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Rounds half away from zero. Float noise is trimmed to 12 significant
 * digits first so 2.335 and its binary neighbours round the same way.
 */
export function roundHalfAwayFromZero(
  value: number,
  decimals: number,
): number {
  if (!Number.isFinite(value)) {
    return value;
  }
  const sign = value < 0 ? -1 : 1;
  const factor = 10 ** decimals;
  const trimmed = Number(Math.abs(value).toPrecision(12));
  const shifted = Math.round(Number((trimmed * factor).toPrecision(12)));
  const rounded = (sign * shifted) / factor;
  return rounded === 0 ? 0 : rounded;
}

export function mean(values: number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
