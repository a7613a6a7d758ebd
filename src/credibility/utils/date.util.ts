export function computeAgeHours(
  iso: string,
  now: Date = new Date(),
): number | null {
  if (!iso) {
    return null;
  }
  const parsed = new Date(iso);
  if (Number.isNaN(parsed.getTime())) {
    return null;
  }
  const deltaMs = now.getTime() - parsed.getTime();
  return deltaMs / (1000 * 60 * 60);
}

export function computeAgeDays(
  iso: string,
  now: Date = new Date(),
): number | null {
  const hours = computeAgeHours(iso, now);
  return hours == null ? null : hours / 24;
}
