/**
 * Split "2026-02-01 to 2026-02-27" (also "a - b" or "a b") into its two dates.
 * Returns null when fewer than two parts are given.
 */
export function parsePeriod(text: string): { startDate: string; endDate: string } | null {
  const parts = text
    .replace(/\s+to\s+/i, " ")
    .replace(/\s+-\s+/, " ")
    .trim()
    .split(/\s+/)
    .filter((part) => part.length > 0);

  if (parts.length < 2) return null;
  return { startDate: parts[0], endDate: parts[1] };
}
