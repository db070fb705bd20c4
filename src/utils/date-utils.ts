/**
 * Date helpers for bucketing tickets by calendar day
 */

/**
 * Jira writes offsets without a colon ("+0000"), which is not ISO 8601
 */
const COMPACT_OFFSET_REGEX = /([+-]\d{2})(\d{2})$/;

/**
 * A date-time ending in its time part, with neither "Z" nor an offset
 */
const NO_ZONE_REGEX = /T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?$/;

/**
 * Parses a Jira timestamp into an absolute instant. Timestamps without a
 * zone are UTC.
 * @returns The instant, or null when the value is missing or unparseable
 */
export function parseJiraTimestamp(raw: unknown): Date | null {
  if (typeof raw !== "string" || raw.trim() === "") {
    return null;
  }

  const trimmed = raw.trim();
  const iso = NO_ZONE_REGEX.test(trimmed)
    ? `${trimmed}Z`
    : trimmed.replace(COMPACT_OFFSET_REGEX, "$1:$2");
  const instant = new Date(iso);

  return Number.isNaN(instant.getTime()) ? null : instant;
}

/**
 * Calendar date of an instant in the process-local timezone, as YYYY-MM-DD
 */
export function toLocalDay(instant: Date): string {
  const year = instant.getFullYear();
  const month = String(instant.getMonth() + 1).padStart(2, "0");
  const day = String(instant.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Short column label for a YYYY-MM-DD day, e.g. "Aug 17"
 */
export function formatDayLabel(day: string): string {
  const [year, month, date] = day.split("-").map(Number);
  return new Date(year, month - 1, date).toLocaleDateString("en-US", {
    month: "short",
    day: "2-digit",
  });
}
