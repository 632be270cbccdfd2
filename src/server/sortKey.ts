// Sort keys for spdlog-style lines: "[2024-05-01 12:00:00.123] [info] message"

export type SortKeyExtractor = (line: string) => number | null

const TIMESTAMP_PREFIX_PATTERN =
  /^\[(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?\]/

/**
 * Milliseconds since the epoch for the bracketed timestamp that starts the
 * line, or null when the line has none. Fields are read as UTC so ordering
 * does not depend on the host time zone.
 */
export function extractSortKey(line: string): number | null {
  const match = TIMESTAMP_PREFIX_PATTERN.exec(line)
  if (!match) {
    return null
  }

  const [, yearRaw, monthRaw, dayRaw, hourRaw, minuteRaw, secondRaw, fractionRaw] = match
  const year = Number(yearRaw)
  const month = Number(monthRaw)
  const day = Number(dayRaw)
  const hour = Number(hourRaw)
  const minute = Number(minuteRaw)
  const second = Number(secondRaw)
  const millis = fractionRaw ? Number(fractionRaw.padEnd(3, '0').slice(0, 3)) : 0

  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
    return null
  }

  const date = new Date(0)
  date.setUTCFullYear(year, month - 1, day)
  date.setUTCHours(hour, minute, second, millis)
  // Rejects days past the end of the month (2024-02-30 rolls over into March)
  if (date.getUTCDate() !== day) {
    return null
  }
  return date.getTime()
}
