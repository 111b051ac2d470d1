const MS_PER_HOUR = 60 * 60 * 1000

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?$/

function pad(value: number, width = 2) {
  return String(value).padStart(width, "0")
}

/** Local calendar date as YYYY-MM-DD. */
export function formatCalendarDate(date: Date) {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
}

/** Start-of-day filter boundary in the shape the entries endpoint expects. */
export function formatDate(date: Date) {
  return `${formatCalendarDate(date)}T00:00:00Z`
}

/** End-of-day filter boundary in the shape the entries endpoint expects. */
export function formatDateEnd(date: Date) {
  return `${formatCalendarDate(date)}T23:59:59Z`
}

export function formatDateTime(date: Date) {
  return `${formatCalendarDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
}

export function startOfDay(date: Date) {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate())
}

export function addDays(date: Date, days: number) {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days)
}

function isCalendarDate(year: number, month: number, day: number) {
  const date = new Date(Date.UTC(year, month - 1, day))
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
}

/** Epoch milliseconds, or undefined when the value is not an ISO 8601 timestamp. */
export function parseTimestamp(value: unknown): number | undefined {
  if (typeof value !== "string") {
    return undefined
  }
  const trimmed = value.trim()
  const match = TIMESTAMP_PATTERN.exec(trimmed)
  if (!match || !isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) {
    return undefined
  }
  const parsed = Date.parse(trimmed.replace(" ", "T"))
  return Number.isNaN(parsed) ? undefined : parsed
}

export function hoursBetween(since: unknown, until: unknown): number | undefined {
  const start = parseTimestamp(since)
  const end = parseTimestamp(until)
  if (start === undefined || end === undefined) {
    return undefined
  }
  return (end - start) / MS_PER_HOUR
}

export function elapsedHours(since: unknown, now: Date): number | undefined {
  const start = parseTimestamp(since)
  if (start === undefined) {
    return undefined
  }
  return (now.getTime() - start) / MS_PER_HOUR
}

export function formatHours(hours: number) {
  return hours.toFixed(2)
}

export function formatUtcMonthDay(epochMs: number) {
  const date = new Date(epochMs)
  return `${pad(date.getUTCMonth() + 1)}/${pad(date.getUTCDate())}`
}

export function formatUtcClock(epochMs: number) {
  const date = new Date(epochMs)
  return `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`
}
