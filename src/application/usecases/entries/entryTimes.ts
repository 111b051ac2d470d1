import { ValidationError } from "../../../shared/errors.js"

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/
const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/

const MS_PER_HOUR = 3_600_000

export type EntryWindow = {
  since: Date
  until: Date
  hours: number
}

function invalid(message: string, field: string): never {
  throw new ValidationError(`Invalid date/time format: ${message}`, { field })
}

/** Local wall-clock instant from a YYYY-MM-DD date and an HH:MM time. */
export function parseLocalDateTime(date: string, time: string, field: string): Date {
  const dateParts = DATE_PATTERN.exec(date.trim())
  if (!dateParts) {
    invalid(`date must be YYYY-MM-DD, received '${date}'`, "date")
  }
  const timeParts = TIME_PATTERN.exec(time.trim())
  if (!timeParts) {
    invalid(`${field} must be HH:MM, received '${time}'`, field)
  }

  const [year, month, day] = dateParts.slice(1).map(Number)
  const [hour, minute] = timeParts.slice(1).map(Number)
  if (hour > 23 || minute > 59) {
    invalid(`${field} must be HH:MM, received '${time}'`, field)
  }

  const value = new Date(year, month - 1, day, hour, minute, 0)
  if (value.getFullYear() !== year || value.getMonth() !== month - 1 || value.getDate() !== day) {
    invalid(`'${date}' is not a calendar date`, "date")
  }
  return value
}

export function parseEntryWindow(date: string, startTime: string, endTime: string): EntryWindow {
  const since = parseLocalDateTime(date, startTime, "start_time")
  const until = parseLocalDateTime(date, endTime, "end_time")
  if (until.getTime() <= since.getTime()) {
    throw new ValidationError("end_time must be after start_time", { field: "end_time" })
  }
  return { since, until, hours: (until.getTime() - since.getTime()) / MS_PER_HOUR }
}
