import { ValidationError } from "../../shared/errors.js"
import { addDays, formatDate, formatDateEnd, startOfDay } from "../../shared/time.js"

export const PERIOD_NAMES = ["today", "yesterday", "week", "month"] as const

export type PeriodName = (typeof PERIOD_NAMES)[number]

export type Period = {
  name: PeriodName
  firstDay: Date
  lastDay: Date
  since: string
  until: string
}

function isPeriodName(value: string): value is PeriodName {
  return PERIOD_NAMES.some((name) => name === value)
}

export function parsePeriodName(value: string): PeriodName {
  const normalised = value.trim().toLowerCase()
  if (!isPeriodName(normalised)) {
    throw new ValidationError(`Invalid period '${value}'. Use: ${PERIOD_NAMES.join(", ")}`, { field: "period" })
  }
  return normalised
}

function bounds(name: PeriodName, today: Date): [Date, Date] {
  switch (name) {
    case "today":
      return [today, today]
    case "yesterday": {
      const yesterday = addDays(today, -1)
      return [yesterday, yesterday]
    }
    case "week": {
      const monday = addDays(today, -((today.getDay() + 6) % 7))
      return [monday, addDays(monday, 6)]
    }
    case "month": {
      const first = new Date(today.getFullYear(), today.getMonth(), 1)
      const last = new Date(today.getFullYear(), today.getMonth() + 1, 0)
      return [first, last]
    }
  }
}

/**
 * Calendar range for a named period, anchored on the local date of `now`.
 * Unknown names are rejected without touching the network.
 */
export function resolvePeriod(value: string, now: Date): Period {
  const name = parsePeriodName(value)
  const [firstDay, lastDay] = bounds(name, startOfDay(now))
  return {
    name,
    firstDay,
    lastDay,
    since: formatDate(firstDay),
    until: formatDateEnd(lastDay)
  }
}
