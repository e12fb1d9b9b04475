import dayjs from 'dayjs'
import utc from 'dayjs/plugin/utc'
import customParseFormat from 'dayjs/plugin/customParseFormat'

dayjs.extend(utc)
dayjs.extend(customParseFormat)

export const DAY_FORMAT = 'YYYY-MM-DD'

// YYYY-MM-DD, optionally followed by T or space, HH:mm[:ss[.fff]] and Z or an offset
const ISO_8601 =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/

const inRange = (value: string | undefined, max: number): boolean =>
  value === undefined || Number(value) <= max

/**
 * Parse a timestamp the way the importer and API accept it: ISO-8601 only,
 * checked strictly so that impossible dates such as `2024-02-30` are rejected
 * instead of rolling over. Strings without an offset are read as UTC; returns
 * undefined when the value is not a valid date.
 */
export const toUtcDate = (value: unknown): Date | undefined => {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value
  }
  if (typeof value !== 'string') return undefined

  const text = value.trim()
  const match = ISO_8601.exec(text)
  if (!match) return undefined

  const [, day, hours, minutes, seconds, offset] = match
  if (!dayjs.utc(day, DAY_FORMAT, true).isValid()) return undefined
  if (!inRange(hours, 23) || !inRange(minutes, 59) || !inRange(seconds, 59)) return undefined

  const normalized = text.replace(' ', 'T')
  const parsed = offset ? dayjs(normalized).utc() : dayjs.utc(normalized)
  return parsed.isValid() ? parsed.toDate() : undefined
}

/** Calendar day of a timestamp in UTC, e.g. `2024-03-01`. */
export const utcDayKey = (value: Date): string => dayjs.utc(value).format(DAY_FORMAT)

export const startOfUtcDay = (value: Date): Date => dayjs.utc(value).startOf('day').toDate()

export const endOfUtcDay = (value: Date): Date => dayjs.utc(value).endOf('day').toDate()

export const daysAgo = (days: number, now: Date = new Date()): Date =>
  dayjs.utc(now).subtract(days, 'day').startOf('day').toDate()

/** Mongo range where either bound may be given alone. */
export const dateRange = (from?: Date, to?: Date): { $gte?: Date; $lte?: Date } => {
  const range: { $gte?: Date; $lte?: Date } = {}
  if (from) range.$gte = from
  if (to) range.$lte = to
  return range
}

export default dayjs
