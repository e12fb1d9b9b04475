import { z } from 'zod'
import { AD_STATUSES } from '../models/Ad'
import { CAMPAIGN_STATUSES } from '../models/Campaign'
import { ENV } from '../config/env'
import { daysAgo, endOfUtcDay, toUtcDate } from '../utils/dates'
import { unwrap, validate } from './result'

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/

/** `?ids=a,b` and `?ids=a&ids=b` both give ['a', 'b']. */
const list = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => {
    if (value === undefined) return undefined
    const items = (Array.isArray(value) ? value : [value])
      .flatMap((item) => item.split(','))
      .map((item) => item.trim())
      .filter(Boolean)
    return items.length > 0 ? items : undefined
  })

const queryDate = (label: string, endOfDay: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') return undefined
      const parsed = toUtcDate(value)
      if (!parsed) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} must be a valid date.` })
        return z.NEVER
      }
      // a bare day as upper bound covers that whole day
      return endOfDay && DATE_ONLY.test(value.trim()) ? endOfUtcDay(parsed) : parsed
    })

const positiveInt = z.coerce.number().int().positive().optional()

const text = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined))

const pageFields = {
  page: positiveInt,
  pageSize: positiveInt,
}

export const analyticsQuerySchema = z.object({
  dateFrom: queryDate('dateFrom', false),
  dateTo: queryDate('dateTo', true),
  campaignIds: list,
  adIds: list,
  sources: list,
  campaignId: text,
  limit: positiveInt,
})

export const registrationQuerySchema = z.object({
  dateFrom: queryDate('dateFrom', false),
  dateTo: queryDate('dateTo', true),
  campaignIds: list,
  adIds: list,
  sources: list,
  ...pageFields,
})

export const adQuerySchema = z.object({
  search: text,
  status: z.enum(AD_STATUSES).optional(),
  tags: list,
  dateFrom: queryDate('dateFrom', false),
  dateTo: queryDate('dateTo', true),
  ...pageFields,
})

export const campaignQuerySchema = z.object({
  search: text,
  status: z.enum(CAMPAIGN_STATUSES).optional(),
  ...pageFields,
})

export const parseQuery = <S extends z.ZodTypeAny>(schema: S, query: unknown): z.infer<S> =>
  unwrap(validate(schema, query), 'query')

/** Analytics windows default to the last DEFAULT_DATE_RANGE_DAYS days. */
export const defaultDateFrom = (now: Date = new Date()): Date => daysAgo(ENV.DEFAULT_DATE_RANGE_DAYS, now)

export const parseAnalyticsQuery = (query: unknown) => {
  const parsed = parseQuery(analyticsQuerySchema, query)
  return {
    filter: {
      dateFrom: parsed.dateFrom ?? defaultDateFrom(),
      dateTo: parsed.dateTo,
      campaignIds: parsed.campaignIds,
      adIds: parsed.adIds,
      sources: parsed.sources,
    },
    campaignId: parsed.campaignId,
    limit: parsed.limit,
  }
}
