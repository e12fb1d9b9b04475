import { z } from 'zod'
import { toUtcDate } from '../utils/dates'

export const requiredText = (message: string) => z.string({ required_error: message }).trim().min(1, message)

/** Optional reference id; blank strings are stored as null. */
export const optionalRef = z
  .string()
  .trim()
  .nullish()
  .transform((value) => (value ? value : null))

export const stringList = z
  .array(z.string())
  .nullish()
  .transform((values) => (values ?? []).map((value) => value.trim()).filter(Boolean))

export const dateValue = (label: string) =>
  z.preprocess(
    (value) => (value === null || value === undefined ? value : (toUtcDate(value) ?? value)),
    z.date({
      required_error: `${label} is required.`,
      invalid_type_error: `${label} must be a valid date.`,
    }),
  )

export const nonNegativeNumber = (label: string) =>
  z.number({ invalid_type_error: `${label} must be a number.` }).nonnegative(`${label} must be non-negative.`)

export const nonNegativeInt = (label: string) =>
  nonNegativeNumber(label).int(`${label} must be an integer.`)
