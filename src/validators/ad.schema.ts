import { z } from 'zod'
import { AD_STATUSES } from '../models/Ad'
import { requiredText, stringList } from './common'
import { validate, ValidationResult } from './result'

const creativeUrl = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? null : value),
  z.string().trim().url('creative_url must be a valid URL.').nullish(),
)

const adStatus = z.enum(AD_STATUSES, {
  errorMap: () => ({ message: `Status must be one of ${AD_STATUSES.join(', ')}.` }),
})

export const adCreateSchema = z
  .object({
    ad_id: z.string().trim().min(1).optional(),
    title: requiredText('Title is required.'),
    status: adStatus.default('active'),
    creative_url: creativeUrl,
    tags: stringList,
  })
  .strict()

export const adUpdateSchema = z
  .object({
    title: requiredText('Title is required.').optional(),
    status: adStatus.optional(),
    creative_url: creativeUrl,
    tags: z.array(z.string()).transform((tags) => tags.map((tag) => tag.trim()).filter(Boolean)).optional(),
  })
  .strict()

export type AdCreateInput = z.infer<typeof adCreateSchema>
export type AdUpdateInput = z.infer<typeof adUpdateSchema>

export const validateAd = (input: unknown): ValidationResult<AdCreateInput> =>
  validate(adCreateSchema, input)

export const validateAdUpdate = (input: unknown): ValidationResult<AdUpdateInput> =>
  validate(adUpdateSchema, input)
