import { z } from 'zod'
import { dateValue, nonNegativeInt, nonNegativeNumber, optionalRef, requiredText } from './common'
import { validate, ValidationResult } from './result'

const measures = {
  spent: nonNegativeNumber('spent').nullish(),
  messages: nonNegativeInt('messages').nullish(),
  reach: nonNegativeInt('reach').nullish(),
  impressions: nonNegativeInt('impressions').nullish(),
  clicks: nonNegativeInt('clicks').nullish(),
}

const meta = z.record(z.unknown())

export const registrationCreateSchema = z
  .object({
    registration_id: z.string().trim().min(1).optional(),
    campaign_id: requiredText('campaign_id is required.'),
    ad_id: optionalRef,
    user_id: optionalRef,
    source: requiredText('source is required.'),
    cost: nonNegativeNumber('cost').default(0),
    timestamp: dateValue('timestamp'),
    meta: meta.default({}),
    ...measures,
  })
  .strict()

// campaign_id is fixed once recorded
export const registrationUpdateSchema = z
  .object({
    ad_id: optionalRef.optional(),
    user_id: optionalRef.optional(),
    source: requiredText('source is required.').optional(),
    cost: nonNegativeNumber('cost').optional(),
    timestamp: dateValue('timestamp').optional(),
    meta: meta.optional(),
    ...measures,
  })
  .strict()

export type RegistrationCreateInput = z.infer<typeof registrationCreateSchema>
export type RegistrationUpdateInput = z.infer<typeof registrationUpdateSchema>

export const validateRegistration = (input: unknown): ValidationResult<RegistrationCreateInput> =>
  validate(registrationCreateSchema, input)

export const validateRegistrationUpdate = (input: unknown): ValidationResult<RegistrationUpdateInput> =>
  validate(registrationUpdateSchema, input)
