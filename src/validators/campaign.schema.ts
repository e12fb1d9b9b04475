import { z } from 'zod'
import { CAMPAIGN_STATUSES } from '../models/Campaign'
import { dateValue, nonNegativeNumber, requiredText, stringList } from './common'
import { validate, ValidationResult } from './result'

export const targetingSchema = z
  .object({
    locations: stringList,
    interests: stringList,
    devices: stringList,
    budget_daily: nonNegativeNumber('Budget').nullish(),
    start_date: dateValue('start_date').nullish(),
    end_date: dateValue('end_date').nullish(),
  })
  .strict()
  .refine((targeting) => !(targeting.start_date && targeting.end_date && targeting.start_date > targeting.end_date), {
    message: 'End date must be after start date.',
    path: ['end_date'],
  })

const campaignStatus = z.enum(CAMPAIGN_STATUSES, {
  errorMap: () => ({ message: `Status must be one of ${CAMPAIGN_STATUSES.join(', ')}.` }),
})

export const campaignCreateSchema = z
  .object({
    campaign_id: z.string().trim().min(1).optional(),
    name: requiredText('Campaign name is required.'),
    status: campaignStatus.default('draft'),
    ad_ids: stringList,
    targeting: targetingSchema.default({}),
    business_type: requiredText('business_type is required.').default('wedding_decor'),
  })
  .strict()

export const campaignUpdateSchema = z
  .object({
    name: requiredText('Campaign name is required.').optional(),
    status: campaignStatus.optional(),
    ad_ids: z.array(z.string()).transform((ids) => ids.map((id) => id.trim()).filter(Boolean)).optional(),
    targeting: targetingSchema.optional(),
    business_type: requiredText('business_type cannot be blank.').optional(),
  })
  .strict()

export type TargetingInput = z.infer<typeof targetingSchema>
export type CampaignCreateInput = z.infer<typeof campaignCreateSchema>
export type CampaignUpdateInput = z.infer<typeof campaignUpdateSchema>

export const validateCampaign = (input: unknown): ValidationResult<CampaignCreateInput> =>
  validate(campaignCreateSchema, input)

export const validateCampaignUpdate = (input: unknown): ValidationResult<CampaignUpdateInput> =>
  validate(campaignUpdateSchema, input)
