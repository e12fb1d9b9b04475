import mongoose from 'mongoose'

export const CAMPAIGN_STATUSES = ['draft', 'active', 'paused', 'completed'] as const
export type CampaignStatus = (typeof CAMPAIGN_STATUSES)[number]

export interface ITargeting {
  locations: string[]
  interests: string[]
  devices: string[]
  budget_daily?: number | null
  start_date?: Date | null // flight window
  end_date?: Date | null
}

export interface ICampaign {
  campaign_id: string
  business_id: string
  name: string
  status: CampaignStatus
  ad_ids: string[]
  targeting: ITargeting
  business_type: string
  created_at: Date
  updated_at: Date
}

const targetingSchema = new mongoose.Schema<ITargeting>(
  {
    locations: { type: [String], default: [] },
    interests: { type: [String], default: [] },
    devices: { type: [String], default: [] },
    budget_daily: { type: Number, min: 0, default: null },
    start_date: { type: Date, default: null },
    end_date: { type: Date, default: null },
  },
  { _id: false },
)

const campaignSchema = new mongoose.Schema<ICampaign>(
  {
    campaign_id: { type: String, required: true },
    business_id: { type: String, required: true },
    name: { type: String, required: true, trim: true },
    status: { type: String, enum: CAMPAIGN_STATUSES, default: 'draft' },
    ad_ids: { type: [String], default: [] },
    targeting: { type: targetingSchema, default: () => ({}) },
    business_type: { type: String, default: 'wedding_decor' },
  },
  { timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' } },
)

campaignSchema.index(
  { business_id: 1, campaign_id: 1 },
  { unique: true, name: 'idx_campaigns_business_campaign' },
)
campaignSchema.index(
  { business_id: 1, status: 1, updated_at: -1 },
  { name: 'idx_campaigns_business_status_updated' },
)
// 反查「哪些 campaign 挂了这个 ad」
campaignSchema.index({ business_id: 1, ad_ids: 1 })

export default mongoose.model<ICampaign>('Campaign', campaignSchema)
