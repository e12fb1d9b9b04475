import mongoose from 'mongoose'

/**
 * Registration - 一条投放事件/线索（含花费、曝光、点击等指标）
 * 指标字段均可缺省，聚合时按 0 处理；spent 缺省时回退到 cost
 */
export interface IRegistration {
  registration_id: string
  business_id: string
  campaign_id: string
  ad_id?: string | null
  user_id?: string | null
  source: string
  cost: number
  spent?: number | null
  messages?: number | null
  reach?: number | null
  impressions?: number | null
  clicks?: number | null
  timestamp: Date
  meta: Record<string, unknown>
  created_at: Date
  updated_at: Date
}

const registrationSchema = new mongoose.Schema<IRegistration>(
  {
    registration_id: { type: String, required: true },
    business_id: { type: String, required: true },
    campaign_id: { type: String, required: true },
    ad_id: { type: String, default: null },
    user_id: { type: String, default: null },
    source: { type: String, required: true },
    cost: { type: Number, min: 0, default: 0 },

    // Metrics
    spent: { type: Number, min: 0 },
    messages: { type: Number, min: 0 },
    reach: { type: Number, min: 0 },
    impressions: { type: Number, min: 0 },
    clicks: { type: Number, min: 0 },

    timestamp: { type: Date, required: true },
    meta: { type: mongoose.Schema.Types.Mixed, default: {} },
  },
  {
    timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' },
    minimize: false,
  },
)

registrationSchema.index(
  { business_id: 1, registration_id: 1 },
  { unique: true, name: 'idx_registrations_business_reg' },
)
registrationSchema.index(
  { business_id: 1, campaign_id: 1, ad_id: 1, timestamp: -1 },
  { name: 'idx_registrations_business_campaign_ad_ts' },
)
// 时间范围查询
registrationSchema.index({ business_id: 1, timestamp: -1 })

export default mongoose.model<IRegistration>('Registration', registrationSchema)
