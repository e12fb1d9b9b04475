import mongoose from 'mongoose'

export const AD_STATUSES = ['active', 'paused', 'archived'] as const
export type AdStatus = (typeof AD_STATUSES)[number]

export interface IAd {
  ad_id: string
  business_id: string
  title: string
  status: AdStatus
  tags: string[]
  creative_url?: string | null
  created_at: Date
  updated_at: Date
}

/**
 * Ad 模型 - 广告素材库条目，按 business_id 隔离
 */
const adSchema = new mongoose.Schema<IAd>(
  {
    ad_id: { type: String, required: true },
    business_id: { type: String, required: true },
    title: { type: String, required: true, trim: true },
    status: { type: String, enum: AD_STATUSES, default: 'active' },
    tags: { type: [String], default: [] },
    creative_url: { type: String, default: null },
  },
  { timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' } },
)

// 索引
adSchema.index({ business_id: 1, ad_id: 1 }, { unique: true, name: 'idx_ads_business_ad' })
adSchema.index(
  { business_id: 1, status: 1, updated_at: -1 },
  { name: 'idx_ads_business_status_updated' },
)

export default mongoose.model<IAd>('Ad', adSchema)
