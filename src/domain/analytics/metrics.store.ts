import type { FilterQuery } from 'mongoose'
import Registration, { IRegistration } from '../../models/Registration'
import Campaign from '../../models/Campaign'
import Ad from '../../models/Ad'
import type { AdRef, CampaignRef, MetricsStore, RegistrationFacts, RegistrationQuery } from './metrics.types'

const FACT_FIELDS =
  'campaign_id ad_id user_id source timestamp cost spent messages reach impressions clicks'

/**
 * Mongo match for the filter contract. Optional sets only constrain when
 * non-empty; an empty list means "no filter", never "match nothing".
 */
export const buildRegistrationMatch = (query: RegistrationQuery): FilterQuery<IRegistration> => {
  const timestamp: { $gte: Date; $lte?: Date } = { $gte: query.dateFrom }
  if (query.dateTo) timestamp.$lte = query.dateTo

  const match: FilterQuery<IRegistration> = {
    business_id: query.businessId,
    timestamp,
  }

  if (query.campaignIds && query.campaignIds.length > 0) {
    match.campaign_id = { $in: query.campaignIds }
  }
  if (query.adIds && query.adIds.length > 0) {
    match.ad_id = { $in: query.adIds }
  } else if (query.withAdOnly) {
    match.ad_id = { $ne: null }
  }
  if (query.sources && query.sources.length > 0) {
    match.source = { $in: query.sources }
  }

  return match
}

export const mongoMetricsStore: MetricsStore = {
  async findRegistrations(query: RegistrationQuery): Promise<RegistrationFacts[]> {
    return Registration.find(buildRegistrationMatch(query))
      .sort({ timestamp: 1, _id: 1 })
      .select(FACT_FIELDS)
      .lean<RegistrationFacts[]>()
  },

  // Joins are always keyed by id AND business_id
  async findCampaigns(businessId: string, campaignIds: string[]): Promise<CampaignRef[]> {
    if (campaignIds.length === 0) return []
    return Campaign.find({ business_id: businessId, campaign_id: { $in: campaignIds } })
      .select('campaign_id name status')
      .lean<CampaignRef[]>()
  },

  async findAds(businessId: string, adIds: string[]): Promise<AdRef[]> {
    if (adIds.length === 0) return []
    return Ad.find({ business_id: businessId, ad_id: { $in: adIds } })
      .select('ad_id title status tags')
      .lean<AdRef[]>()
  },

  async listCampaignIds(businessId: string): Promise<string[]> {
    const campaigns = await Campaign.find({ business_id: businessId })
      .select('campaign_id')
      .lean<Pick<CampaignRef, 'campaign_id'>[]>()
    return campaigns.map((campaign) => campaign.campaign_id).filter(Boolean)
  },
}
