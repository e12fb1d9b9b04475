import type { FilterQuery } from 'mongoose'
import Campaign, { CampaignStatus, ICampaign } from '../models/Campaign'
import Ad from '../models/Ad'
import Registration from '../models/Registration'
import { requireBusinessId, TenantContext } from '../types/tenant'
import { validateCampaign, validateCampaignUpdate } from '../validators/campaign.schema'
import { hasFields, unwrap } from '../validators/result'
import { ConflictError, isDuplicateKeyError, NotFoundError, ValidationError } from '../utils/errors'
import { normalizePage, Page, PageRequest } from '../utils/pagination'
import { escapeRegex } from '../utils/object'
import { newId } from '../utils/id'
import logger from '../utils/logger'

export interface CampaignListQuery extends PageRequest {
  search?: string
  status?: CampaignStatus
}

export interface OrphanCleanupResult {
  registrations_deleted: number
  ads_deleted: number
}

const HIDDEN = '-_id -__v'

const cleanIds = (ids: unknown): string[] => {
  if (!Array.isArray(ids)) return []
  const values = ids.filter((id): id is string => typeof id === 'string').map((id) => id.trim())
  return Array.from(new Set(values.filter(Boolean)))
}

class CampaignService {
  async create(ctx: TenantContext, data: unknown): Promise<ICampaign> {
    const businessId = requireBusinessId(ctx)
    const payload = unwrap(validateCampaign(data), 'campaign')

    try {
      const doc = await Campaign.create({
        ...payload,
        campaign_id: payload.campaign_id ?? newId(),
        business_id: businessId,
      })
      const { _id, ...campaign } = doc.toObject({ versionKey: false })
      logger.info(`[CampaignService] Created campaign ${campaign.campaign_id} for ${businessId}`)
      return campaign
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError('Campaign with same campaign_id already exists.')
      }
      throw error
    }
  }

  async list(ctx: TenantContext, query: CampaignListQuery = {}): Promise<Page<ICampaign>> {
    const businessId = requireBusinessId(ctx)
    const filter: FilterQuery<ICampaign> = { business_id: businessId }
    if (query.search) {
      filter.name = { $regex: escapeRegex(query.search), $options: 'i' }
    }
    if (query.status) {
      filter.status = query.status
    }

    const { page, pageSize, skip } = normalizePage(query)
    const [total, items] = await Promise.all([
      Campaign.countDocuments(filter),
      Campaign.find(filter).sort({ updated_at: -1 }).skip(skip).limit(pageSize).select(HIDDEN).lean<ICampaign[]>(),
    ])
    return { items, total, page, pageSize }
  }

  async get(ctx: TenantContext, campaignId: string): Promise<ICampaign> {
    const businessId = requireBusinessId(ctx)
    const campaign = await Campaign.findOne({ campaign_id: campaignId, business_id: businessId })
      .select(HIDDEN)
      .lean<ICampaign>()
    if (!campaign) {
      throw new NotFoundError('Campaign not found.')
    }
    return campaign
  }

  async update(ctx: TenantContext, campaignId: string, patch: unknown): Promise<ICampaign> {
    const businessId = requireBusinessId(ctx)
    const payload = unwrap(validateCampaignUpdate(patch), 'campaign')
    if (!hasFields(payload)) {
      throw new ValidationError('Nothing to update.')
    }

    const campaign = await Campaign.findOneAndUpdate(
      { campaign_id: campaignId, business_id: businessId },
      { $set: payload },
      { new: true, runValidators: true },
    )
      .select(HIDDEN)
      .lean<ICampaign>()
    if (!campaign) {
      throw new NotFoundError('Campaign not found.')
    }
    logger.info(`[CampaignService] Updated campaign ${campaignId} for ${businessId}`)
    return campaign
  }

  async remove(ctx: TenantContext, campaignId: string): Promise<void> {
    const businessId = requireBusinessId(ctx)
    const result = await Campaign.deleteOne({ campaign_id: campaignId, business_id: businessId })
    if (result.deletedCount === 0) {
      throw new NotFoundError('Campaign not found.')
    }
    logger.info(`[CampaignService] Deleted campaign ${campaignId} for ${businessId}`)
  }

  /** Deletes every campaign of the business. Registrations are left in place. */
  async removeAll(ctx: TenantContext): Promise<number> {
    const businessId = requireBusinessId(ctx)
    const result = await Campaign.deleteMany({ business_id: businessId })
    logger.warn(`[CampaignService] Deleted all ${result.deletedCount} campaigns for ${businessId}`)
    return result.deletedCount
  }

  /** Attach ads; every id must be an ad of the same business. */
  async attachAds(ctx: TenantContext, campaignId: string, adIds: unknown): Promise<ICampaign> {
    const businessId = requireBusinessId(ctx)
    const ids = cleanIds(adIds)
    if (ids.length === 0) {
      throw new ValidationError('No ads selected.')
    }

    const owned = await Ad.countDocuments({ business_id: businessId, ad_id: { $in: ids } })
    if (owned !== ids.length) {
      throw new NotFoundError('One or more ads do not belong to this business.')
    }

    const campaign = await Campaign.findOneAndUpdate(
      { campaign_id: campaignId, business_id: businessId },
      { $addToSet: { ad_ids: { $each: ids } } },
      { new: true },
    )
      .select(HIDDEN)
      .lean<ICampaign>()
    if (!campaign) {
      throw new NotFoundError('Campaign not found.')
    }
    return campaign
  }

  async detachAds(ctx: TenantContext, campaignId: string, adIds: unknown): Promise<ICampaign> {
    const businessId = requireBusinessId(ctx)
    const ids = cleanIds(adIds)
    if (ids.length === 0) {
      throw new ValidationError('No ads selected.')
    }

    const campaign = await Campaign.findOneAndUpdate(
      { campaign_id: campaignId, business_id: businessId },
      { $pull: { ad_ids: { $in: ids } } },
      { new: true },
    )
      .select(HIDDEN)
      .lean<ICampaign>()
    if (!campaign) {
      throw new NotFoundError('Campaign not found.')
    }
    return campaign
  }

  /** Gives legacy campaigns stored without a campaign_id a fresh one. */
  async backfillIds(ctx: TenantContext): Promise<number> {
    const businessId = requireBusinessId(ctx)
    const missing = await Campaign.find({
      business_id: businessId,
      $or: [{ campaign_id: null }, { campaign_id: { $exists: false } }],
    })
      .select('_id')
      .lean()

    for (const doc of missing) {
      await Campaign.updateOne({ _id: doc._id }, { $set: { campaign_id: newId() } })
    }
    logger.info(`[CampaignService] Backfilled ${missing.length} campaign ids for ${businessId}`)
    return missing.length
  }

  /**
   * Deletes registrations whose campaign no longer exists, then ads that no
   * registration references.
   */
  async cleanupOrphans(ctx: TenantContext): Promise<OrphanCleanupResult> {
    const businessId = requireBusinessId(ctx)

    const live = await Campaign.find({ business_id: businessId }).select('campaign_id').lean<Pick<ICampaign, 'campaign_id'>[]>()
    const liveIds = live.map((campaign) => campaign.campaign_id).filter(Boolean)
    const registrations = await Registration.deleteMany({
      business_id: businessId,
      campaign_id: { $nin: liveIds },
    })

    const used = await Registration.distinct('ad_id', { business_id: businessId })
    const usedAdIds = used.filter((id): id is string => typeof id === 'string')
    const ads = await Ad.deleteMany({ business_id: businessId, ad_id: { $nin: usedAdIds } })

    const result = {
      registrations_deleted: registrations.deletedCount,
      ads_deleted: ads.deletedCount,
    }
    logger.warn(`[CampaignService] Orphan cleanup for ${businessId}: ${JSON.stringify(result)}`)
    return result
  }
}

export default new CampaignService()
