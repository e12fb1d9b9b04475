import type { FilterQuery } from 'mongoose'
import Ad, { AdStatus, IAd } from '../models/Ad'
import Campaign, { ICampaign } from '../models/Campaign'
import { requireBusinessId, TenantContext } from '../types/tenant'
import { validateAd, validateAdUpdate } from '../validators/ad.schema'
import { hasFields, unwrap } from '../validators/result'
import { ConflictError, isDuplicateKeyError, NotFoundError, ValidationError } from '../utils/errors'
import { normalizePage, Page, PageRequest } from '../utils/pagination'
import { escapeRegex } from '../utils/object'
import { newId } from '../utils/id'
import logger from '../utils/logger'
import { dateRange } from '../utils/dates'

export interface AdListQuery extends PageRequest {
  search?: string
  status?: AdStatus
  tags?: string[]
  dateFrom?: Date
  dateTo?: Date
}

const HIDDEN = '-_id -__v'

class AdService {
  async create(ctx: TenantContext, data: unknown): Promise<IAd> {
    const businessId = requireBusinessId(ctx)
    const payload = unwrap(validateAd(data), 'ad')

    try {
      const doc = await Ad.create({
        ...payload,
        ad_id: payload.ad_id ?? newId(),
        business_id: businessId,
      })
      const { _id, ...ad } = doc.toObject({ versionKey: false })
      logger.info(`[AdService] Created ad ${ad.ad_id} for ${businessId}`)
      return ad
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError('Ad with same ad_id already exists.')
      }
      throw error
    }
  }

  async list(ctx: TenantContext, query: AdListQuery = {}): Promise<Page<IAd>> {
    const businessId = requireBusinessId(ctx)
    const conditions: FilterQuery<IAd>[] = [{ business_id: businessId }]

    if (query.search) {
      conditions.push({ title: { $regex: escapeRegex(query.search), $options: 'i' } })
    }
    if (query.status) {
      conditions.push({ status: query.status })
    }
    if (query.tags && query.tags.length > 0) {
      conditions.push({ tags: { $all: query.tags } })
    }
    if (query.dateFrom || query.dateTo) {
      const range = dateRange(query.dateFrom, query.dateTo)
      conditions.push({ $or: [{ updated_at: range }, { created_at: range }] })
    }

    const filter: FilterQuery<IAd> = { $and: conditions }
    const { page, pageSize, skip } = normalizePage(query)
    const [total, items] = await Promise.all([
      Ad.countDocuments(filter),
      Ad.find(filter).sort({ updated_at: -1 }).skip(skip).limit(pageSize).select(HIDDEN).lean<IAd[]>(),
    ])
    return { items, total, page, pageSize }
  }

  async get(ctx: TenantContext, adId: string): Promise<IAd> {
    const businessId = requireBusinessId(ctx)
    const ad = await Ad.findOne({ ad_id: adId, business_id: businessId }).select(HIDDEN).lean<IAd>()
    if (!ad) {
      throw new NotFoundError('Ad not found.')
    }
    return ad
  }

  async update(ctx: TenantContext, adId: string, patch: unknown): Promise<IAd> {
    const businessId = requireBusinessId(ctx)
    const payload = unwrap(validateAdUpdate(patch), 'ad')
    if (!hasFields(payload)) {
      throw new ValidationError('Nothing to update.')
    }

    const ad = await Ad.findOneAndUpdate(
      { ad_id: adId, business_id: businessId },
      { $set: payload },
      { new: true, runValidators: true },
    )
      .select(HIDDEN)
      .lean<IAd>()
    if (!ad) {
      throw new NotFoundError('Ad not found.')
    }
    logger.info(`[AdService] Updated ad ${adId} for ${businessId}`)
    return ad
  }

  async remove(ctx: TenantContext, adId: string): Promise<void> {
    const businessId = requireBusinessId(ctx)
    const result = await Ad.deleteOne({ ad_id: adId, business_id: businessId })
    if (result.deletedCount === 0) {
      throw new NotFoundError('Ad not found.')
    }
    logger.info(`[AdService] Deleted ad ${adId} for ${businessId}`)
  }

  /** Campaigns of this business that have the ad attached. */
  async campaignsUsingAd(ctx: TenantContext, adId: string): Promise<ICampaign[]> {
    const businessId = requireBusinessId(ctx)
    return Campaign.find({ business_id: businessId, ad_ids: adId }).select(HIDDEN).lean<ICampaign[]>()
  }
}

export default new AdService()
