import type { FilterQuery } from 'mongoose'
import Registration, { IRegistration } from '../models/Registration'
import { requireBusinessId, TenantContext } from '../types/tenant'
import { validateRegistration, validateRegistrationUpdate } from '../validators/registration.schema'
import { hasFields, unwrap } from '../validators/result'
import { ConflictError, isDuplicateKeyError, NotFoundError, ValidationError } from '../utils/errors'
import { normalizePage, Page, PageRequest } from '../utils/pagination'
import { newId } from '../utils/id'
import logger from '../utils/logger'
import { dateRange } from '../utils/dates'

export interface RegistrationFilter {
  campaignIds?: string[]
  adIds?: string[]
  sources?: string[]
  dateFrom?: Date
  dateTo?: Date
}

export interface RegistrationListQuery extends RegistrationFilter, PageRequest {}

const HIDDEN = '-_id -__v'

export const buildRegistrationFilter = (
  businessId: string,
  query: RegistrationFilter,
): FilterQuery<IRegistration> => {
  const filter: FilterQuery<IRegistration> = { business_id: businessId }
  if (query.campaignIds && query.campaignIds.length > 0) {
    filter.campaign_id = { $in: query.campaignIds }
  }
  if (query.adIds && query.adIds.length > 0) {
    filter.ad_id = { $in: query.adIds }
  }
  if (query.sources && query.sources.length > 0) {
    filter.source = { $in: query.sources }
  }
  if (query.dateFrom || query.dateTo) {
    filter.timestamp = dateRange(query.dateFrom, query.dateTo)
  }
  return filter
}

class RegistrationService {
  async create(ctx: TenantContext, data: unknown): Promise<IRegistration> {
    const businessId = requireBusinessId(ctx)
    const payload = unwrap(validateRegistration(data), 'registration')

    try {
      const doc = await Registration.create({
        ...payload,
        registration_id: payload.registration_id ?? newId(),
        business_id: businessId,
      })
      const { _id, ...registration } = doc.toObject({ versionKey: false })
      return registration
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError('Registration with same registration_id already exists.')
      }
      throw error
    }
  }

  async list(ctx: TenantContext, query: RegistrationListQuery = {}): Promise<Page<IRegistration>> {
    const businessId = requireBusinessId(ctx)
    const filter = buildRegistrationFilter(businessId, query)
    const { page, pageSize, skip } = normalizePage(query)
    const [total, items] = await Promise.all([
      Registration.countDocuments(filter),
      Registration.find(filter)
        .sort({ timestamp: -1 })
        .skip(skip)
        .limit(pageSize)
        .select(HIDDEN)
        .lean<IRegistration[]>(),
    ])
    return { items, total, page, pageSize }
  }

  /** Unpaginated, for export. */
  async findAll(ctx: TenantContext, query: RegistrationFilter = {}): Promise<IRegistration[]> {
    const businessId = requireBusinessId(ctx)
    return Registration.find(buildRegistrationFilter(businessId, query))
      .sort({ timestamp: -1 })
      .select(HIDDEN)
      .lean<IRegistration[]>()
  }

  async get(ctx: TenantContext, registrationId: string): Promise<IRegistration> {
    const businessId = requireBusinessId(ctx)
    const registration = await Registration.findOne({
      registration_id: registrationId,
      business_id: businessId,
    })
      .select(HIDDEN)
      .lean<IRegistration>()
    if (!registration) {
      throw new NotFoundError('Registration not found.')
    }
    return registration
  }

  async update(ctx: TenantContext, registrationId: string, patch: unknown): Promise<IRegistration> {
    const businessId = requireBusinessId(ctx)
    const payload = unwrap(validateRegistrationUpdate(patch), 'registration')
    if (!hasFields(payload)) {
      throw new ValidationError('Nothing to update.')
    }

    const registration = await Registration.findOneAndUpdate(
      { registration_id: registrationId, business_id: businessId },
      { $set: payload },
      { new: true, runValidators: true },
    )
      .select(HIDDEN)
      .lean<IRegistration>()
    if (!registration) {
      throw new NotFoundError('Registration not found.')
    }
    logger.info(`[RegistrationService] Updated registration ${registrationId} for ${businessId}`)
    return registration
  }

  async remove(ctx: TenantContext, registrationId: string): Promise<void> {
    const businessId = requireBusinessId(ctx)
    const result = await Registration.deleteOne({
      registration_id: registrationId,
      business_id: businessId,
    })
    if (result.deletedCount === 0) {
      throw new NotFoundError('Registration not found.')
    }
    logger.info(`[RegistrationService] Deleted registration ${registrationId} for ${businessId}`)
  }
}

export default new RegistrationService()
