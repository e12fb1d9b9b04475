import Business, { comparePassword, hashPassword, IBusiness } from '../models/Business'
import { generateToken } from '../utils/jwt'
import { ConflictError, isDuplicateKeyError, NotFoundError, UnauthorizedError, ValidationError } from '../utils/errors'
import logger from '../utils/logger'

export interface LoginCredentials {
  businessId: string
  password: string
}

export interface BusinessProfile {
  business_id: string
  name: string
}

export interface AuthResponse {
  business: BusinessProfile
  token: string
}

export interface BusinessSeed {
  businessId: string
  name: string
  password: string
}

class AuthService {
  /**
   * 租户登录
   */
  async login(credentials: LoginCredentials): Promise<AuthResponse> {
    const businessId = credentials.businessId.trim()
    const business = await Business.findOne({ business_id: businessId }).lean<IBusiness>()

    // Same message for unknown business and wrong password
    if (!business || !(await comparePassword(credentials.password, business.password_hash))) {
      throw new UnauthorizedError('Invalid business or password.')
    }

    const profile = { business_id: business.business_id, name: business.name }
    logger.info(`Business ${businessId} logged in successfully`)

    return { business: profile, token: generateToken(profile) }
  }

  /** Tenants offered on the login screen. */
  async listBusinesses(): Promise<BusinessProfile[]> {
    return Business.find({}).select('-_id business_id name').sort({ name: 1 }).lean<BusinessProfile[]>()
  }

  async getBusiness(businessId: string): Promise<BusinessProfile> {
    const business = await Business.findOne({ business_id: businessId })
      .select('-_id business_id name')
      .lean<BusinessProfile>()
    if (!business) {
      throw new NotFoundError('Business not found.')
    }
    return business
  }

  async createBusiness(seed: BusinessSeed): Promise<BusinessProfile> {
    const businessId = seed.businessId.trim()
    const name = seed.name.trim()
    if (!businessId || !name || !seed.password) {
      throw new ValidationError('business_id, name and password are required.')
    }

    try {
      await Business.create({
        business_id: businessId,
        name,
        password_hash: await hashPassword(seed.password),
      })
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError('Business already exists.')
      }
      throw error
    }

    logger.info(`Business ${businessId} created successfully`)
    return { business_id: businessId, name }
  }
}

export default new AuthService()
