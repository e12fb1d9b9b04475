import { ValidationError } from '../utils/errors'

/**
 * Explicit per-call tenant scope. Every engine and repository call receives one;
 * nothing reads the tenant from ambient state.
 */
export interface TenantContext {
  businessId: string
}

export const requireBusinessId = (ctx: TenantContext): string => {
  const businessId = typeof ctx.businessId === 'string' ? ctx.businessId.trim() : ''
  if (!businessId) {
    throw new ValidationError('business_id is required.')
  }
  return businessId
}
