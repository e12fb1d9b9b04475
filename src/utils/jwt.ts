import jwt from 'jsonwebtoken'
import { ENV } from '../config/env'
import { UnauthorizedError } from './errors'

export interface JwtPayload {
  businessId: string
  name: string
}

/**
 * 生成 JWT Token
 */
export const generateToken = (business: { business_id: string; name: string }): string => {
  const payload: JwtPayload = {
    businessId: business.business_id,
    name: business.name,
  }

  return jwt.sign(payload, ENV.JWT_SECRET, {
    expiresIn: ENV.JWT_EXPIRES_IN,
  } as jwt.SignOptions)
}

/**
 * 验证 JWT Token
 */
export const verifyToken = (token: string): JwtPayload => {
  let decoded: string | jwt.JwtPayload
  try {
    decoded = jwt.verify(token, ENV.JWT_SECRET)
  } catch {
    throw new UnauthorizedError('Invalid or expired token')
  }

  if (
    typeof decoded === 'string' ||
    typeof decoded.businessId !== 'string' ||
    typeof decoded.name !== 'string'
  ) {
    throw new UnauthorizedError('Invalid or expired token')
  }

  return { businessId: decoded.businessId, name: decoded.name }
}
