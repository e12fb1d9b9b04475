import { Request, Response, NextFunction } from 'express'
import { verifyToken, JwtPayload } from '../utils/jwt'
import { UnauthorizedError } from '../utils/errors'
import type { TenantContext } from '../types/tenant'

// 扩展 Express Request 类型，添加 tenant 属性
declare global {
  namespace Express {
    interface Request {
      tenant?: JwtPayload
    }
  }
}

/**
 * 认证中间件 - 校验 Bearer token，并把租户挂到 req.tenant
 */
export const authenticate = (req: Request, _res: Response, next: NextFunction): void => {
  const authHeader = req.headers.authorization
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    next(new UnauthorizedError('Missing bearer token'))
    return
  }

  try {
    req.tenant = verifyToken(authHeader.substring(7))
    next()
  } catch (error) {
    next(error)
  }
}

/**
 * Tenant scope for service calls. Only valid behind `authenticate`.
 */
export const getTenantContext = (req: Request): TenantContext => {
  if (!req.tenant) {
    throw new UnauthorizedError()
  }
  return { businessId: req.tenant.businessId }
}
