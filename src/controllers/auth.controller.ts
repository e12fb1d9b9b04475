import { Request, Response, NextFunction } from 'express'
import { z } from 'zod'
import authService from '../services/auth.service'
import { getTenantContext } from '../middlewares/auth'
import { unwrap, validate } from '../validators/result'

const loginSchema = z.object({
  business_id: z.string().trim().min(1, 'Business is required.'),
  password: z.string().min(1, 'Password is required.'),
})

class AuthController {
  /**
   * POST /api/auth/login
   * 租户登录
   */
  async login(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { business_id, password } = unwrap(validate(loginSchema, req.body), 'login')
      const result = await authService.login({ businessId: business_id, password })
      res.json({ success: true, data: result })
    } catch (error) {
      next(error)
    }
  }

  /**
   * POST /api/auth/logout
   * 登出（前端删除 token）
   */
  async logout(_req: Request, res: Response): Promise<void> {
    res.json({ success: true, message: 'Logged out' })
  }

  /**
   * GET /api/auth/me
   */
  async getCurrentBusiness(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { businessId } = getTenantContext(req)
      const business = await authService.getBusiness(businessId)
      res.json({ success: true, data: business })
    } catch (error) {
      next(error)
    }
  }

  /**
   * GET /api/auth/businesses
   * 登录页的租户列表
   */
  async listBusinesses(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const businesses = await authService.listBusinesses()
      res.json({ success: true, data: businesses })
    } catch (error) {
      next(error)
    }
  }
}

export default new AuthController()
