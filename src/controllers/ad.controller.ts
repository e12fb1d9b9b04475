import { Request, Response, NextFunction } from 'express'
import adService from '../services/ad.service'
import { getTenantContext } from '../middlewares/auth'
import { adQuerySchema, parseQuery } from '../validators/query.schema'

/**
 * 广告管理控制器
 */

export const listAds = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const query = parseQuery(adQuerySchema, req.query)
    const page = await adService.list(getTenantContext(req), query)
    res.json({ success: true, data: page })
  } catch (error) {
    next(error)
  }
}

export const getAd = async (req: Request<{ adId: string }>, res: Response, next: NextFunction) => {
  try {
    const ad = await adService.get(getTenantContext(req), req.params.adId)
    res.json({ success: true, data: ad })
  } catch (error) {
    next(error)
  }
}

export const createAd = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const ad = await adService.create(getTenantContext(req), req.body)
    res.status(201).json({ success: true, data: ad })
  } catch (error) {
    next(error)
  }
}

export const updateAd = async (req: Request<{ adId: string }>, res: Response, next: NextFunction) => {
  try {
    const ad = await adService.update(getTenantContext(req), req.params.adId, req.body)
    res.json({ success: true, data: ad })
  } catch (error) {
    next(error)
  }
}

export const deleteAd = async (req: Request<{ adId: string }>, res: Response, next: NextFunction) => {
  try {
    await adService.remove(getTenantContext(req), req.params.adId)
    res.json({ success: true, message: 'Ad deleted' })
  } catch (error) {
    next(error)
  }
}

// 使用该广告的活动
export const getAdCampaigns = async (req: Request<{ adId: string }>, res: Response, next: NextFunction) => {
  try {
    const campaigns = await adService.campaignsUsingAd(getTenantContext(req), req.params.adId)
    res.json({ success: true, data: campaigns })
  } catch (error) {
    next(error)
  }
}
