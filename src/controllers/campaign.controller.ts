import { Request, Response, NextFunction } from 'express'
import campaignService from '../services/campaign.service'
import { getTenantContext } from '../middlewares/auth'
import { campaignQuerySchema, parseQuery } from '../validators/query.schema'

type CampaignParams = { campaignId: string }

// Body is `{ ad_ids: [...] }`
const adIdsOf = (body: unknown): unknown =>
  typeof body === 'object' && body !== null && 'ad_ids' in body ? body.ad_ids : undefined

export const listCampaigns = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const query = parseQuery(campaignQuerySchema, req.query)
    const page = await campaignService.list(getTenantContext(req), query)
    res.json({ success: true, data: page })
  } catch (error) {
    next(error)
  }
}

export const getCampaign = async (req: Request<CampaignParams>, res: Response, next: NextFunction) => {
  try {
    const campaign = await campaignService.get(getTenantContext(req), req.params.campaignId)
    res.json({ success: true, data: campaign })
  } catch (error) {
    next(error)
  }
}

export const createCampaign = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const campaign = await campaignService.create(getTenantContext(req), req.body)
    res.status(201).json({ success: true, data: campaign })
  } catch (error) {
    next(error)
  }
}

export const updateCampaign = async (req: Request<CampaignParams>, res: Response, next: NextFunction) => {
  try {
    const campaign = await campaignService.update(getTenantContext(req), req.params.campaignId, req.body)
    res.json({ success: true, data: campaign })
  } catch (error) {
    next(error)
  }
}

export const deleteCampaign = async (req: Request<CampaignParams>, res: Response, next: NextFunction) => {
  try {
    await campaignService.remove(getTenantContext(req), req.params.campaignId)
    res.json({ success: true, message: 'Campaign deleted' })
  } catch (error) {
    next(error)
  }
}

export const deleteAllCampaigns = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const deleted = await campaignService.removeAll(getTenantContext(req))
    res.json({ success: true, data: { deleted } })
  } catch (error) {
    next(error)
  }
}

export const attachAds = async (req: Request<CampaignParams>, res: Response, next: NextFunction) => {
  try {
    const campaign = await campaignService.attachAds(
      getTenantContext(req),
      req.params.campaignId,
      adIdsOf(req.body),
    )
    res.json({ success: true, data: campaign })
  } catch (error) {
    next(error)
  }
}

export const detachAds = async (req: Request<CampaignParams>, res: Response, next: NextFunction) => {
  try {
    const campaign = await campaignService.detachAds(
      getTenantContext(req),
      req.params.campaignId,
      adIdsOf(req.body),
    )
    res.json({ success: true, data: campaign })
  } catch (error) {
    next(error)
  }
}

// ==================== 维护 ====================

export const backfillIds = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const updated = await campaignService.backfillIds(getTenantContext(req))
    res.json({ success: true, data: { updated } })
  } catch (error) {
    next(error)
  }
}

export const cleanupOrphans = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = await campaignService.cleanupOrphans(getTenantContext(req))
    res.json({ success: true, data: result })
  } catch (error) {
    next(error)
  }
}
