import { Router } from 'express'
import * as campaignController from '../controllers/campaign.controller'
import { authenticate } from '../middlewares/auth'

const router = Router()

router.use(authenticate)

// 维护接口（放在 /:campaignId 之前）
router.post('/maintenance/backfill-ids', campaignController.backfillIds)
router.post('/maintenance/cleanup-orphans', campaignController.cleanupOrphans)

router.get('/', campaignController.listCampaigns)
router.post('/', campaignController.createCampaign)
router.delete('/', campaignController.deleteAllCampaigns)
router.get('/:campaignId', campaignController.getCampaign)
router.put('/:campaignId', campaignController.updateCampaign)
router.delete('/:campaignId', campaignController.deleteCampaign)

// 活动与广告关联
router.post('/:campaignId/ads', campaignController.attachAds)
router.delete('/:campaignId/ads', campaignController.detachAds)

export default router
