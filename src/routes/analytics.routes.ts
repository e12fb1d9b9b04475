import { Router } from 'express'
import * as analyticsController from '../controllers/analytics.controller'
import { authenticate } from '../middlewares/auth'

const router = Router()

router.use(authenticate)

router.get('/kpis', analyticsController.getKpis)
router.get('/kpis/full', analyticsController.getFullKpis)
router.get('/daily', analyticsController.getDaily)
router.get('/campaigns', analyticsController.getCampaigns)
router.get('/ads', analyticsController.getAds)
router.get('/ads/top', analyticsController.getTopAds)
router.get('/ads/table', analyticsController.getAdTable)

export default router
