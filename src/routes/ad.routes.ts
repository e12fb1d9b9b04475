import { Router } from 'express'
import * as adController from '../controllers/ad.controller'
import { authenticate } from '../middlewares/auth'

const router = Router()

router.use(authenticate)

router.get('/', adController.listAds)
router.post('/', adController.createAd)
router.get('/:adId', adController.getAd)
router.put('/:adId', adController.updateAd)
router.delete('/:adId', adController.deleteAd)
router.get('/:adId/campaigns', adController.getAdCampaigns)

export default router
