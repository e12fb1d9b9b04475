import { Router } from 'express'
import multer from 'multer'
import * as registrationController from '../controllers/registration.controller'
import { authenticate } from '../middlewares/auth'
import { ENV } from '../config/env'

const router = Router()

// 配置 multer（内存存储）
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: ENV.UPLOAD_MAX_BYTES,
  },
})

router.use(authenticate)

// CSV 导入导出（放在 /:registrationId 之前）
router.get('/export', registrationController.exportRegistrations)
router.post('/import', upload.single('file'), registrationController.importRegistrations)

router.get('/', registrationController.listRegistrations)
router.post('/', registrationController.createRegistration)
router.get('/:registrationId', registrationController.getRegistration)
router.put('/:registrationId', registrationController.updateRegistration)
router.delete('/:registrationId', registrationController.deleteRegistration)

export default router
