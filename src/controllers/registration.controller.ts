import { Request, Response, NextFunction } from 'express'
import registrationService from '../services/registration.service'
import registrationCsvService from '../services/registrationCsv.service'
import { getTenantContext } from '../middlewares/auth'
import { parseQuery, registrationQuerySchema } from '../validators/query.schema'
import { ValidationError } from '../utils/errors'
import dayjs from '../utils/dates'

type RegistrationParams = { registrationId: string }

export const listRegistrations = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const query = parseQuery(registrationQuerySchema, req.query)
    const page = await registrationService.list(getTenantContext(req), query)
    res.json({ success: true, data: page })
  } catch (error) {
    next(error)
  }
}

export const getRegistration = async (
  req: Request<RegistrationParams>,
  res: Response,
  next: NextFunction,
) => {
  try {
    const registration = await registrationService.get(getTenantContext(req), req.params.registrationId)
    res.json({ success: true, data: registration })
  } catch (error) {
    next(error)
  }
}

export const createRegistration = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const registration = await registrationService.create(getTenantContext(req), req.body)
    res.status(201).json({ success: true, data: registration })
  } catch (error) {
    next(error)
  }
}

export const updateRegistration = async (
  req: Request<RegistrationParams>,
  res: Response,
  next: NextFunction,
) => {
  try {
    const registration = await registrationService.update(
      getTenantContext(req),
      req.params.registrationId,
      req.body,
    )
    res.json({ success: true, data: registration })
  } catch (error) {
    next(error)
  }
}

export const deleteRegistration = async (
  req: Request<RegistrationParams>,
  res: Response,
  next: NextFunction,
) => {
  try {
    await registrationService.remove(getTenantContext(req), req.params.registrationId)
    res.json({ success: true, message: 'Registration deleted' })
  } catch (error) {
    next(error)
  }
}

// ==================== CSV ====================

export const exportRegistrations = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const filter = parseQuery(registrationQuerySchema.omit({ page: true, pageSize: true }), req.query)
    const ctx = getTenantContext(req)
    const csv = await registrationCsvService.exportCsv(ctx, filter)
    const filename = `registrations_${ctx.businessId}_${dayjs.utc().format('YYYYMMDD')}.csv`
    res.setHeader('Content-Type', 'text/csv; charset=utf-8')
    res.setHeader('Content-Disposition', `attachment; filename="${filename}"`)
    res.send(csv)
  } catch (error) {
    next(error)
  }
}

export const importRegistrations = async (req: Request, res: Response, next: NextFunction) => {
  try {
    if (!req.file) {
      throw new ValidationError('A CSV file is required.')
    }
    const summary = await registrationCsvService.importCsv(
      getTenantContext(req),
      req.file.buffer.toString('utf8'),
    )
    res.json({ success: true, data: summary })
  } catch (error) {
    next(error)
  }
}
