import { Request, Response, NextFunction } from 'express'
import multer from 'multer'
import { AppError } from '../utils/errors'
import { ENV } from '../config/env'
import logger, { errorMeta } from '../utils/logger'

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express only treats 4-arity middleware as an error handler
  _next: NextFunction,
) => {
  const error = err instanceof Error ? err : new Error(String(err))
  // upload limits are client errors
  const statusCode = err instanceof AppError ? err.statusCode : err instanceof multer.MulterError ? 400 : 500
  const message = error.message || 'Internal Server Error'

  if (statusCode >= 500) {
    logger.error(`[${req.requestId}] [${req.method}] ${req.url} - ${statusCode} - ${message}`, errorMeta(error))
  } else {
    logger.warn(`[${req.requestId}] [${req.method}] ${req.url} - ${statusCode} - ${message}`)
  }

  // Always JSON, never the default HTML error page
  res.setHeader('Content-Type', 'application/json; charset=utf-8')

  res.status(statusCode).json({
    success: false,
    message,
    details: err instanceof AppError ? err.details : undefined,
    // Hide stack trace in production
    stack: ENV.NODE_ENV === 'production' ? undefined : error.stack,
  })
}

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    success: false,
    message: `Route ${req.method} ${req.path} not found`,
  })
}
