import express, { Request, Response, NextFunction } from 'express'
import cors from 'cors'
import { randomUUID } from 'crypto'
import authRoutes from './routes/auth.routes'
import adRoutes from './routes/ad.routes'
import campaignRoutes from './routes/campaign.routes'
import registrationRoutes from './routes/registration.routes'
import analyticsRoutes from './routes/analytics.routes'
import logger from './utils/logger'
import { errorHandler, notFoundHandler } from './middlewares/errorHandler'

// NOTE: DB connection is opened in `server.ts`.
// `app.ts` stays side-effect free so tests and scripts can import it.

// Extend Express Request type with requestId for logging/tracing
declare global {
  namespace Express {
    interface Request {
      requestId?: string
    }
  }
}

const app = express()
app.use(cors())
app.use(express.json({ limit: '1mb' }))

// Request ID (Correlation ID)
app.use((req: Request, res: Response, next: NextFunction) => {
  const headerId = req.headers['x-request-id']
  const requestId =
    typeof headerId === 'string' && headerId.trim().length > 0 ? headerId : randomUUID()
  req.requestId = requestId
  res.setHeader('X-Request-Id', requestId)
  next()
})

// Request Logger
app.use((req: Request, res: Response, next: NextFunction) => {
  const start = Date.now()
  const { method, url } = req

  res.on('finish', () => {
    const duration = Date.now() - start
    logger.info(`[${req.requestId}] [${method}] ${url} ${res.statusCode} - ${duration}ms`)
  })

  next()
})

app.get('/api/health', (_req: Request, res: Response) => {
  res.json({ success: true, data: { status: 'ok' } })
})

// 认证路由（公开）
app.use('/api/auth', authRoutes)
// 业务路由（需要认证，按租户隔离）
app.use('/api/ads', adRoutes)
app.use('/api/campaigns', campaignRoutes)
app.use('/api/registrations', registrationRoutes)
app.use('/api/analytics', analyticsRoutes)

// 404 Handler (must be after all routes, before errorHandler)
app.use(notFoundHandler)

app.use(errorHandler)

export default app
