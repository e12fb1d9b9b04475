// 🔥 Must be first: load environment variables
import { ENV } from './config/env'

import app from './app'
import connectDB from './config/db'
import logger from './utils/logger'

// Handle Uncaught Exceptions
process.on('uncaughtException', (err) => {
  logger.error('UNCAUGHT EXCEPTION! Shutting down...', err)
  process.exit(1)
})

// Handle Unhandled Rejections
process.on('unhandledRejection', (err) => {
  logger.error('UNHANDLED REJECTION! Shutting down...', err)
  process.exit(1)
})

async function bootstrap() {
  // 1) DB
  await connectDB()

  // 2) HTTP Server
  app.listen(ENV.PORT, () => {
    logger.info(`Campaign Insights backend running on port ${ENV.PORT}`)
  })
}

bootstrap().catch((err) => {
  logger.error('[Bootstrap] Failed to start server:', err)
  process.exit(1)
})
