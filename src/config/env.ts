import dotenv from 'dotenv'

// 🔥 Load .env before anything reads process.env
dotenv.config()

const toNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

export const ENV = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  PORT: toNumber(process.env.PORT, 3001),
  MONGO_URI: process.env.MONGO_URI || '',
  MONGO_DB: process.env.MONGO_DB || undefined,
  JWT_SECRET: process.env.JWT_SECRET || 'dev-secret-change-in-production',
  JWT_EXPIRES_IN: process.env.JWT_EXPIRES_IN || '7d',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  DEFAULT_DATE_RANGE_DAYS: toNumber(process.env.DEFAULT_DATE_RANGE_DAYS, 30),
  UPLOAD_MAX_BYTES: toNumber(process.env.UPLOAD_MAX_BYTES, 5 * 1024 * 1024),
}
