import mongoose from 'mongoose'
import { ENV } from './env'
import logger from '../utils/logger'
import * as models from '../models'

const connectDB = async (): Promise<typeof mongoose> => {
  if (!ENV.MONGO_URI) {
    throw new Error('MONGO_URI is not defined in environment variables')
  }

  const connection = await mongoose.connect(ENV.MONGO_URI, {
    dbName: ENV.MONGO_DB,
    serverSelectionTimeoutMS: 5000,
  })
  logger.info(`MongoDB Connected: ${connection.connection.host}/${connection.connection.name}`)

  // Unique (business_id, *_id) indexes are declared on the schemas
  await Promise.all(Object.values(models).map((model) => model.syncIndexes()))

  return connection
}

export const disconnectDB = async (): Promise<void> => {
  await mongoose.connection.close()
}

export default connectDB
