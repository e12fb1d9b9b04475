import mongoose from 'mongoose'
import bcrypt from 'bcryptjs'

/**
 * Business (tenant). `business_id` is the scoping key carried by every ad,
 * campaign and registration row.
 */
export interface IBusiness {
  business_id: string
  name: string
  password_hash: string
  created_at: Date
  updated_at: Date
}

const businessSchema = new mongoose.Schema<IBusiness>(
  {
    business_id: { type: String, required: true, trim: true },
    name: { type: String, required: true, trim: true },
    password_hash: { type: String, required: true },
  },
  { timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' } },
)

businessSchema.index({ business_id: 1 }, { unique: true, name: 'idx_business_id' })

export const hashPassword = async (plain: string): Promise<string> => {
  const salt = await bcrypt.genSalt(10)
  return bcrypt.hash(plain, salt)
}

export const comparePassword = (candidate: string, hash: string): Promise<boolean> =>
  bcrypt.compare(candidate, hash)

export default mongoose.model<IBusiness>('Business', businessSchema)
