/**
 * 初始化演示租户（可选：广告、活动、报名数据）
 * 运行方式: npm run seed            仅创建租户
 *          npm run seed -- --full   同时写入示例数据
 *
 * 重复运行是安全的：已存在的记录会被跳过。
 */

import connectDB, { disconnectDB } from '../src/config/db'
import authService from '../src/services/auth.service'
import adService from '../src/services/ad.service'
import campaignService from '../src/services/campaign.service'
import registrationService from '../src/services/registration.service'
import { ConflictError } from '../src/utils/errors'
import dayjs from '../src/utils/dates'
import logger from '../src/utils/logger'
import seedData from './seed-data.json'

type SeedTenant = (typeof seedData.tenants)[number]

interface SeedCounts {
  created: number
  skipped: number
}

// Conflict means the record is already there
async function createOnce(counts: SeedCounts, work: () => Promise<unknown>): Promise<void> {
  try {
    await work()
    counts.created++
  } catch (error) {
    if (!(error instanceof ConflictError)) throw error
    counts.skipped++
  }
}

async function seedTenantData(tenant: SeedTenant, now: dayjs.Dayjs, counts: Record<string, SeedCounts>) {
  const ctx = { businessId: tenant.business_id }

  for (const ad of tenant.ads) {
    await createOnce(counts.ads, () => adService.create(ctx, ad))
  }

  for (const campaign of tenant.campaigns) {
    const targeting = {
      ...campaign.targeting,
      start_date: now.subtract(30, 'day').startOf('day').toDate(),
      end_date: now.add(60, 'day').startOf('day').toDate(),
    }
    await createOnce(counts.campaigns, () => campaignService.create(ctx, { ...campaign, targeting }))
  }

  const campaignIds = tenant.campaigns.map((campaign) => campaign.campaign_id)
  const adIds = tenant.ads.map((ad) => ad.ad_id)
  const { sources } = seedData

  for (let day = 0; day < seedData.registrationDays; day++) {
    const timestamp = now.subtract(day, 'day').hour(15).minute(30).second(0).millisecond(0)
    const cost = Math.round((85 + day * 2.5) * 100) / 100
    const reach = 750 + day * 25
    const impressions = reach + 200

    const registration = {
      registration_id: `${tenant.business_id}-reg-${timestamp.format('YYYYMMDD')}`,
      campaign_id: campaignIds[day % campaignIds.length],
      ad_id: adIds[day % adIds.length],
      source: sources[day % sources.length],
      cost,
      spent: cost + 15,
      messages: 3 + (day % 5),
      reach,
      impressions,
      clicks: Math.max(10, Math.floor(impressions / 25)),
      timestamp: timestamp.toDate(),
      meta: { note: 'Seed registration data' },
    }
    await createOnce(counts.registrations, () => registrationService.create(ctx, registration))
  }
}

async function seedDemo() {
  const full = process.argv.includes('--full')
  const counts: Record<string, SeedCounts> = {
    businesses: { created: 0, skipped: 0 },
    ads: { created: 0, skipped: 0 },
    campaigns: { created: 0, skipped: 0 },
    registrations: { created: 0, skipped: 0 },
  }

  await connectDB()
  try {
    const now = dayjs.utc()
    for (const tenant of seedData.tenants) {
      await createOnce(counts.businesses, () =>
        authService.createBusiness({
          businessId: tenant.business_id,
          name: tenant.name,
          password: tenant.password,
        }),
      )
      if (full) {
        await seedTenantData(tenant, now, counts)
      }
    }

    logger.info(`[Seed] Complete (mode: ${full ? 'full' : 'businesses-only'})`)
    for (const [collection, { created, skipped }] of Object.entries(counts)) {
      logger.info(`[Seed]   ${collection}: ${created} created | ${skipped} already present`)
    }
  } finally {
    await disconnectDB()
  }
}

seedDemo().catch((error) => {
  logger.error('[Seed] Failed:', error)
  process.exit(1)
})
