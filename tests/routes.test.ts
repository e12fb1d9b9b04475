import request from 'supertest'
import { describe, expect, it, vi } from 'vitest'
import { NotFoundError } from '../src/utils/errors'
import { generateToken } from '../src/utils/jwt'

const mocks = vi.hoisted(() => ({
  auth: { login: vi.fn(), listBusinesses: vi.fn(), getBusiness: vi.fn() },
  ads: { list: vi.fn(), get: vi.fn(), create: vi.fn(), update: vi.fn(), remove: vi.fn(), campaignsUsingAd: vi.fn() },
  campaigns: {
    list: vi.fn(),
    get: vi.fn(),
    create: vi.fn(),
    update: vi.fn(),
    remove: vi.fn(),
    removeAll: vi.fn(),
    attachAds: vi.fn(),
    detachAds: vi.fn(),
    backfillIds: vi.fn(),
    cleanupOrphans: vi.fn(),
  },
  registrations: { list: vi.fn(), get: vi.fn(), create: vi.fn(), update: vi.fn(), remove: vi.fn() },
  csv: { exportCsv: vi.fn(), importCsv: vi.fn() },
  metrics: {
    getTotals: vi.fn(),
    getFullKpis: vi.fn(),
    getDailySeries: vi.fn(),
    getCampaignRollup: vi.fn(),
    getAdPerformance: vi.fn(),
    getTopAdsByImpressions: vi.fn(),
    getAdPerformanceTable: vi.fn(),
  },
}))

vi.mock('../src/services/auth.service', () => ({ default: mocks.auth }))
vi.mock('../src/services/ad.service', () => ({ default: mocks.ads }))
vi.mock('../src/services/campaign.service', () => ({ default: mocks.campaigns }))
vi.mock('../src/services/registration.service', () => ({ default: mocks.registrations }))
vi.mock('../src/services/registrationCsv.service', () => ({ default: mocks.csv }))
vi.mock('../src/domain/analytics/metrics.service', () => ({ metricsService: mocks.metrics }))

import app from '../src/app'

const ctx = { businessId: 'biz-1' }
const bearer = () => `Bearer ${generateToken({ business_id: 'biz-1', name: 'Biz One' })}`

describe('routes', () => {
  it('answers the health check', async () => {
    const res = await request(app).get('/api/health').expect(200)
    expect(res.body).toEqual({ success: true, data: { status: 'ok' } })
  })

  it('returns a JSON 404 for unknown routes', async () => {
    const res = await request(app).get('/api/nope').expect(404)
    expect(res.body).toEqual({ success: false, message: 'Route GET /api/nope not found' })
  })

  it('echoes a request id', async () => {
    const res = await request(app).get('/api/health').set('X-Request-Id', 'req-42')
    expect(res.headers['x-request-id']).toBe('req-42')
  })
})

describe('auth routes', () => {
  it('logs a business in', async () => {
    const session = { business: { business_id: 'biz-1', name: 'Biz One' }, token: 'token' }
    mocks.auth.login.mockResolvedValueOnce(session)

    const res = await request(app)
      .post('/api/auth/login')
      .send({ business_id: 'biz-1', password: 'test-password' })
      .expect(200)

    expect(mocks.auth.login).toHaveBeenCalledWith({ businessId: 'biz-1', password: 'test-password' })
    expect(res.body).toEqual({ success: true, data: session })
  })

  it('rejects a login without password', async () => {
    const res = await request(app).post('/api/auth/login').send({ business_id: 'biz-1' }).expect(400)
    expect(res.body.message).toBe('Invalid login: password: Required')
    expect(mocks.auth.login).not.toHaveBeenCalled()
  })

  it('lists businesses without a token', async () => {
    mocks.auth.listBusinesses.mockResolvedValueOnce([{ business_id: 'biz-1', name: 'Biz One' }])
    const res = await request(app).get('/api/auth/businesses').expect(200)
    expect(res.body.data).toEqual([{ business_id: 'biz-1', name: 'Biz One' }])
  })

  it('resolves the current business from the token', async () => {
    mocks.auth.getBusiness.mockResolvedValueOnce({ business_id: 'biz-1', name: 'Biz One' })
    await request(app).get('/api/auth/me').set('Authorization', bearer()).expect(200)
    expect(mocks.auth.getBusiness).toHaveBeenCalledWith('biz-1')
  })
})

describe('protected routes', () => {
  it('require a bearer token', async () => {
    const res = await request(app).get('/api/analytics/kpis').expect(401)
    expect(res.body).toMatchObject({ success: false, message: 'Missing bearer token' })
    expect(mocks.metrics.getTotals).not.toHaveBeenCalled()
  })

  it('reject a bad token', async () => {
    const res = await request(app).get('/api/ads').set('Authorization', 'Bearer nope').expect(401)
    expect(res.body.message).toBe('Invalid or expired token')
  })

  it('map service errors to their status', async () => {
    mocks.ads.get.mockRejectedValueOnce(new NotFoundError('Ad not found.'))
    const res = await request(app).get('/api/ads/ad-9').set('Authorization', bearer()).expect(404)
    expect(res.body).toMatchObject({ success: false, message: 'Ad not found.' })
    expect(mocks.ads.get).toHaveBeenCalledWith(ctx, 'ad-9')
  })

  it('attach ads to a campaign', async () => {
    mocks.campaigns.attachAds.mockResolvedValueOnce({ campaign_id: 'c1', ad_ids: ['a1'] })
    await request(app)
      .post('/api/campaigns/c1/ads')
      .set('Authorization', bearer())
      .send({ ad_ids: ['a1'] })
      .expect(200)
    expect(mocks.campaigns.attachAds).toHaveBeenCalledWith(ctx, 'c1', ['a1'])
  })

  it('route maintenance ahead of campaign ids', async () => {
    mocks.campaigns.cleanupOrphans.mockResolvedValueOnce({ registrations_deleted: 2, ads_deleted: 1 })
    const res = await request(app)
      .post('/api/campaigns/maintenance/cleanup-orphans')
      .set('Authorization', bearer())
      .expect(200)
    expect(res.body.data).toEqual({ registrations_deleted: 2, ads_deleted: 1 })
  })
})

describe('analytics routes', () => {
  it('pass the parsed filter to the engine', async () => {
    const totals = { registrations: 3 }
    mocks.metrics.getTotals.mockResolvedValueOnce(totals)

    const res = await request(app)
      .get('/api/analytics/kpis?dateFrom=2024-03-01&sources=facebook&sources=google')
      .set('Authorization', bearer())
      .expect(200)

    expect(res.body).toEqual({ success: true, data: totals })
    expect(mocks.metrics.getTotals).toHaveBeenCalledWith(ctx, {
      dateFrom: new Date('2024-03-01T00:00:00Z'),
      sources: ['facebook', 'google'],
    })
  })

  it('pass limit and campaign through', async () => {
    mocks.metrics.getTopAdsByImpressions.mockResolvedValueOnce([])
    mocks.metrics.getAdPerformance.mockResolvedValueOnce([])

    await request(app).get('/api/analytics/ads/top?dateFrom=2024-03-01&limit=3').set('Authorization', bearer()).expect(200)
    await request(app).get('/api/analytics/ads?dateFrom=2024-03-01&campaignId=c1').set('Authorization', bearer()).expect(200)

    const filter = { dateFrom: new Date('2024-03-01T00:00:00Z') }
    expect(mocks.metrics.getTopAdsByImpressions).toHaveBeenCalledWith(ctx, filter, 3)
    expect(mocks.metrics.getAdPerformance).toHaveBeenCalledWith(ctx, filter, 'c1')
  })

  it('reject an invalid date', async () => {
    const res = await request(app).get('/api/analytics/daily?dateFrom=bad').set('Authorization', bearer()).expect(400)
    expect(res.body.message).toBe('Invalid query: dateFrom: dateFrom must be a valid date.')
  })
})

describe('registration csv routes', () => {
  it('export as a csv download', async () => {
    mocks.csv.exportCsv.mockResolvedValueOnce('timestamp\r\n')
    const res = await request(app).get('/api/registrations/export').set('Authorization', bearer()).expect(200)

    expect(res.headers['content-type']).toContain('text/csv')
    expect(res.text).toBe('timestamp\r\n')
    expect(mocks.csv.exportCsv).toHaveBeenCalledWith(ctx, {})
  })

  it('import an uploaded file', async () => {
    const summary = { successes: 1, failures: 0, errors: [] }
    mocks.csv.importCsv.mockResolvedValueOnce(summary)
    const text = 'campaign_id,timestamp\nc1,2024-03-01\n'

    const res = await request(app)
      .post('/api/registrations/import')
      .set('Authorization', bearer())
      .attach('file', Buffer.from(text), 'registrations.csv')
      .expect(200)

    expect(res.body.data).toEqual(summary)
    expect(mocks.csv.importCsv).toHaveBeenCalledWith(ctx, text)
  })

  it('require a file to import', async () => {
    const res = await request(app).post('/api/registrations/import').set('Authorization', bearer()).expect(400)
    expect(res.body.message).toBe('A CSV file is required.')
  })
})
