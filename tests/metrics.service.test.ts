import { describe, expect, it, vi } from 'vitest'
import { MetricsService } from '../src/domain/analytics/metrics.service'
import type {
  AdRef,
  CampaignRef,
  MetricsFilter,
  MetricsStore,
  RegistrationFacts,
} from '../src/domain/analytics/metrics.types'
import { ValidationError } from '../src/utils/errors'
import logger from '../src/utils/logger'

type Owned<T> = T & { business_id: string }

const at = (iso: string) => new Date(iso)

const registrations: Owned<RegistrationFacts>[] = [
  { business_id: 'A', campaign_id: 'c1', ad_id: 'ad1', source: 'facebook', timestamp: at('2024-03-01T10:00:00Z'), impressions: 100, clicks: 4, spent: 10 },
  { business_id: 'A', campaign_id: 'c1', ad_id: 'ad1', source: 'google', timestamp: at('2024-03-02T10:00:00Z'), impressions: 50, clicks: 1, spent: 5 },
  { business_id: 'A', campaign_id: 'c2', ad_id: 'ad2', source: 'facebook', timestamp: at('2024-03-02T11:00:00Z'), impressions: 500, clicks: 0, cost: 7 },
  { business_id: 'A', campaign_id: 'c1', ad_id: null, source: 'email', timestamp: at('2024-03-03T10:00:00Z'), impressions: 900 },
  // same ids under another business
  { business_id: 'B', campaign_id: 'c1', ad_id: 'ad1', source: 'facebook', timestamp: at('2024-03-01T10:00:00Z'), impressions: 10000, clicks: 999, spent: 1000 },
  { business_id: 'B', campaign_id: 'c1', ad_id: 'ad1', source: 'facebook', timestamp: at('2024-03-02T10:00:00Z'), impressions: 10000, clicks: 999, spent: 1000 },
]

const campaigns: Owned<CampaignRef>[] = [
  { business_id: 'A', campaign_id: 'c1', name: 'Spring Gardens', status: 'active' },
  { business_id: 'B', campaign_id: 'c1', name: 'Other tenant', status: 'paused' },
  { business_id: 'B', campaign_id: 'c2', name: 'Other tenant 2', status: 'active' },
]

const ads: Owned<AdRef>[] = [
  { business_id: 'A', ad_id: 'ad1', title: 'Aisle Lights', status: 'active', tags: ['lighting'] },
  { business_id: 'B', ad_id: 'ad1', title: 'Other tenant ad', status: 'active', tags: [] },
]

const createStore = (): MetricsStore => ({
  async findRegistrations(query) {
    return registrations.filter(
      (row) =>
        row.business_id === query.businessId &&
        row.timestamp >= query.dateFrom &&
        (!query.dateTo || row.timestamp <= query.dateTo) &&
        (!query.campaignIds?.length || query.campaignIds.includes(row.campaign_id)) &&
        (!query.adIds?.length || (!!row.ad_id && query.adIds.includes(row.ad_id))) &&
        (!query.sources?.length || query.sources.includes(row.source)) &&
        (!query.withAdOnly || !!row.ad_id),
    )
  },
  async findCampaigns(businessId, ids) {
    return campaigns.filter((row) => row.business_id === businessId && ids.includes(row.campaign_id))
  },
  async findAds(businessId, ids) {
    return ads.filter((row) => row.business_id === businessId && ids.includes(row.ad_id))
  },
  async listCampaignIds(businessId) {
    return campaigns.filter((row) => row.business_id === businessId).map((row) => row.campaign_id)
  },
})

const tenantA = { businessId: 'A' }
const window: MetricsFilter = { dateFrom: at('2024-03-01T00:00:00Z') }

describe('MetricsService', () => {
  it('never includes another business in the totals', async () => {
    const service = new MetricsService(createStore())
    const totals = await service.getTotals(tenantA, window)

    expect(totals.registrations).toBe(4)
    expect(totals.impressions).toBe(1550)
    expect(totals.clicks).toBe(5)
    expect(totals.spent).toBe(22)
  })

  it('rejects a blank business id', async () => {
    const service = new MetricsService(createStore())
    await expect(service.getTotals({ businessId: '  ' }, window)).rejects.toBeInstanceOf(ValidationError)
  })

  it('applies the date and source filters', async () => {
    const service = new MetricsService(createStore())
    const totals = await service.getTotals(tenantA, {
      dateFrom: at('2024-03-02T00:00:00Z'),
      dateTo: at('2024-03-02T23:59:59.999Z'),
      sources: ['facebook'],
    })

    expect(totals.registrations).toBe(1)
    expect(totals.spent).toBe(7)
  })

  it('joins campaign names from the same business only', async () => {
    const service = new MetricsService(createStore())
    const rows = await service.getCampaignRollup(tenantA, window)

    expect(rows.map((row) => [row.campaign_id, row.name, row.registrations])).toEqual([
      ['c1', 'Spring Gardens', 3],
      ['c2', null, 1],
    ])
  })

  it('builds a daily series for the tenant', async () => {
    const service = new MetricsService(createStore())
    const rows = await service.getDailySeries(tenantA, window)

    expect(rows.map((row) => [row.date, row.registrations])).toEqual([
      ['2024-03-01', 1],
      ['2024-03-02', 2],
      ['2024-03-03', 1],
    ])
  })

  it('narrows ad performance to one campaign', async () => {
    const service = new MetricsService(createStore())
    const rows = await service.getAdPerformance(tenantA, window, 'c1')

    expect(rows.map((row) => [row.ad_id, row.title, row.registrations])).toEqual([
      ['ad1', 'Aisle Lights', 2],
      [null, null, 1],
    ])
  })

  it('returns nothing when the campaign is outside the campaign filter', async () => {
    const store = createStore()
    const findRegistrations = vi.spyOn(store, 'findRegistrations')
    const service = new MetricsService(store)

    const rows = await service.getAdPerformance(tenantA, { ...window, campaignIds: ['c2'] }, 'c1')

    expect(rows).toEqual([])
    expect(findRegistrations).not.toHaveBeenCalled()
  })

  it('ranks top ads only within the business campaigns', async () => {
    const service = new MetricsService(createStore())
    const rows = await service.getTopAdsByImpressions(tenantA, window)

    // c2 has no campaign for A, and the ad-less registration is skipped
    expect(rows).toEqual([{ ad_id: 'ad1', title: 'Aisle Lights', clicks: 5, impressions: 150 }])
  })

  it('skips the query when no requested campaign belongs to the business', async () => {
    const store = createStore()
    const findRegistrations = vi.spyOn(store, 'findRegistrations')
    const service = new MetricsService(store)

    const rows = await service.getAdPerformanceTable(tenantA, { ...window, campaignIds: ['c2'] })

    expect(rows).toEqual([])
    expect(findRegistrations).not.toHaveBeenCalled()
  })

  it('builds the ad table by spend', async () => {
    const service = new MetricsService(createStore())
    const rows = await service.getAdPerformanceTable(tenantA, window)

    expect(rows).toEqual([
      { ad_id: 'ad1', ad_name: 'Aisle Lights', spent: 15, messages: 0, impressions: 150, clicks: 5, reach: 0, customers: 0 },
    ])
  })

  it('passes store failures through', async () => {
    const store = createStore()
    const failure = new Error('connection lost')
    vi.spyOn(store, 'findRegistrations').mockRejectedValue(failure)
    const service = new MetricsService(store)

    await expect(service.getFullKpis(tenantA, window)).rejects.toBe(failure)
  })

  it('logs the cause and stack of a failed query', async () => {
    const store = createStore()
    const failure = new Error('connection lost')
    vi.spyOn(store, 'findRegistrations').mockRejectedValue(failure)
    const errorLog = vi.spyOn(logger, 'error')
    const service = new MetricsService(store)

    await expect(service.getTotals(tenantA, window)).rejects.toBe(failure)

    expect(errorLog).toHaveBeenCalledWith('[MetricsService] getTotals failed: connection lost', {
      stack: failure.stack,
    })
  })
})
