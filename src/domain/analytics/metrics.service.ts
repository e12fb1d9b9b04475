import logger, { errorMeta } from '../../utils/logger'
import { requireBusinessId, TenantContext } from '../../types/tenant'
import { mongoMetricsStore } from './metrics.store'
import {
  computeAdPerformance,
  computeAdTable,
  computeCampaignRollup,
  computeDailySeries,
  computeFullKpis,
  computeTopAdsByImpressions,
  computeTotals,
} from './rollup'
import type {
  AdPerformanceRow,
  AdTableRow,
  CampaignRollupRow,
  DailyRow,
  FullKpis,
  MetricsFilter,
  MetricsStore,
  RegistrationFacts,
  TopAdRow,
  TotalsRow,
} from './metrics.types'

export const DEFAULT_TOP_ADS = 10

const distinct = <T>(values: (T | null | undefined)[]): T[] => {
  const seen = new Set<T>()
  for (const value of values) {
    if (value !== null && value !== undefined) seen.add(value)
  }
  return Array.from(seen)
}

/**
 * Registration analytics. Read-only; every query is scoped to the context's
 * business. An empty match gives zeros or empty lists; store failures are
 * logged and rethrown as-is.
 */
export class MetricsService {
  constructor(private readonly store: MetricsStore = mongoMetricsStore) {}

  private async run<T>(label: string, work: () => Promise<T>): Promise<T> {
    const start = Date.now()
    try {
      return await work()
    } catch (error) {
      const cause = error instanceof Error ? error.message : String(error)
      logger.error(`[MetricsService] ${label} failed: ${cause}`, errorMeta(error))
      throw error
    } finally {
      logger.timerLog(`[MetricsService] ${label}`, start)
    }
  }

  private facts(
    businessId: string,
    filter: MetricsFilter,
    options: { withAdOnly?: boolean } = {},
  ): Promise<RegistrationFacts[]> {
    return this.store.findRegistrations({ ...filter, businessId, ...options })
  }

  /** Totals with 0 for every ratio whose denominator is 0. */
  async getTotals(ctx: TenantContext, filter: MetricsFilter): Promise<TotalsRow> {
    const businessId = requireBusinessId(ctx)
    return this.run('getTotals', async () => computeTotals(await this.facts(businessId, filter)))
  }

  /** Totals plus distinct customers and the percentage/cost KPIs built on them. */
  async getFullKpis(ctx: TenantContext, filter: MetricsFilter): Promise<FullKpis> {
    const businessId = requireBusinessId(ctx)
    return this.run('getFullKpis', async () => computeFullKpis(await this.facts(businessId, filter)))
  }

  /** One row per UTC day that has registrations, ascending. Empty days are not filled. */
  async getDailySeries(ctx: TenantContext, filter: MetricsFilter): Promise<DailyRow[]> {
    const businessId = requireBusinessId(ctx)
    return this.run('getDailySeries', async () =>
      computeDailySeries(await this.facts(businessId, filter)),
    )
  }

  async getCampaignRollup(ctx: TenantContext, filter: MetricsFilter): Promise<CampaignRollupRow[]> {
    const businessId = requireBusinessId(ctx)
    return this.run('getCampaignRollup', async () => {
      const facts = await this.facts(businessId, filter)
      const campaigns = await this.store.findCampaigns(
        businessId,
        distinct(facts.map((fact) => fact.campaign_id)),
      )
      return computeCampaignRollup(facts, campaigns)
    })
  }

  /**
   * Per-ad rows. `ctr`/`cpr` are null, not 0, when the denominator is 0.
   * `campaignId` narrows to one campaign on top of any `campaignIds` filter.
   */
  async getAdPerformance(
    ctx: TenantContext,
    filter: MetricsFilter,
    campaignId?: string,
  ): Promise<AdPerformanceRow[]> {
    const businessId = requireBusinessId(ctx)
    return this.run('getAdPerformance', async () => {
      let scoped = filter
      if (campaignId) {
        if (filter.campaignIds?.length && !filter.campaignIds.includes(campaignId)) return []
        scoped = { ...filter, campaignIds: [campaignId] }
      }
      const facts = await this.facts(businessId, scoped)
      const ads = await this.store.findAds(businessId, distinct(facts.map((fact) => fact.ad_id)))
      return computeAdPerformance(facts, ads)
    })
  }

  /** Ads ranked by impressions, limited to the business's own campaigns. */
  async getTopAdsByImpressions(
    ctx: TenantContext,
    filter: MetricsFilter,
    limit: number = DEFAULT_TOP_ADS,
  ): Promise<TopAdRow[]> {
    const businessId = requireBusinessId(ctx)
    return this.run('getTopAdsByImpressions', async () => {
      const facts = await this.ownCampaignFacts(businessId, filter)
      if (facts.length === 0) return []
      const ads = await this.store.findAds(businessId, distinct(facts.map((fact) => fact.ad_id)))
      return computeTopAdsByImpressions(facts, ads, limit)
    })
  }

  /** Per-ad spend table, limited to the business's own campaigns, by spend descending. */
  async getAdPerformanceTable(ctx: TenantContext, filter: MetricsFilter): Promise<AdTableRow[]> {
    const businessId = requireBusinessId(ctx)
    return this.run('getAdPerformanceTable', async () => {
      const facts = await this.ownCampaignFacts(businessId, filter)
      if (facts.length === 0) return []
      const ads = await this.store.findAds(businessId, distinct(facts.map((fact) => fact.ad_id)))
      return computeAdTable(facts, ads)
    })
  }

  // Facts with an ad, whose campaign exists under this business
  private async ownCampaignFacts(businessId: string, filter: MetricsFilter): Promise<RegistrationFacts[]> {
    let campaignIds = await this.store.listCampaignIds(businessId)
    if (filter.campaignIds?.length) {
      const requested = new Set(filter.campaignIds)
      campaignIds = campaignIds.filter((id) => requested.has(id))
    }
    if (campaignIds.length === 0) return []
    return this.facts(businessId, { ...filter, campaignIds }, { withAdOnly: true })
  }
}

export const metricsService = new MetricsService()
