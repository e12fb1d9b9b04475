import { utcDayKey } from '../../utils/dates'
import type {
  AdPerformanceRow,
  AdRef,
  AdTableRow,
  CampaignRef,
  CampaignRollupRow,
  DailyRow,
  FullKpis,
  MeasureSums,
  RegistrationFacts,
  TopAdRow,
  TotalsRow,
} from './metrics.types'

export const UNLABELED = '(Unlabeled)'

const measure = (value: number | null | undefined): number =>
  typeof value === 'number' && Number.isFinite(value) ? value : 0

/** `spent`, falling back to `cost` when the record has no spend. */
export const spentOf = (fact: RegistrationFacts): number => measure(fact.spent ?? fact.cost)

/** Division with 0 for a zero denominator. */
export const safeDiv = (numerator: number, denominator: number): number =>
  denominator ? numerator / denominator : 0

/** Division with null for a zero denominator. */
export const ratioOrNull = (numerator: number, denominator: number): number | null =>
  denominator > 0 ? numerator / denominator : null

export const emptySums = (): MeasureSums => ({
  registrations: 0,
  messages: 0,
  spent: 0,
  reach: 0,
  impressions: 0,
  clicks: 0,
})

const accumulate = (sums: MeasureSums, fact: RegistrationFacts): MeasureSums => {
  sums.registrations += 1
  sums.messages += measure(fact.messages)
  sums.spent += spentOf(fact)
  sums.reach += measure(fact.reach)
  sums.impressions += measure(fact.impressions)
  sums.clicks += measure(fact.clicks)
  return sums
}

export const sumFacts = (facts: RegistrationFacts[]): MeasureSums =>
  facts.reduce(accumulate, emptySums())

/** Distinct non-null user ids. */
export const countCustomers = (facts: RegistrationFacts[]): number => {
  const users = new Set<string>()
  for (const fact of facts) {
    if (fact.user_id !== null && fact.user_id !== undefined) users.add(fact.user_id)
  }
  return users.size
}

/**
 * Groups facts by key. Groups come out in order of first appearance, which is
 * what the stable ranking sorts below rely on for ties.
 */
export const groupFacts = <K>(
  facts: RegistrationFacts[],
  keyOf: (fact: RegistrationFacts) => K,
): Map<K, RegistrationFacts[]> => {
  const groups = new Map<K, RegistrationFacts[]>()
  for (const fact of facts) {
    const key = keyOf(fact)
    const bucket = groups.get(key)
    if (bucket) bucket.push(fact)
    else groups.set(key, [fact])
  }
  return groups
}

const byRegistrationsDesc = (a: MeasureSums, b: MeasureSums) => b.registrations - a.registrations

export const computeTotals = (facts: RegistrationFacts[]): TotalsRow => {
  const sums = sumFacts(facts)
  return {
    ...sums,
    ctr: safeDiv(sums.clicks, sums.impressions),
    cpm: safeDiv(sums.spent, sums.impressions / 1000),
    cpc: safeDiv(sums.spent, sums.clicks),
    cpr: safeDiv(sums.spent, sums.registrations),
  }
}

export const computeFullKpis = (facts: RegistrationFacts[]): FullKpis => {
  const totals = computeTotals(facts)
  const customers = countCustomers(facts)
  return {
    ...totals,
    customers,
    ctr_pct: totals.ctr * 100,
    cac: safeDiv(totals.spent, customers),
    cost_per_msg: safeDiv(totals.spent, totals.messages),
    conv_pct: safeDiv(customers, totals.messages) * 100,
    frequency: safeDiv(totals.impressions, totals.reach),
    engagement_pct: safeDiv(totals.clicks, totals.impressions) * 100,
  }
}

export const computeDailySeries = (facts: RegistrationFacts[]): DailyRow[] => {
  const days = groupFacts(facts, (fact) => utcDayKey(fact.timestamp))
  return Array.from(days, ([date, bucket]) => {
    const sums = sumFacts(bucket)
    return { date, ...sums, cpr: safeDiv(sums.spent, sums.registrations) }
  }).sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
}

export const computeCampaignRollup = (
  facts: RegistrationFacts[],
  campaigns: CampaignRef[],
): CampaignRollupRow[] => {
  const byId = new Map(campaigns.map((campaign) => [campaign.campaign_id, campaign]))
  const groups = groupFacts(facts, (fact) => fact.campaign_id)

  return Array.from(groups, ([campaignId, bucket]) => {
    const sums = sumFacts(bucket)
    const campaign = byId.get(campaignId)
    return {
      campaign_id: campaignId,
      name: campaign?.name ?? null,
      status: campaign?.status ?? null,
      ...sums,
      ctr: safeDiv(sums.clicks, sums.impressions),
      cpr: safeDiv(sums.spent, sums.registrations),
    }
  }).sort(byRegistrationsDesc)
}

export const computeAdPerformance = (
  facts: RegistrationFacts[],
  ads: AdRef[],
): AdPerformanceRow[] => {
  const byId = new Map(ads.map((ad) => [ad.ad_id, ad]))
  const groups = groupFacts(facts, (fact) => fact.ad_id ?? null)

  return Array.from(groups, ([adId, bucket]) => {
    const sums = sumFacts(bucket)
    const ad = adId === null ? undefined : byId.get(adId)
    return {
      ad_id: adId,
      title: ad?.title ?? null,
      status: ad?.status ?? null,
      tags: ad?.tags ?? null,
      ...sums,
      ctr: ratioOrNull(sums.clicks, sums.impressions),
      cpr: ratioOrNull(sums.spent, sums.registrations),
    }
  }).sort(byRegistrationsDesc)
}

/** Label to show for an ad row: its title, else the raw id, else `(Unlabeled)`. */
export const displayTitle = (row: { ad_id: string | null; title?: string | null }): string => {
  if (row.title && row.title.trim() !== '') return row.title
  return row.ad_id ? row.ad_id : UNLABELED
}

export const computeTopAdsByImpressions = (
  facts: RegistrationFacts[],
  ads: AdRef[],
  limit: number,
): TopAdRow[] => {
  const byId = new Map(ads.map((ad) => [ad.ad_id, ad]))
  const rows: TopAdRow[] = []
  for (const [adId, bucket] of groupFacts(facts, (fact) => fact.ad_id)) {
    if (!adId) continue
    const sums = sumFacts(bucket)
    if (sums.impressions <= 0) continue
    rows.push({
      ad_id: adId,
      title: displayTitle({ ad_id: adId, title: byId.get(adId)?.title }),
      clicks: sums.clicks,
      impressions: sums.impressions,
    })
  }
  return rows.sort((a, b) => b.impressions - a.impressions).slice(0, Math.max(0, limit))
}

export const computeAdTable = (facts: RegistrationFacts[], ads: AdRef[]): AdTableRow[] => {
  const byId = new Map(ads.map((ad) => [ad.ad_id, ad]))
  const rows: AdTableRow[] = []
  for (const [adId, bucket] of groupFacts(facts, (fact) => fact.ad_id)) {
    if (!adId) continue
    const sums = sumFacts(bucket)
    const row: AdTableRow = {
      ad_id: adId,
      ad_name: displayTitle({ ad_id: adId, title: byId.get(adId)?.title }),
      spent: sums.spent,
      messages: sums.messages,
      impressions: sums.impressions,
      clicks: sums.clicks,
      reach: sums.reach,
      customers: countCustomers(bucket),
    }
    // drop rows where every measure is 0
    if (row.spent > 0 || row.messages > 0 || row.impressions > 0 || row.clicks > 0 || row.reach > 0) {
      rows.push(row)
    }
  }
  return rows.sort((a, b) => b.spent - a.spent)
}
