import type { IAd } from '../../models/Ad'
import type { ICampaign } from '../../models/Campaign'
import type { IRegistration } from '../../models/Registration'

/** Filters shared by every rollup; the tenant comes from the context. */
export interface MetricsFilter {
  dateFrom: Date
  dateTo?: Date
  campaignIds?: string[]
  adIds?: string[]
  sources?: string[]
}

export interface RegistrationQuery extends MetricsFilter {
  businessId: string
  withAdOnly?: boolean
}

/** The registration fields the engine reads. */
export type RegistrationFacts = Pick<IRegistration, 'campaign_id' | 'source' | 'timestamp'> &
  Partial<
    Pick<
      IRegistration,
      'ad_id' | 'user_id' | 'cost' | 'spent' | 'messages' | 'reach' | 'impressions' | 'clicks'
    >
  >

export type CampaignRef = Pick<ICampaign, 'campaign_id' | 'name' | 'status'>
export type AdRef = Pick<IAd, 'ad_id' | 'title' | 'status' | 'tags'>

export interface MetricsStore {
  findRegistrations(query: RegistrationQuery): Promise<RegistrationFacts[]>
  findCampaigns(businessId: string, campaignIds: string[]): Promise<CampaignRef[]>
  findAds(businessId: string, adIds: string[]): Promise<AdRef[]>
  listCampaignIds(businessId: string): Promise<string[]>
}

export interface MeasureSums {
  registrations: number
  messages: number
  spent: number
  reach: number
  impressions: number
  clicks: number
}

export interface TotalsRow extends MeasureSums {
  ctr: number
  cpm: number
  cpc: number
  cpr: number
}

export interface FullKpis extends TotalsRow {
  customers: number
  ctr_pct: number
  cac: number
  cost_per_msg: number
  conv_pct: number
  frequency: number
  engagement_pct: number
}

export interface DailyRow extends MeasureSums {
  date: string // YYYY-MM-DD (UTC)
  cpr: number
}

export interface CampaignRollupRow extends MeasureSums {
  campaign_id: string
  name: string | null
  status: string | null
  ctr: number
  cpr: number
}

export interface AdPerformanceRow extends MeasureSums {
  ad_id: string | null
  title: string | null
  status: string | null
  tags: string[] | null
  // null = no denominator, distinct from a real 0
  ctr: number | null
  cpr: number | null
}

export interface TopAdRow {
  ad_id: string
  title: string
  clicks: number
  impressions: number
}

export interface AdTableRow {
  ad_id: string
  ad_name: string
  spent: number
  messages: number
  impressions: number
  clicks: number
  reach: number
  customers: number
}
