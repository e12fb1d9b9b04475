import { describe, expect, it } from 'vitest'
import { buildRegistrationMatch } from '../src/domain/analytics/metrics.store'

const from = new Date('2024-03-01T00:00:00Z')
const to = new Date('2024-03-31T23:59:59.999Z')

describe('buildRegistrationMatch', () => {
  it('always scopes to the business and the lower date bound', () => {
    expect(buildRegistrationMatch({ businessId: 'biz-1', dateFrom: from })).toEqual({
      business_id: 'biz-1',
      timestamp: { $gte: from },
    })
  })

  it('treats empty lists as no filter', () => {
    expect(
      buildRegistrationMatch({
        businessId: 'biz-1',
        dateFrom: from,
        dateTo: to,
        campaignIds: [],
        adIds: ['ad-1'],
        sources: ['facebook', 'google'],
      }),
    ).toEqual({
      business_id: 'biz-1',
      timestamp: { $gte: from, $lte: to },
      ad_id: { $in: ['ad-1'] },
      source: { $in: ['facebook', 'google'] },
    })
  })

  it('requires an ad when asked and no ad ids are given', () => {
    expect(buildRegistrationMatch({ businessId: 'biz-1', dateFrom: from, withAdOnly: true })).toEqual({
      business_id: 'biz-1',
      timestamp: { $gte: from },
      ad_id: { $ne: null },
    })
  })

  it('lets explicit ad ids win over the ad requirement', () => {
    const match = buildRegistrationMatch({
      businessId: 'biz-1',
      dateFrom: from,
      campaignIds: ['c1'],
      adIds: ['ad-1'],
      withAdOnly: true,
    })
    expect(match.campaign_id).toEqual({ $in: ['c1'] })
    expect(match.ad_id).toEqual({ $in: ['ad-1'] })
  })
})
