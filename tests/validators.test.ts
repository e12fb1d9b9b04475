import { describe, expect, it } from 'vitest'
import { validateAd, validateAdUpdate } from '../src/validators/ad.schema'
import { validateCampaign } from '../src/validators/campaign.schema'
import { validateRegistration, validateRegistrationUpdate } from '../src/validators/registration.schema'
import { unwrap } from '../src/validators/result'
import { ValidationError } from '../src/utils/errors'

describe('ad validation', () => {
  it('trims the title and cleans tags', () => {
    const result = validateAd({ title: '  Fairy Lights  ', tags: [' aisle ', '', 'lighting'] })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value).toMatchObject({ title: 'Fairy Lights', status: 'active', tags: ['aisle', 'lighting'] })
  })

  it('reports a missing title', () => {
    expect(validateAd({})).toEqual({
      ok: false,
      issues: [{ path: 'title', message: 'Title is required.' }],
    })
  })

  it('accepts a blank creative url and rejects a malformed one', () => {
    const blank = validateAd({ title: 'x', creative_url: '  ' })
    expect(blank.ok && blank.value.creative_url).toBeNull()

    expect(validateAd({ title: 'x', creative_url: 'not a url' })).toEqual({
      ok: false,
      issues: [{ path: 'creative_url', message: 'creative_url must be a valid URL.' }],
    })
  })

  it('rejects unknown fields and statuses', () => {
    expect(validateAd({ title: 'x', business_id: 'other' }).ok).toBe(false)
    expect(validateAdUpdate({ status: 'deleted' })).toEqual({
      ok: false,
      issues: [{ path: 'status', message: 'Status must be one of active, paused, archived.' }],
    })
  })
})

describe('campaign validation', () => {
  it('applies defaults', () => {
    const result = validateCampaign({ name: 'Spring Gardens' })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value).toMatchObject({
      name: 'Spring Gardens',
      status: 'draft',
      ad_ids: [],
      business_type: 'wedding_decor',
      targeting: { locations: [], interests: [], devices: [] },
    })
  })

  it('requires the flight to end after it starts', () => {
    expect(
      validateCampaign({
        name: 'Spring Gardens',
        targeting: { start_date: '2024-03-10', end_date: '2024-03-01' },
      }),
    ).toEqual({
      ok: false,
      issues: [{ path: 'targeting.end_date', message: 'End date must be after start date.' }],
    })
  })

  it('parses targeting dates as UTC', () => {
    const result = validateCampaign({
      name: 'Spring Gardens',
      targeting: { start_date: '2024-03-01', end_date: '2024-03-01', budget_daily: 120 },
    })
    expect(result.ok && result.value.targeting.start_date).toEqual(new Date('2024-03-01T00:00:00Z'))
  })
})

describe('registration validation', () => {
  it('fills cost, meta and empty references', () => {
    const result = validateRegistration({
      campaign_id: 'c1',
      source: 'facebook',
      ad_id: ' ',
      timestamp: '2024-03-01T10:00:00Z',
    })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value).toMatchObject({
      campaign_id: 'c1',
      source: 'facebook',
      ad_id: null,
      user_id: null,
      cost: 0,
      meta: {},
      timestamp: new Date('2024-03-01T10:00:00Z'),
    })
  })

  it('rejects negative and fractional counts', () => {
    const base = { campaign_id: 'c1', source: 'facebook', timestamp: '2024-03-01' }
    expect(validateRegistration({ ...base, clicks: -1 })).toEqual({
      ok: false,
      issues: [{ path: 'clicks', message: 'clicks must be non-negative.' }],
    })
    expect(validateRegistration({ ...base, clicks: 1.5 })).toEqual({
      ok: false,
      issues: [{ path: 'clicks', message: 'clicks must be an integer.' }],
    })
  })

  it('rejects impossible calendar dates', () => {
    const base = { campaign_id: 'c1', source: 'facebook' }
    expect(validateRegistration({ ...base, timestamp: '2024-02-30' })).toEqual({
      ok: false,
      issues: [{ path: 'timestamp', message: 'timestamp must be a valid date.' }],
    })
    expect(validateRegistration({ ...base, timestamp: '2024-13-01' }).ok).toBe(false)
    expect(validateRegistration({ ...base, timestamp: '2024-02-29' }).ok).toBe(true)
  })

  it('does not let an update move a registration to another campaign', () => {
    expect(validateRegistrationUpdate({ campaign_id: 'c2' }).ok).toBe(false)
  })
})

describe('unwrap', () => {
  it('turns failed results into a 400 with the issues attached', () => {
    const result = validateAd({})
    try {
      unwrap(result, 'ad')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError)
      expect(error).toMatchObject({
        statusCode: 400,
        message: 'Invalid ad: title: Title is required.',
        details: [{ path: 'title', message: 'Title is required.' }],
      })
    }
  })
})
