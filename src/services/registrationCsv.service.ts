import registrationService, { RegistrationFilter } from './registration.service'
import { TenantContext } from '../types/tenant'
import { AppError } from '../utils/errors'
import { parseCsvRecords, toCsv } from '../utils/csv'
import { toUtcDate } from '../utils/dates'
import logger from '../utils/logger'

export const EXPORT_COLUMNS = [
  'timestamp',
  'campaign_id',
  'ad_id',
  'source',
  'messages',
  'spent',
  'reach',
  'impressions',
  'clicks',
  'user_id',
  'business_id',
  'created_at',
  'updated_at',
] as const

export const IMPORT_COLUMNS = [
  'campaign_id',
  'ad_id',
  'source',
  'cost',
  'spent',
  'messages',
  'reach',
  'impressions',
  'clicks',
  'timestamp',
  'user_id',
  'meta',
] as const

export interface ImportRowError {
  row: number // 1-based data row, header excluded
  message: string
}

export interface ImportSummary {
  successes: number
  failures: number
  errors: ImportRowError[]
}

export type ImportRowPayload = {
  campaign_id: string
  ad_id: string | null
  source: string
  cost: number
  spent: number
  messages: number
  reach: number
  impressions: number
  clicks: number
  timestamp: Date
  user_id: string | null
  meta: Record<string, unknown>
}

export type RowParseResult = { ok: true; payload: ImportRowPayload } | { ok: false; message: string }

const cell = (record: Record<string, string>, column: string): string => (record[column] ?? '').trim()

const parseCount = (raw: string, column: string): number => {
  if (raw === '') return 0
  const value = Number(raw)
  if (!Number.isInteger(value)) {
    throw new Error(`${column} must be an integer.`)
  }
  return value
}

const parseAmount = (raw: string, column: string, fallback: number): number => {
  if (raw === '') return fallback
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new Error(`${column} must be a number.`)
  }
  return value
}

const parseMeta = (raw: string): Record<string, unknown> => {
  if (!raw) return {}
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    // unparseable meta is dropped, the row still imports
    return {}
  }
  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed))
  }
  return {}
}

/**
 * Turns one CSV record into a registration payload. Blank counts read as 0,
 * blank `spent` takes `cost`, blank `source` is `organic`.
 */
export const parseImportRow = (record: Record<string, string>): RowParseResult => {
  const timestamp = toUtcDate(cell(record, 'timestamp'))
  if (!timestamp) {
    return { ok: false, message: 'timestamp is missing or not a valid date.' }
  }

  try {
    const cost = parseAmount(cell(record, 'cost'), 'cost', 0)
    return {
      ok: true,
      payload: {
        campaign_id: cell(record, 'campaign_id'),
        ad_id: cell(record, 'ad_id') || null,
        source: cell(record, 'source') || 'organic',
        cost,
        spent: parseAmount(cell(record, 'spent'), 'spent', cost),
        messages: parseCount(cell(record, 'messages'), 'messages'),
        reach: parseCount(cell(record, 'reach'), 'reach'),
        impressions: parseCount(cell(record, 'impressions'), 'impressions'),
        clicks: parseCount(cell(record, 'clicks'), 'clicks'),
        timestamp,
        user_id: cell(record, 'user_id') || null,
        meta: parseMeta(cell(record, 'meta')),
      },
    }
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) }
  }
}

class RegistrationCsvService {
  async exportCsv(ctx: TenantContext, filter: RegistrationFilter): Promise<string> {
    const registrations = await registrationService.findAll(ctx, filter)
    const rows = registrations.map((registration) => ({
      timestamp: registration.timestamp,
      campaign_id: registration.campaign_id,
      ad_id: registration.ad_id,
      source: registration.source,
      messages: registration.messages,
      spent: registration.spent,
      reach: registration.reach,
      impressions: registration.impressions,
      clicks: registration.clicks,
      user_id: registration.user_id,
      business_id: registration.business_id,
      created_at: registration.created_at,
      updated_at: registration.updated_at,
    }))
    logger.info(`[RegistrationCsv] Exported ${rows.length} registrations for ${ctx.businessId}`)
    return toCsv(EXPORT_COLUMNS, rows)
  }

  /**
   * Creates one registration per row. Rejected rows are tallied and the import
   * continues; rows written before a failure stay written. Errors that are not
   * row-level (e.g. the database is down) abort the import.
   */
  async importCsv(ctx: TenantContext, text: string): Promise<ImportSummary> {
    const start = Date.now()
    const records = parseCsvRecords(text)
    const summary: ImportSummary = { successes: 0, failures: 0, errors: [] }

    for (const [index, record] of records.entries()) {
      const row = index + 1
      const parsed = parseImportRow(record)
      if (!parsed.ok) {
        summary.failures++
        summary.errors.push({ row, message: parsed.message })
        continue
      }

      try {
        await registrationService.create(ctx, parsed.payload)
        summary.successes++
      } catch (error) {
        if (!(error instanceof AppError)) throw error
        summary.failures++
        summary.errors.push({ row, message: error.message })
      }
    }

    logger.info(
      `[RegistrationCsv] Import for ${ctx.businessId}: ${summary.successes} imported, ${summary.failures} failed`,
    )
    logger.timerLog('[RegistrationCsv] importCsv', start)
    return summary
  }
}

export default new RegistrationCsvService()
