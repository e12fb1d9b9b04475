import { Request, Response, NextFunction } from 'express'
import { metricsService } from '../domain/analytics/metrics.service'
import { getTenantContext } from '../middlewares/auth'
import { parseAnalyticsQuery } from '../validators/query.schema'

/**
 * 报名数据分析接口
 * 公共查询参数：dateFrom, dateTo, campaignIds, adIds, sources
 */

export const getKpis = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { filter } = parseAnalyticsQuery(req.query)
    const data = await metricsService.getTotals(getTenantContext(req), filter)
    res.json({ success: true, data })
  } catch (error) {
    next(error)
  }
}

export const getFullKpis = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { filter } = parseAnalyticsQuery(req.query)
    const data = await metricsService.getFullKpis(getTenantContext(req), filter)
    res.json({ success: true, data })
  } catch (error) {
    next(error)
  }
}

export const getDaily = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { filter } = parseAnalyticsQuery(req.query)
    const data = await metricsService.getDailySeries(getTenantContext(req), filter)
    res.json({ success: true, data })
  } catch (error) {
    next(error)
  }
}

export const getCampaigns = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { filter } = parseAnalyticsQuery(req.query)
    const data = await metricsService.getCampaignRollup(getTenantContext(req), filter)
    res.json({ success: true, data })
  } catch (error) {
    next(error)
  }
}

// ?campaignId= 只看单个活动
export const getAds = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { filter, campaignId } = parseAnalyticsQuery(req.query)
    const data = await metricsService.getAdPerformance(getTenantContext(req), filter, campaignId)
    res.json({ success: true, data })
  } catch (error) {
    next(error)
  }
}

export const getTopAds = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { filter, limit } = parseAnalyticsQuery(req.query)
    const data = await metricsService.getTopAdsByImpressions(getTenantContext(req), filter, limit)
    res.json({ success: true, data })
  } catch (error) {
    next(error)
  }
}

export const getAdTable = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { filter } = parseAnalyticsQuery(req.query)
    const data = await metricsService.getAdPerformanceTable(getTenantContext(req), filter)
    res.json({ success: true, data })
  } catch (error) {
    next(error)
  }
}
