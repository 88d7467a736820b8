import { Hono } from 'hono'
import { serve } from '@hono/node-server'
import type { AccountMonitor } from '../../core/account-monitor.ts'
import type { BalanceStore } from '../storage/balance-store.ts'
import type { ChartConfig } from '../../config/types.ts'
import { parsePeriod, toChartSeries } from '../../core/history.ts'
import { formatLocalDateTime } from '../../core/dates.ts'
import { logger } from '../logger.ts'
import { dashboardView, liveView } from './views.ts'

const TAG = 'Dashboard'

interface DashboardDeps {
  monitor: AccountMonitor
  store: BalanceStore
  chart: ChartConfig
  refreshSeconds: number
}

export function createDashboardApp(deps: DashboardDeps): Hono {
  const app = new Hono()
  const periodOf = (value: string | undefined) => parsePeriod(value, deps.chart.defaultPeriodDays)

  app.get('/', (c) => {
    return c.html(dashboardView({ periodDays: periodOf(c.req.query('period')), refreshSeconds: deps.refreshSeconds }))
  })

  // One refresh tick: fetch, save, then chart the history including the new row
  app.get('/partials/live', async (c) => {
    const periodDays = periodOf(c.req.query('period'))
    const summary = await deps.monitor.refresh()
    const history = deps.monitor.history(periodDays)
    return c.html(liveView({ summary, history, periodDays }))
  })

  app.get('/api/futures', async (c) => {
    const summary = await deps.monitor.refresh()
    if (!summary.ok) return c.json({ error: summary.error.message }, 500)
    return c.json({
      futuresTotal: summary.value.futuresTotal,
      positions: summary.value.positions,
      timestamp: formatLocalDateTime(summary.value.updatedAt),
    })
  })

  app.get('/api/history', (c) => {
    const periodDays = periodOf(c.req.query('period'))
    const history = deps.monitor.history(periodDays)
    if (!history.ok) return c.json({ error: history.error.message }, 500)
    return c.json({
      period: periodDays ?? 'all',
      empty: history.value.empty,
      points: toChartSeries(history.value.points),
    })
  })

  app.get('/api/health', (c) => {
    return c.json({ status: 'ok', snapshots: deps.store.count(), uptime: process.uptime() })
  })

  app.notFound((c) => {
    logger.warn(TAG, `Route not found: ${c.req.method} ${c.req.path}`)
    return c.json({ error: 'Route not found' }, 404)
  })

  app.onError((e, c) => {
    logger.error(TAG, `Unhandled error on ${c.req.method} ${c.req.path}`, e)
    return c.json({ error: 'Internal server error' }, 500)
  })

  return app
}

export type DashboardServer = ReturnType<typeof serve>

export function createDashboard(deps: DashboardDeps, port: number): DashboardServer {
  const app = createDashboardApp(deps)
  return serve({ fetch: app.fetch, port }, () => {
    logger.info(TAG, `Dashboard running at http://localhost:${port}`)
  })
}
