import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest'
import { AccountMonitor } from '../../src/core/account-monitor.ts'
import { createDb, type Db } from '../../src/infrastructure/storage/db.ts'
import { ALL_HISTORY, BalanceStore } from '../../src/infrastructure/storage/balance-store.ts'
import { ExchangeError, HistoryDataError } from '../../src/core/errors.ts'
import { err, ok } from '../../src/core/result.ts'
import type { AccountSource, PositionView } from '../../src/core/types.ts'
import type { ChartConfig } from '../../src/config/types.ts'

const now = new Date(2025, 7, 20, 12, 0)

const btc: PositionView = {
  symbol: 'BTCUSDT',
  positionSide: 'BOTH',
  positionAmt: 0.05,
  entryPrice: 60000,
  markPrice: 61200,
  usdtValue: 3060,
  leverage: 10,
  unRealizedProfit: 60,
  roe: 2,
}

function fakeSource(overrides: Partial<AccountSource> = {}): AccountSource {
  return {
    fetchSpotBalance: vi.fn(async () => ok([{ asset: 'USDT', free: 250, locked: 0, total: 250 }])),
    fetchSpotValueUsdt: vi.fn(async () => ok(250)),
    fetchFuturesBalance: vi.fn(async () => ok([{ asset: 'USDT', balance: 1000, available: 800 }])),
    fetchFuturesPositions: vi.fn(async () => ok([btc])),
    ...overrides,
  }
}

const chart: ChartConfig = { floorDate: null, defaultPeriodDays: 30, dropZeroBalances: true }
const limits = { sizeWarnMultiple: 10, sizeCapacityMultiple: 20 }

describe('AccountMonitor', () => {
  let db: Db
  let store: BalanceStore

  beforeEach(() => {
    db = createDb(':memory:')
    store = new BalanceStore(db, () => now)
  })

  afterEach(() => {
    store.close()
  })

  const monitorFor = (source: AccountSource, overrides: { trackSpot?: boolean; chart?: ChartConfig } = {}) =>
    new AccountMonitor(source, store, {
      trackSpot: overrides.trackSpot ?? false,
      chart: overrides.chart ?? chart,
      limits,
      clock: () => now,
    })

  test('refresh saves one snapshot and returns the summary', async () => {
    const source = fakeSource()
    const result = await monitorFor(source).refresh()

    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value).toMatchObject({ futuresTotal: 1000, spotTotal: 0, totalPnl: 60, totalSize: 3060 })
      expect(result.value.positions).toEqual([btc])
    }
    expect(store.querySince(1)).toMatchObject([{ spotBalance: 0, futuresBalance: 1000, totalBalance: 1000 }])
    expect(source.fetchSpotBalance).not.toHaveBeenCalled()
  })

  test('spot is valued and saved when tracked', async () => {
    const result = await monitorFor(fakeSource(), { trackSpot: true }).refresh()
    expect(result.ok && result.value.spotTotal).toBe(250)
    expect(store.querySince(1)).toMatchObject([{ spotBalance: 250, futuresBalance: 1000, totalBalance: 1250 }])
  })

  test('a failing spot fetch saves spot as 0', async () => {
    const source = fakeSource({
      fetchSpotBalance: vi.fn(async () => err(new ExchangeError('/api/v3/account', 'request failed'))),
    })
    await monitorFor(source, { trackSpot: true }).refresh()
    expect(store.querySince(1)).toMatchObject([{ spotBalance: 0, futuresBalance: 1000 }])
    expect(source.fetchSpotValueUsdt).not.toHaveBeenCalled()
  })

  test('a failing futures balance skips the snapshot', async () => {
    const source = fakeSource({
      fetchFuturesBalance: vi.fn(async () => err(new ExchangeError('/fapi/v2/balance', 'HTTP 500: boom', { status: 500 }))),
    })
    const result = await monitorFor(source).refresh()

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('/fapi/v2/balance: HTTP 500: boom')
    expect(store.count()).toBe(0)
  })

  test('failing positions still save the balance', async () => {
    const source = fakeSource({
      fetchFuturesPositions: vi.fn(async () => err(new ExchangeError('/fapi/v2/positionRisk', 'request failed'))),
    })
    const result = await monitorFor(source).refresh()

    expect(result.ok && result.value.positions).toEqual([])
    expect(store.count()).toBe(1)
  })

  test('the futures total sums every returned balance', async () => {
    const source = fakeSource({
      fetchFuturesBalance: vi.fn(async () => ok([
        { asset: 'USDT', balance: 600, available: 600 },
        { asset: 'USDT', balance: 400.5, available: 0 },
      ])),
    })
    await monitorFor(source).refresh()
    expect(store.querySince(1)[0].futuresBalance).toBe(1000.5)
  })

  test('concurrent refreshes share one cycle', async () => {
    let release: () => void = () => {}
    const gate = new Promise<void>(resolve => { release = resolve })
    const source = fakeSource({
      fetchFuturesBalance: vi.fn(async () => {
        await gate
        return ok([{ asset: 'USDT', balance: 1000, available: 800 }])
      }),
    })
    const monitor = monitorFor(source)

    const first = monitor.refresh()
    const second = monitor.refresh()
    expect(second).toBe(first)
    release()
    await Promise.all([first, second])

    expect(source.fetchFuturesBalance).toHaveBeenCalledTimes(1)
    expect(store.count()).toBe(1)

    await monitor.refresh()
    expect(source.fetchFuturesBalance).toHaveBeenCalledTimes(2)
    expect(store.count()).toBe(2)
  })

  test('history aggregates stored snapshots by day', async () => {
    const monitor = monitorFor(fakeSource())
    await monitor.refresh()
    store.save(0, 1200)

    const history = monitor.history(30)
    expect(history.ok).toBe(true)
    if (history.ok) {
      expect(history.value.empty).toBe(false)
      expect(history.value.points).toEqual([
        { date: new Date(2025, 7, 20), minBalance: 1000, maxBalance: 1200, openBalance: 1000, closeBalance: 1200 },
      ])
    }
  })

  test('history of an empty store is flagged empty with a zero point', () => {
    const history = monitorFor(fakeSource()).history(null)
    expect(history).toEqual({
      ok: true,
      value: { empty: true, points: [{ date: now, minBalance: 0, maxBalance: 0, openBalance: 0, closeBalance: 0 }] },
    })
  })

  test('history applies the configured floor date', () => {
    store.importDaily(new Date(2025, 6, 30), 500)
    store.importDaily(new Date(2025, 7, 2), 700)
    const monitor = monitorFor(fakeSource(), { chart: { ...chart, floorDate: new Date(2025, 7, 1) } })

    const history = monitor.history(null)
    expect(history.ok && history.value.points.map(p => p.closeBalance)).toEqual([700])
  })

  test('history is flagged empty when every snapshot predates the floor date', () => {
    store.importDaily(new Date(2025, 6, 20), 500)
    const monitor = monitorFor(fakeSource(), { chart: { ...chart, floorDate: new Date(2025, 7, 1) } })

    expect(monitor.history(null)).toEqual({
      ok: true,
      value: { empty: true, points: [{ date: now, minBalance: 0, maxBalance: 0, openBalance: 0, closeBalance: 0 }] },
    })
  })

  test('a malformed stored timestamp surfaces as HistoryDataError', () => {
    db.prepare(`
      INSERT INTO balance_history (timestamp, spot_balance, futures_balance, total_balance)
      VALUES ('garbage', 0, 1, 1)
    `).run()

    const history = monitorFor(fakeSource()).history(null)
    expect(history.ok).toBe(false)
    if (!history.ok) expect(history.error).toBeInstanceOf(HistoryDataError)
    expect(store.querySince(ALL_HISTORY)).toHaveLength(1)
  })
})
