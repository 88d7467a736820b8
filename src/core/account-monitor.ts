import { ALL_HISTORY, type BalanceStore } from '../infrastructure/storage/balance-store.ts'
import type { ChartConfig } from '../config/types.ts'
import type { AccountSource, AccountSummary, PositionView } from './types.ts'
import { HistoryDataError, type ExchangeError } from './errors.ts'
import { aggregateDaily, zeroPoint, type ChartPoint } from './history.ts'
import { summarizeAccount, type ExposureLimits } from './account.ts'
import { err, ok, unwrapOr, type Result } from './result.ts'
import { logger } from '../infrastructure/logger.ts'

const TAG = 'Monitor'

interface MonitorOptions {
  trackSpot: boolean
  chart: ChartConfig
  limits: ExposureLimits
  clock?: () => Date
}

export interface HistoryView {
  points: ChartPoint[]
  /** True when no snapshot survives the floor date and period; `points` then holds a zero placeholder. */
  empty: boolean
}

export class AccountMonitor {
  private inFlight: Promise<Result<AccountSummary, ExchangeError>> | null = null
  private clock: () => Date

  constructor(
    private source: AccountSource,
    private store: BalanceStore,
    private options: MonitorOptions,
  ) {
    this.clock = options.clock ?? (() => new Date())
  }

  /**
   * One fetch → save cycle. Callers arriving while a cycle runs share it, so
   * simultaneous dashboard refreshes cost one exchange round trip and one row.
   */
  refresh(): Promise<Result<AccountSummary, ExchangeError>> {
    if (!this.inFlight) {
      this.inFlight = this.runCycle().finally(() => {
        this.inFlight = null
      })
    }
    return this.inFlight
  }

  private async runCycle(): Promise<Result<AccountSummary, ExchangeError>> {
    logger.info(TAG, 'Getting futures data from Binance API...')
    const [balances, positionsResult] = await Promise.all([
      this.source.fetchFuturesBalance(),
      this.source.fetchFuturesPositions(),
    ])

    // Without a balance there is nothing true to save; the next tick retries
    if (!balances.ok) {
      logger.error(TAG, 'Futures balance unavailable, snapshot skipped', balances.error)
      return balances
    }

    const futuresTotal = balances.value.reduce((sum, b) => sum + b.balance, 0)
    const positions: PositionView[] = unwrapOr(positionsResult, [], e =>
      logger.warn(TAG, 'Positions unavailable, showing none', e))
    const spotTotal = this.options.trackSpot ? await this.spotTotal() : 0

    this.store.save(spotTotal, futuresTotal)

    return ok(summarizeAccount({
      futuresTotal,
      spotTotal,
      positions,
      limits: this.options.limits,
      now: this.clock(),
    }))
  }

  private async spotTotal(): Promise<number> {
    const balances = await this.source.fetchSpotBalance()
    if (!balances.ok) {
      logger.warn(TAG, 'Spot balance unavailable, saving spot as 0', balances.error)
      return 0
    }
    return unwrapOr(await this.source.fetchSpotValueUsdt(balances.value), 0, e =>
      logger.warn(TAG, 'Spot valuation failed, saving spot as 0', e))
  }

  /** Daily chart points for the trailing `periodDays` (null: all time). */
  history(periodDays: number | null): Result<HistoryView, HistoryDataError> {
    const snapshots = this.store.querySince(periodDays ?? ALL_HISTORY)
    logger.debug(TAG, `Balance history records: ${snapshots.length}`)
    const now = this.clock()
    try {
      const points = aggregateDaily(snapshots, {
        periodDays,
        floorDate: this.options.chart.floorDate,
        dropZeroBalances: this.options.chart.dropZeroBalances,
        now,
      })
      if (points.length === 0) return ok({ points: [zeroPoint(now)], empty: true })
      return ok({ points, empty: false })
    } catch (e) {
      if (!(e instanceof HistoryDataError)) throw e
      logger.error(TAG, 'Balance history is malformed', e)
      return err(e)
    }
  }
}
