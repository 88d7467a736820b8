import { createDb, DEFAULT_LOCK_TIMEOUT_MS, type Db } from './db.ts'
import { logger } from '../logger.ts'
import { StorageError } from '../../core/errors.ts'
import { DAY_MS, nextLocalDay, startOfLocalDay } from '../../core/dates.ts'
import { err, ok, type Result } from '../../core/result.ts'

const TAG = 'BalanceStore'

/** Lookback that covers every stored snapshot. */
export const ALL_HISTORY = Number.POSITIVE_INFINITY

export interface BalanceSnapshot {
  id: number
  timestamp: Date
  spotBalance: number
  futuresBalance: number
  totalBalance: number
}

interface BalanceRow {
  id: number
  timestamp: string
  spot_balance: number
  futures_balance: number
  total_balance: number
}

function toSnapshot(r: BalanceRow): BalanceSnapshot {
  return {
    id: r.id,
    timestamp: new Date(r.timestamp),
    spotBalance: r.spot_balance,
    futuresBalance: r.futures_balance,
    totalBalance: r.total_balance,
  }
}

/**
 * Append-only log of balance snapshots.
 *
 * Owns one connection for the process lifetime. Statements run synchronously
 * on the event loop, so writes from this process never interleave; writes from
 * another connection to the same file wait up to the busy timeout, then fail.
 * The plain methods (`save`, `querySince`) log failures and degrade to "no
 * data"; the `try*` methods hand the error back instead.
 */
export class BalanceStore {
  constructor(
    private db: Db | null,
    private clock: () => Date = () => new Date(),
  ) {}

  /** Opens the file at `path`. A store that fails to open is returned closed. */
  static open(path: string, lockTimeoutMs = DEFAULT_LOCK_TIMEOUT_MS): BalanceStore {
    try {
      const store = new BalanceStore(createDb(path, lockTimeoutMs))
      logger.info(TAG, `Database initialized at ${path}`)
      return store
    } catch (e) {
      logger.error(TAG, 'Database initialization failed', { path }, e)
      return new BalanceStore(null)
    }
  }

  get isOpen(): boolean {
    return this.db !== null
  }

  trySave(spotTotal: number, futuresTotal: number): Result<BalanceSnapshot, StorageError> {
    const params = { spotTotal, futuresTotal }
    if (!Number.isFinite(spotTotal) || !Number.isFinite(futuresTotal)) {
      return err(new StorageError('save', params, new RangeError('balances must be finite numbers')))
    }
    if (spotTotal < 0 || futuresTotal < 0) {
      logger.warn(TAG, 'Saving negative balance', params)
    }
    if (!this.db) return err(new StorageError('save', params, new Error('store is closed')))

    const timestamp = this.clock()
    const totalBalance = spotTotal + futuresTotal
    try {
      const result = this.db.prepare<{ timestamp: string; spot: number; futures: number; total: number }>(`
        INSERT INTO balance_history (timestamp, spot_balance, futures_balance, total_balance)
        VALUES (@timestamp, @spot, @futures, @total)
      `).run({ timestamp: timestamp.toISOString(), spot: spotTotal, futures: futuresTotal, total: totalBalance })
      return ok({ id: Number(result.lastInsertRowid), timestamp, spotBalance: spotTotal, futuresBalance: futuresTotal, totalBalance })
    } catch (e) {
      return err(new StorageError('save', params, e))
    }
  }

  /** Appends one snapshot stamped now. Never throws; failures are logged. */
  save(spotTotal: number, futuresTotal: number): void {
    const result = this.trySave(spotTotal, futuresTotal)
    if (result.ok) {
      logger.info(TAG, `Saved balances - Spot: ${spotTotal.toFixed(2)}, Futures: ${futuresTotal.toFixed(2)}`)
    } else {
      logger.error(TAG, 'Error saving balances', result.error.params, result.error)
    }
  }

  tryQuerySince(lookbackDays: number): Result<BalanceSnapshot[], StorageError> {
    const params = { lookbackDays }
    if (Number.isNaN(lookbackDays) || lookbackDays <= 0) {
      return err(new StorageError('querySince', params, new RangeError('lookbackDays must be positive')))
    }
    if (!this.db) return err(new StorageError('querySince', params, new Error('store is closed')))

    // Cutoffs before the epoch (or ALL_HISTORY) compare against '' and match every row
    const cutoff = this.clock().getTime() - lookbackDays * DAY_MS
    const since = cutoff > 0 ? new Date(cutoff).toISOString() : ''
    try {
      const rows = this.db.prepare<{ since: string }, BalanceRow>(`
        SELECT id, timestamp, spot_balance, futures_balance, total_balance
        FROM balance_history
        WHERE timestamp >= @since
        ORDER BY timestamp ASC, id ASC
      `).all({ since })
      return ok(rows.map(toSnapshot))
    } catch (e) {
      return err(new StorageError('querySince', params, e))
    }
  }

  /** Snapshots from the last `lookbackDays` days, oldest first. Empty on failure. */
  querySince(lookbackDays: number): BalanceSnapshot[] {
    const result = this.tryQuerySince(lookbackDays)
    if (result.ok) return result.value
    logger.error(TAG, 'Error getting balance history', result.error.params, result.error)
    return []
  }

  /**
   * Back-fills one snapshot at local midnight of `day`, unless a snapshot
   * already exists on that calendar day. Returns whether a row was written.
   */
  importDaily(day: Date, futuresBalance: number, spotBalance = 0): Result<boolean, StorageError> {
    const params = { day: day.toISOString(), futuresBalance, spotBalance }
    if (!Number.isFinite(futuresBalance) || !Number.isFinite(spotBalance)) {
      return err(new StorageError('importDaily', params, new RangeError('balances must be finite numbers')))
    }
    const db = this.db
    if (!db) return err(new StorageError('importDaily', params, new Error('store is closed')))

    const start = startOfLocalDay(day).toISOString()
    const end = nextLocalDay(day).toISOString()
    try {
      const insertIfMissing = db.transaction((): boolean => {
        const existing = db.prepare<{ start: string; end: string }, { id: number }>(
          `SELECT id FROM balance_history WHERE timestamp >= @start AND timestamp < @end LIMIT 1`,
        ).get({ start, end })
        if (existing) return false
        db.prepare<{ timestamp: string; spot: number; futures: number; total: number }>(`
          INSERT INTO balance_history (timestamp, spot_balance, futures_balance, total_balance)
          VALUES (@timestamp, @spot, @futures, @total)
        `).run({ timestamp: start, spot: spotBalance, futures: futuresBalance, total: spotBalance + futuresBalance })
        return true
      })
      return ok(insertIfMissing())
    } catch (e) {
      return err(new StorageError('importDaily', params, e))
    }
  }

  count(): number {
    if (!this.db) return 0
    try {
      const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM balance_history').get()
      return row?.n ?? 0
    } catch (e) {
      logger.error(TAG, 'Error counting snapshots', e)
      return 0
    }
  }

  /** Idempotent; safe on a store that never opened. */
  close(): void {
    const db = this.db
    if (!db) return
    this.db = null
    try {
      db.close()
      logger.info(TAG, 'Database connection closed')
    } catch (e) {
      logger.error(TAG, 'Error closing connection', e)
    }
  }
}
