import type { BalanceStore } from './balance-store.ts'
import { parseLocalDay } from '../../core/dates.ts'
import { logger } from '../logger.ts'

const TAG = 'Import'

export interface ImportEntry {
  /** `DD.MM.YYYY` or `YYYY-MM-DD` */
  date: string
  futuresBalance: number
  spotBalance?: number
}

export interface ImportReport {
  added: number
  skipped: number
  invalid: number
  failed: number
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validates the decoded import file: an array of
 * `{ date, futuresBalance, spotBalance? }`. Entries of the wrong shape are
 * returned as-is with `date` set to their JSON so the import counts them invalid.
 */
export function parseImportFile(raw: unknown): ImportEntry[] {
  if (!Array.isArray(raw)) throw new Error('import file must contain a JSON array')
  return raw.map((item): ImportEntry => {
    if (!isRecord(item) || typeof item.date !== 'string' || typeof item.futuresBalance !== 'number') {
      return { date: JSON.stringify(item), futuresBalance: Number.NaN }
    }
    return {
      date: item.date,
      futuresBalance: item.futuresBalance,
      spotBalance: typeof item.spotBalance === 'number' ? item.spotBalance : undefined,
    }
  })
}

/** Back-fills one snapshot per day; days that already have data are skipped. */
export function importHistory(store: BalanceStore, entries: readonly ImportEntry[]): ImportReport {
  const report: ImportReport = { added: 0, skipped: 0, invalid: 0, failed: 0 }

  for (const entry of entries) {
    const day = parseLocalDay(entry.date)
    if (!day || !Number.isFinite(entry.futuresBalance)) {
      logger.error(TAG, `Invalid entry ${entry.date}`)
      report.invalid++
      continue
    }
    const result = store.importDaily(day, entry.futuresBalance, entry.spotBalance ?? 0)
    if (!result.ok) {
      logger.error(TAG, `Database error on ${entry.date}`, result.error)
      report.failed++
    } else if (result.value) {
      logger.info(TAG, `Added: ${entry.date} - Futures: ${entry.futuresBalance.toFixed(2)} USDT`)
      report.added++
    } else {
      logger.info(TAG, `Skipped (exists): ${entry.date}`)
      report.skipped++
    }
  }

  logger.info(TAG, `Import completed. Added: ${report.added}, Skipped: ${report.skipped}, Invalid: ${report.invalid}, Failed: ${report.failed}`)
  return report
}
