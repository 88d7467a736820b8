import type { MonitorConfig, MonitorMode } from './types.ts'
import { parseLocalDay } from '../core/dates.ts'

function parseMode(value: string | undefined): MonitorMode {
  const mode = value ?? 'paper'
  if (mode !== 'paper' && mode !== 'live') {
    throw new Error(`MONITOR_MODE must be 'paper' or 'live', got '${mode}'`)
  }
  return mode
}

function parseNumber(name: string, fallback: number): number {
  const raw = process.env[name]
  const value = raw === undefined || raw === '' ? fallback : Number(raw)
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got '${raw}'`)
  }
  return value
}

function parseFloorDate(raw: string | undefined): Date | null {
  if (!raw) return null
  const date = parseLocalDay(raw)
  if (!date) throw new Error(`CHART_FLOOR_DATE must be YYYY-MM-DD, got '${raw}'`)
  return date
}

function parseDefaultPeriod(raw: string | undefined): number | null {
  if (raw === 'all') return null
  if (raw === undefined || raw === '') return 30
  const days = Number(raw)
  if (!Number.isInteger(days) || days <= 0) {
    throw new Error(`CHART_DEFAULT_PERIOD must be a positive integer or 'all', got '${raw}'`)
  }
  return days
}

export function loadConfig(): MonitorConfig {
  const mode = parseMode(process.env.MONITOR_MODE)

  if (mode === 'live') {
    const missing = ['BINANCE_API_KEY', 'BINANCE_API_SECRET'].filter(name => !process.env[name])
    if (missing.length > 0) {
      throw new Error(`Missing required config variables: ${missing.join(', ')}`)
    }
  }

  return {
    mode,
    binance: {
      apiKey: process.env.BINANCE_API_KEY ?? '',
      apiSecret: process.env.BINANCE_API_SECRET ?? '',
      spotUrl: process.env.BINANCE_API_URL ?? 'https://api.binance.com',
      futuresUrl: process.env.BINANCE_FUTURES_API_URL ?? 'https://fapi.binance.com',
      requestTimeoutMs: parseNumber('BINANCE_REQUEST_TIMEOUT', 10) * 1000,
    },
    storage: {
      dbPath: process.env.DB_PATH ?? './data/balances.db',
      lockTimeoutMs: parseNumber('DB_LOCK_TIMEOUT_MS', 10_000),
    },
    chart: {
      floorDate: parseFloorDate(process.env.CHART_FLOOR_DATE),
      defaultPeriodDays: parseDefaultPeriod(process.env.CHART_DEFAULT_PERIOD),
      dropZeroBalances: process.env.CHART_DROP_ZERO !== 'false',
    },
    trackSpot: process.env.TRACK_SPOT === 'true',
    exposure: {
      sizeWarnMultiple: parseNumber('SIZE_WARN_MULTIPLE', 10),
      sizeCapacityMultiple: parseNumber('SIZE_CAPACITY_MULTIPLE', 20),
    },
    dashboard: {
      port: parseNumber('DASHBOARD_PORT', 8066),
      refreshSeconds: parseNumber('REFRESH_SECONDS', 300),
    },
  }
}
