export type MonitorMode = 'paper' | 'live'

export interface BinanceConfig {
  apiKey: string
  apiSecret: string
  spotUrl: string
  futuresUrl: string
  requestTimeoutMs: number
}

export interface ChartConfig {
  /** Snapshots before this local date are left off every chart. */
  floorDate: Date | null
  /** Period shown when the request names none; null is all time. */
  defaultPeriodDays: number | null
  dropZeroBalances: boolean
}

export interface MonitorConfig {
  mode: MonitorMode
  binance: BinanceConfig
  storage: {
    dbPath: string
    lockTimeoutMs: number
  }
  chart: ChartConfig
  trackSpot: boolean
  exposure: {
    sizeWarnMultiple: number
    sizeCapacityMultiple: number
  }
  dashboard: {
    port: number
    refreshSeconds: number
  }
}
