import { loadConfig } from './config/index.ts'
import { BalanceStore } from './infrastructure/storage/balance-store.ts'
import { BinanceClient } from './infrastructure/binance/client.ts'
import { AccountMonitor } from './core/account-monitor.ts'
import { createDashboard } from './infrastructure/dashboard/server.ts'
import { logger } from './infrastructure/logger.ts'

const TAG = 'monitor'

export interface RunningMonitor {
  /** Stops the server and closes the store; later calls are no-ops. */
  shutdown(): Promise<void>
}

export function startMonitor(): RunningMonitor {
  const config = loadConfig()
  logger.info(TAG, `Starting in ${config.mode.toUpperCase()} mode...`)

  // Infrastructure: one store for the process lifetime, handed to whoever needs it
  const store = BalanceStore.open(config.storage.dbPath, config.storage.lockTimeoutMs)
  const client = new BinanceClient({ mode: config.mode, ...config.binance })

  const monitor = new AccountMonitor(client, store, {
    trackSpot: config.trackSpot,
    chart: config.chart,
    limits: config.exposure,
  })

  const server = createDashboard(
    { monitor, store, chart: config.chart, refreshSeconds: config.dashboard.refreshSeconds },
    config.dashboard.port,
  )
  logger.info(TAG, `Refresh interval: ${config.dashboard.refreshSeconds}s (browser driven)`)

  let closing: Promise<void> | null = null
  return {
    shutdown() {
      closing ??= new Promise<void>((resolve) => {
        server.close((e) => {
          if (e) logger.error(TAG, 'Error stopping dashboard', e)
          store.close()
          resolve()
        })
      })
      return closing
    },
  }
}
