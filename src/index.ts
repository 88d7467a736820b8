import 'dotenv/config'
import { startMonitor, type RunningMonitor } from './monitor.ts'
import { logger } from './infrastructure/logger.ts'

let running: RunningMonitor | null = null

async function stop(code: number): Promise<void> {
  await running?.shutdown()
  process.exit(code)
}

process.on('SIGINT', () => void stop(0))
process.on('SIGTERM', () => {
  logger.info('monitor', 'SIGTERM received. Shutting down gracefully')
  void stop(0)
})
process.on('uncaughtException', (e) => {
  logger.error('FATAL', 'Uncaught exception', e)
  void stop(1)
})

try {
  running = startMonitor()
} catch (e) {
  logger.error('FATAL', 'Failed to start monitor', e)
  void stop(1)
}
