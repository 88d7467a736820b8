import 'dotenv/config'
import { readFileSync } from 'node:fs'
import { loadConfig } from '../src/config/index.ts'
import { logger } from '../src/infrastructure/logger.ts'
import { BalanceStore } from '../src/infrastructure/storage/balance-store.ts'
import { importHistory, parseImportFile } from '../src/infrastructure/storage/history-import.ts'

// Usage: npm run import-history -- <file.json>
function main(): number {
  const file = process.argv[2]
  if (!file) {
    logger.error('Import', 'Usage: npm run import-history -- <file.json>')
    return 1
  }

  const config = loadConfig()
  const entries = parseImportFile(JSON.parse(readFileSync(file, 'utf-8')))
  const store = BalanceStore.open(config.storage.dbPath, config.storage.lockTimeoutMs)
  if (!store.isOpen) return 1

  try {
    logger.info('Import', `Starting historical data import from ${file}...`)
    const report = importHistory(store, entries)
    return report.failed > 0 ? 1 : 0
  } finally {
    store.close()
  }
}

try {
  process.exitCode = main()
} catch (err) {
  logger.error('Import', 'Data import failed', err)
  process.exitCode = 1
}
