import type { FuturesBalance, PositionSide, PositionView, SpotBalance } from '../../core/types.ts'
import { computeRoe } from '../../core/account.ts'

// Binance sends numbers as decimal strings; these readers take the JSON as it comes

type JsonRecord = Record<string, unknown>

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function records(value: unknown): JsonRecord[] {
  return Array.isArray(value) ? value.filter(isRecord) : []
}

function num(value: unknown, fallback = 0): number {
  if (value === undefined || value === null || value === '') return fallback
  const n = Number(value)
  return Number.isFinite(n) ? n : Number.NaN
}

function str(value: unknown): string | null {
  return typeof value === 'string' && value !== '' ? value : null
}

export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MalformedResponseError'
  }
}

/** GET /api/v3/account → non-empty spot balances. */
export function parseSpotAccount(body: unknown): SpotBalance[] {
  if (!isRecord(body) || !Array.isArray(body.balances)) {
    throw new MalformedResponseError('account response has no balances array')
  }
  const out: SpotBalance[] = []
  for (const b of records(body.balances)) {
    const asset = str(b.asset)
    const free = num(b.free)
    const locked = num(b.locked)
    if (!asset || Number.isNaN(free) || Number.isNaN(locked)) continue
    if (free > 0 || locked > 0) out.push({ asset, free, locked, total: free + locked })
  }
  return out
}

/** GET /fapi/v2/balance → the quote-asset wallet only. */
export function parseFuturesBalances(body: unknown, quoteAsset = 'USDT'): FuturesBalance[] {
  if (!Array.isArray(body)) throw new MalformedResponseError('futures balance response is not an array')
  const entry = records(body).find(b => b.asset === quoteAsset)
  if (!entry) return []
  const balance = num(entry.balance)
  const available = num(entry.withdrawAvailable ?? entry.availableBalance, balance)
  return [{ asset: quoteAsset, balance, available }]
}

/** GET /fapi/v1/premiumIndex or /api/v3/ticker/price → symbol → price. */
export function parsePriceMap(body: unknown, field: 'markPrice' | 'price'): Map<string, number> {
  if (!Array.isArray(body)) throw new MalformedResponseError(`${field} response is not an array`)
  const prices = new Map<string, number>()
  for (const p of records(body)) {
    const symbol = str(p.symbol)
    const price = num(p[field], Number.NaN)
    if (symbol && Number.isFinite(price)) prices.set(symbol, price)
  }
  return prices
}

function toSide(value: unknown): PositionSide {
  return value === 'LONG' || value === 'SHORT' ? value : 'BOTH'
}

export interface ParsedPositions {
  positions: PositionView[]
  /** Symbols of entries that could not be read. */
  skipped: string[]
}

/** GET /fapi/v2/positionRisk → open positions valued at the mark price. */
export function parsePositions(body: unknown, markPrices: Map<string, number>): ParsedPositions {
  if (!Array.isArray(body)) throw new MalformedResponseError('position response is not an array')
  const positions: PositionView[] = []
  const skipped: string[] = []
  for (const pos of records(body)) {
    const symbol = str(pos.symbol)
    const amount = num(pos.positionAmt)
    if (amount === 0) continue
    const entryPrice = num(pos.entryPrice)
    const unrealized = num(pos.unRealizedProfit)
    const leverage = num(pos.leverage, 1)
    if (!symbol || [amount, entryPrice, unrealized, leverage].some(Number.isNaN)) {
      skipped.push(symbol ?? '(unknown)')
      continue
    }
    const markPrice = markPrices.get(symbol) ?? 0
    positions.push({
      symbol,
      positionSide: toSide(pos.positionSide),
      positionAmt: amount,
      entryPrice,
      markPrice,
      usdtValue: Math.abs(amount) * markPrice,
      leverage: leverage ? Math.trunc(leverage) : 1,
      unRealizedProfit: unrealized,
      roe: computeRoe(unrealized, amount, entryPrice),
    })
  }
  return { positions, skipped }
}

/** Binance error bodies look like `{ "code": -2015, "msg": "..." }`. */
export function errorMessage(body: unknown): string | null {
  return isRecord(body) ? str(body.msg) : null
}
