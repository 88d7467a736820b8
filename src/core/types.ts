import type { ExchangeError } from './errors.ts'
import type { Result } from './result.ts'

export interface SpotBalance {
  asset: string
  free: number
  locked: number
  total: number
}

export interface FuturesBalance {
  asset: string
  balance: number
  available: number
}

export type PositionSide = 'BOTH' | 'LONG' | 'SHORT'

export interface PositionView {
  symbol: string
  positionSide: PositionSide
  positionAmt: number
  entryPrice: number
  markPrice: number
  usdtValue: number
  leverage: number
  unRealizedProfit: number
  roe: number
}

export interface AccountSummary {
  futuresTotal: number
  spotTotal: number
  positions: PositionView[]
  totalPnl: number
  pnlPct: number
  totalSize: number
  sizePct: number
  overexposed: boolean
  updatedAt: Date
}

/** What the monitor needs from an exchange; implementations never throw. */
export interface AccountSource {
  fetchSpotBalance(): Promise<Result<SpotBalance[], ExchangeError>>
  fetchSpotValueUsdt(balances: SpotBalance[]): Promise<Result<number, ExchangeError>>
  fetchFuturesBalance(): Promise<Result<FuturesBalance[], ExchangeError>>
  fetchFuturesPositions(): Promise<Result<PositionView[], ExchangeError>>
}
