import type { AccountSummary, PositionView } from './types.ts'

/** Return on equity in percent; 0 when the position has no entry value. */
export function computeRoe(unrealized: number, positionAmt: number, entryPrice: number): number {
  if (!entryPrice || !positionAmt) return 0
  return (unrealized / (Math.abs(positionAmt) * entryPrice)) * 100
}

export function round(value: number, digits = 2): number {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}

export interface ExposureLimits {
  /** Total size above this multiple of the balance is flagged. */
  sizeWarnMultiple: number
  /** Size percentage is measured against this multiple of the balance. */
  sizeCapacityMultiple: number
}

export function summarizeAccount(input: {
  futuresTotal: number
  spotTotal: number
  positions: PositionView[]
  limits: ExposureLimits
  now: Date
}): AccountSummary {
  const { futuresTotal, spotTotal, positions, limits } = input
  const totalPnl = positions.reduce((sum, p) => sum + p.unRealizedProfit, 0)
  const totalSize = positions.reduce((sum, p) => sum + p.usdtValue, 0)
  return {
    futuresTotal: round(futuresTotal),
    spotTotal,
    positions,
    totalPnl,
    pnlPct: futuresTotal > 0 ? (totalPnl / futuresTotal) * 100 : 0,
    totalSize,
    sizePct: futuresTotal > 0 ? (totalSize / (limits.sizeCapacityMultiple * futuresTotal)) * 100 : 0,
    overexposed: totalSize > limits.sizeWarnMultiple * futuresTotal,
    updatedAt: input.now,
  }
}
