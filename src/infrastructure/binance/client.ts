import { createHmac } from 'node:crypto'
import type { MonitorMode } from '../../config/types.ts'
import type { AccountSource, FuturesBalance, PositionView, SpotBalance } from '../../core/types.ts'
import { ExchangeError } from '../../core/errors.ts'
import { err, ok, unwrapOr, type Result } from '../../core/result.ts'
import { logger } from '../logger.ts'
import { errorMessage, parseFuturesBalances, parsePositions, parsePriceMap, parseSpotAccount } from './responses.ts'

const TAG = 'Binance'
const RECV_WINDOW_MS = 5000
const QUOTE_ASSET = 'USDT'

interface ClientConfig {
  mode: MonitorMode
  apiKey: string
  apiSecret: string
  spotUrl: string
  futuresUrl: string
  requestTimeoutMs: number
}

type Query = Record<string, string>

/** HMAC-SHA256 of the query string, hex encoded, as Binance SIGNED endpoints expect. */
export function sign(query: string, secret: string): string {
  return createHmac('sha256', secret).update(query).digest('hex')
}

// Paper mode account: fixed numbers, no network
const PAPER_SPOT: SpotBalance[] = [{ asset: 'USDT', free: 250, locked: 0, total: 250 }]
const PAPER_FUTURES: FuturesBalance[] = [{ asset: 'USDT', balance: 1000, available: 820 }]
const PAPER_POSITIONS: PositionView[] = [
  { symbol: 'BTCUSDT', positionSide: 'BOTH', positionAmt: 0.05, entryPrice: 60000, markPrice: 61200, usdtValue: 3060, leverage: 10, unRealizedProfit: 60, roe: 2 },
  { symbol: 'ETHUSDT', positionSide: 'BOTH', positionAmt: -1.5, entryPrice: 3000, markPrice: 3030, usdtValue: 4545, leverage: 5, unRealizedProfit: -45, roe: -1 },
]

/**
 * Read-only Binance spot and USDⓈ-M futures client.
 *
 * `fetch*` methods return a Result; the `get*` methods log the failure and
 * fall back to an empty value, so nothing thrown here reaches the caller.
 */
export class BinanceClient implements AccountSource {
  constructor(private config: ClientConfig) {}

  private async request(baseUrl: string, path: string, query: Query = {}, signed = false): Promise<Result<unknown, ExchangeError>> {
    const params = new URLSearchParams(query)
    const headers: Record<string, string> = {}
    if (signed) {
      params.set('recvWindow', String(RECV_WINDOW_MS))
      params.set('timestamp', String(Date.now()))
      params.set('signature', sign(params.toString(), this.config.apiSecret))
      headers['X-MBX-APIKEY'] = this.config.apiKey
    }
    const qs = params.toString()
    const url = `${baseUrl}${path}${qs ? `?${qs}` : ''}`

    let res: Response
    try {
      res = await fetch(url, { headers, signal: AbortSignal.timeout(this.config.requestTimeoutMs) })
    } catch (e) {
      return err(new ExchangeError(path, 'request failed', { cause: e }))
    }

    let body: unknown
    try {
      body = await res.json()
    } catch (e) {
      return err(new ExchangeError(path, `unreadable response (HTTP ${res.status})`, { status: res.status, cause: e }))
    }

    if (!res.ok) {
      return err(new ExchangeError(path, `HTTP ${res.status}: ${errorMessage(body) ?? res.statusText}`, { status: res.status }))
    }
    return ok(body)
  }

  private parse<T>(path: string, body: Result<unknown, ExchangeError>, parser: (body: unknown) => T): Result<T, ExchangeError> {
    if (!body.ok) return body
    try {
      return ok(parser(body.value))
    } catch (e) {
      return err(new ExchangeError(path, 'malformed response', { cause: e }))
    }
  }

  async fetchSpotBalance(): Promise<Result<SpotBalance[], ExchangeError>> {
    if (this.config.mode !== 'live') return ok(PAPER_SPOT)
    const path = '/api/v3/account'
    return this.parse(path, await this.request(this.config.spotUrl, path, {}, true), parseSpotAccount)
  }

  async fetchFuturesBalance(): Promise<Result<FuturesBalance[], ExchangeError>> {
    if (this.config.mode !== 'live') return ok(PAPER_FUTURES)
    const path = '/fapi/v2/balance'
    return this.parse(path, await this.request(this.config.futuresUrl, path, {}, true), body => parseFuturesBalances(body, QUOTE_ASSET))
  }

  async fetchFuturesPositions(): Promise<Result<PositionView[], ExchangeError>> {
    if (this.config.mode !== 'live') return ok(PAPER_POSITIONS)
    const positionsPath = '/fapi/v2/positionRisk'
    const marksPath = '/fapi/v1/premiumIndex'
    const [positionsBody, marksBody] = await Promise.all([
      this.request(this.config.futuresUrl, positionsPath, {}, true),
      this.request(this.config.futuresUrl, marksPath),
    ])
    const marks = this.parse(marksPath, marksBody, body => parsePriceMap(body, 'markPrice'))
    if (!marks.ok) return marks
    const parsed = this.parse(positionsPath, positionsBody, body => parsePositions(body, marks.value))
    if (!parsed.ok) return parsed
    for (const symbol of parsed.value.skipped) {
      logger.warn(TAG, `Skipping position ${symbol}: unreadable fields`)
    }
    return ok(parsed.value.positions)
  }

  /**
   * Values spot holdings in USDT at the last traded price. USDT counts 1:1;
   * assets without an `<ASSET>USDT` market are left out.
   */
  async fetchSpotValueUsdt(balances: SpotBalance[]): Promise<Result<number, ExchangeError>> {
    const needsPrices = balances.some(b => b.asset !== QUOTE_ASSET)
    let prices = new Map<string, number>()
    if (needsPrices && this.config.mode === 'live') {
      const path = '/api/v3/ticker/price'
      const parsed = this.parse(path, await this.request(this.config.spotUrl, path), body => parsePriceMap(body, 'price'))
      if (!parsed.ok) return parsed
      prices = parsed.value
    }
    let total = 0
    for (const b of balances) {
      const price = b.asset === QUOTE_ASSET ? 1 : prices.get(`${b.asset}${QUOTE_ASSET}`)
      if (price === undefined) {
        logger.debug(TAG, `No ${QUOTE_ASSET} price for ${b.asset}, left out of spot total`)
        continue
      }
      total += b.total * price
    }
    return ok(total)
  }

  private report(op: string) {
    return (error: ExchangeError) => logger.error(TAG, `Error getting ${op}`, error)
  }

  async getSpotBalance(): Promise<SpotBalance[]> {
    return unwrapOr(await this.fetchSpotBalance(), [], this.report('spot balance'))
  }

  async getFuturesBalance(): Promise<FuturesBalance[]> {
    return unwrapOr(await this.fetchFuturesBalance(), [], this.report('futures balance'))
  }

  async getFuturesPositions(): Promise<PositionView[]> {
    return unwrapOr(await this.fetchFuturesPositions(), [], this.report('futures positions'))
  }

  async getSpotValueUsdt(balances: SpotBalance[]): Promise<number> {
    return unwrapOr(await this.fetchSpotValueUsdt(balances), 0, this.report('spot valuation'))
  }
}
