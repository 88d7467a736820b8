import { DAY_MS, localDayKey, startOfLocalDay } from './dates.ts'
import { HistoryDataError } from './errors.ts'

/** One day of futures balance, the shape every chart renders. */
export interface ChartPoint {
  date: Date
  minBalance: number
  maxBalance: number
  openBalance: number
  closeBalance: number
}

/** Anything carrying a timestamp and a futures balance; stored snapshots qualify. */
export interface HistorySample {
  timestamp: Date | string
  futuresBalance: number
}

export interface AggregateOptions {
  /** Trailing window in days; null means all time. */
  periodDays?: number | null
  /** Samples strictly before this instant are dropped before any other filter. */
  floorDate?: Date | null
  /** Drop non-positive balances within a day, unless that empties the day. */
  dropZeroBalances?: boolean
  now?: Date
}

interface TimedSample {
  time: number
  futuresBalance: number
}

function toTime(timestamp: Date | string, index: number): number {
  const time = timestamp instanceof Date ? timestamp.getTime() : Date.parse(timestamp)
  if (Number.isNaN(time)) {
    throw new HistoryDataError(`Snapshot #${index} has an unparseable timestamp: ${String(timestamp)}`)
  }
  return time
}

function summarizeDay(day: TimedSample[]): ChartPoint {
  const first = day[0]
  let minBalance = first.futuresBalance
  let maxBalance = first.futuresBalance
  for (const s of day) {
    if (s.futuresBalance < minBalance) minBalance = s.futuresBalance
    if (s.futuresBalance > maxBalance) maxBalance = s.futuresBalance
  }
  return {
    date: startOfLocalDay(new Date(first.time)),
    minBalance,
    maxBalance,
    openBalance: first.futuresBalance,
    closeBalance: day[day.length - 1].futuresBalance,
  }
}

/**
 * Shapes raw snapshots into one min/max/open/close record per local calendar day.
 *
 * Order of operations: floor date, period window, sort by time, group by day,
 * zero filter per day. Values are not sanitized, so a NaN balance comes out as
 * NaN. Returns an empty list when nothing survives the filters.
 *
 * @throws HistoryDataError when a timestamp cannot be parsed
 */
export function aggregateDaily(samples: readonly HistorySample[], opts: AggregateOptions = {}): ChartPoint[] {
  const now = opts.now ?? new Date()
  const dropZero = opts.dropZeroBalances ?? true

  let rows: TimedSample[] = samples.map((s, i) => ({ time: toTime(s.timestamp, i), futuresBalance: s.futuresBalance }))

  if (opts.floorDate) {
    const floor = opts.floorDate.getTime()
    rows = rows.filter(r => r.time >= floor)
  }
  if (opts.periodDays != null) {
    const cutoff = now.getTime() - opts.periodDays * DAY_MS
    rows = rows.filter(r => r.time >= cutoff)
  }

  // Array#sort is stable, so equal timestamps keep their input order
  rows.sort((a, b) => a.time - b.time)

  const days = new Map<string, TimedSample[]>()
  for (const r of rows) {
    const key = localDayKey(new Date(r.time))
    const day = days.get(key)
    if (day) day.push(r)
    else days.set(key, [r])
  }

  const points: ChartPoint[] = []
  for (const day of days.values()) {
    const positive = dropZero ? day.filter(r => !(r.futuresBalance <= 0)) : day
    points.push(summarizeDay(positive.length > 0 ? positive : day))
  }
  return points
}

/** The placeholder charted when there is nothing to plot. */
export function zeroPoint(date: Date): ChartPoint {
  return { date, minBalance: 0, maxBalance: 0, openBalance: 0, closeBalance: 0 }
}

/** `aggregateDaily`, with a single zero point dated `now` in place of an empty result. */
export function aggregateForChart(samples: readonly HistorySample[], opts: AggregateOptions = {}): ChartPoint[] {
  const points = aggregateDaily(samples, opts)
  return points.length > 0 ? points : [zeroPoint(opts.now ?? new Date())]
}

/** Maps a `period` query value (`30`, `90`, `all`) to days; anything else yields `fallback`. */
export function parsePeriod(value: string | undefined, fallback: number | null): number | null {
  if (value === undefined) return fallback
  if (value === 'all') return null
  if (!/^\d+$/.test(value)) return fallback
  const days = Number(value)
  return days > 0 ? days : fallback
}

export interface ChartSeriesPoint {
  date: string
  min: number
  max: number
  open: number
  close: number
}

/** Serializable form of chart points, dated by local calendar day. */
export function toChartSeries(points: readonly ChartPoint[]): ChartSeriesPoint[] {
  return points.map(p => ({
    date: localDayKey(p.date),
    min: p.minBalance,
    max: p.maxBalance,
    open: p.openBalance,
    close: p.closeBalance,
  }))
}
