import { describe, test, expect } from 'vitest'
import { aggregateDaily, aggregateForChart, parsePeriod, toChartSeries, type HistorySample } from '../../src/core/history.ts'
import { HistoryDataError } from '../../src/core/errors.ts'

// Local-time constructors keep these independent of the machine's time zone
const aug = (day: number, hour = 0, minute = 0) => new Date(2025, 7, day, hour, minute)
const s = (timestamp: Date | string, futuresBalance: number): HistorySample => ({ timestamp, futuresBalance })
const now = aug(20, 12)

describe('aggregateForChart', () => {
  test('one day becomes one min/max/open/close record', () => {
    const points = aggregateForChart([s(aug(5, 9), 100), s(aug(5, 12), 150), s(aug(5, 15), 120)], { now })
    expect(points).toEqual([
      { date: aug(5), minBalance: 100, maxBalance: 150, openBalance: 100, closeBalance: 120 },
    ])
  })

  test('input order does not matter', () => {
    const points = aggregateForChart([s(aug(5, 15), 120), s(aug(5, 9), 100), s(aug(5, 12), 150)], { now })
    expect(points[0]).toMatchObject({ openBalance: 100, closeBalance: 120 })
  })

  test('equal timestamps keep their input order', () => {
    const points = aggregateForChart([s(aug(5, 9), 100), s(aug(5, 9), 200)], { now })
    expect(points[0]).toMatchObject({ openBalance: 100, closeBalance: 200 })
  })

  test('days come out ascending, one record per day', () => {
    const points = aggregateForChart([s(aug(3, 10), 3), s(aug(1, 10), 1), s(aug(2, 10), 2), s(aug(1, 23, 59), 11)], { now })
    expect(points.map(p => p.date)).toEqual([aug(1), aug(2), aug(3)])
    expect(points[0]).toMatchObject({ openBalance: 1, closeBalance: 11, minBalance: 1, maxBalance: 11 })
  })

  test('zero balances are dropped when the day has a positive one', () => {
    const points = aggregateForChart([s(aug(5, 9), 0), s(aug(5, 10), 110), s(aug(5, 11), -3), s(aug(5, 12), 130)], { now })
    expect(points).toEqual([
      { date: aug(5), minBalance: 110, maxBalance: 130, openBalance: 110, closeBalance: 130 },
    ])
  })

  test('an all-zero day is kept rather than vanishing', () => {
    const points = aggregateForChart([s(aug(5, 9), 0), s(aug(5, 10), 0)], { now })
    expect(points).toEqual([
      { date: aug(5), minBalance: 0, maxBalance: 0, openBalance: 0, closeBalance: 0 },
    ])
  })

  test('an all-negative day is kept as is', () => {
    const points = aggregateForChart([s(aug(5, 9), -5), s(aug(5, 10), -2)], { now })
    expect(points[0]).toMatchObject({ minBalance: -5, maxBalance: -2, openBalance: -5, closeBalance: -2 })
  })

  test('the zero filter can be turned off', () => {
    const points = aggregateForChart(
      [s(aug(5, 9), 0), s(aug(5, 10), 110), s(aug(5, 11), -3), s(aug(5, 12), 130)],
      { now, dropZeroBalances: false },
    )
    expect(points[0]).toMatchObject({ minBalance: -3, maxBalance: 130, openBalance: 0, closeBalance: 130 })
  })

  test('no samples yield a single zero point dated now', () => {
    expect(aggregateForChart([], { now })).toEqual([
      { date: now, minBalance: 0, maxBalance: 0, openBalance: 0, closeBalance: 0 },
    ])
  })

  test('the floor date applies even with an all-time period', () => {
    const points = aggregateForChart(
      [s(new Date(2025, 6, 31, 23, 0), 50), s(aug(1, 8), 60)],
      { now, periodDays: null, floorDate: aug(1) },
    )
    expect(points).toEqual([
      { date: aug(1), minBalance: 60, maxBalance: 60, openBalance: 60, closeBalance: 60 },
    ])
  })

  test('a floor after every sample leaves only the zero point', () => {
    const points = aggregateForChart([s(aug(1, 8), 60)], { now, floorDate: aug(10) })
    expect(points).toEqual([{ date: now, minBalance: 0, maxBalance: 0, openBalance: 0, closeBalance: 0 }])
  })

  test('the period window drops samples older than now minus N days', () => {
    // cutoff is Aug 13 12:00
    const points = aggregateForChart(
      [s(aug(10, 12), 1), s(aug(13, 11), 2), s(aug(13, 13), 3), s(aug(19, 9), 4)],
      { now, periodDays: 7 },
    )
    expect(points).toEqual([
      { date: aug(13), minBalance: 3, maxBalance: 3, openBalance: 3, closeBalance: 3 },
      { date: aug(19), minBalance: 4, maxBalance: 4, openBalance: 4, closeBalance: 4 },
    ])
  })

  test('ISO string timestamps are accepted', () => {
    const points = aggregateForChart([s(aug(5, 9).toISOString(), 100)], { now })
    expect(points[0].date).toEqual(aug(5))
  })

  test('NaN balances pass through', () => {
    const [point] = aggregateForChart([s(aug(5, 9), Number.NaN)], { now })
    expect(point.minBalance).toBeNaN()
    expect(point.closeBalance).toBeNaN()
  })

  test('an unparseable timestamp raises HistoryDataError', () => {
    const samples = [s(aug(5, 9), 100), s('not-a-date', 100)]
    expect(() => aggregateForChart(samples, { now })).toThrow(HistoryDataError)
    expect(() => aggregateForChart(samples, { now })).toThrow('Snapshot #1 has an unparseable timestamp: not-a-date')
  })

  test('an invalid Date raises HistoryDataError', () => {
    expect(() => aggregateForChart([s(new Date(Number.NaN), 1)], { now })).toThrow(HistoryDataError)
  })
})

describe('aggregateDaily', () => {
  test('returns nothing when every sample is before the floor', () => {
    expect(aggregateDaily([s(new Date(2025, 6, 20, 9), 500)], { now, floorDate: aug(1) })).toEqual([])
  })

  test('returns nothing for an empty window', () => {
    expect(aggregateDaily([s(aug(1, 9), 500)], { now, periodDays: 7 })).toEqual([])
  })
})

describe('parsePeriod', () => {
  test('maps query values to days', () => {
    expect(parsePeriod('30', 90)).toBe(30)
    expect(parsePeriod('all', 30)).toBeNull()
  })

  test('falls back for missing or invalid values', () => {
    expect(parsePeriod(undefined, 30)).toBe(30)
    expect(parsePeriod(undefined, null)).toBeNull()
    expect(parsePeriod('0', 30)).toBe(30)
    expect(parsePeriod('-7', 30)).toBe(30)
    expect(parsePeriod('abc', 30)).toBe(30)
    expect(parsePeriod('7.5', 30)).toBe(30)
  })
})

describe('toChartSeries', () => {
  test('dates by local calendar day', () => {
    const series = toChartSeries([
      { date: aug(5), minBalance: 1, maxBalance: 4, openBalance: 2, closeBalance: 3 },
    ])
    expect(series).toEqual([{ date: '2025-08-05', min: 1, max: 4, open: 2, close: 3 }])
  })
})
