// @vitest-environment node

import { describe, expect, it } from 'vitest'
import { CapacityError, SeriesIndexError } from './errors'
import { makePrng } from './prng'
import {
  NOT_AVAILABLE,
  type Point,
  RESOLUTION,
  type SeriesPoints,
  WindowedSeriesBuffer,
} from './windowedSeriesBuffer'

const xsOf = (s: SeriesPoints) => s.points.map((p) => p.x)
const ysOf = (s: SeriesPoints) => s.points.map((p) => p.y)

describe('WindowedSeriesBuffer', () => {
  it('starts empty with the default resolution and flat bounds', () => {
    const buf = new WindowedSeriesBuffer<1>({ colors: ['#22c55e'] })
    expect(buf.capacity).toBe(RESOLUTION)
    expect(buf.seriesCount).toBe(1)
    expect(buf.size).toBe(0)
    expect(buf.minValue).toBe(100)
    expect(buf.maxValue).toBe(0)
    expect(buf.enabled).toBe(true)
    expect(buf.xBounds()).toEqual([0, 256])
    expect(buf.yBounds()).toEqual([0, 0])
    expect(buf.yLabels()).toEqual([' 0', ' 0'])
  })

  it('rejects a capacity that is not a positive integer', () => {
    expect(() => new WindowedSeriesBuffer<1>({ colors: ['a'], capacity: 0 })).toThrow(CapacityError)
    expect(() => new WindowedSeriesBuffer<1>({ colors: ['a'], capacity: -4 })).toThrow(CapacityError)
    expect(() => new WindowedSeriesBuffer<1>({ colors: ['a'], capacity: 2.5 })).toThrow(CapacityError)
  })

  it('places a new point at half the capacity and collapses bounds to it', () => {
    const buf = new WindowedSeriesBuffer<1>({ colors: ['a'] })
    buf.push(3.5, 0)
    expect(buf.points()[0].points).toEqual([{ x: 256, y: 3.5 }])
    expect(buf.minValue).toBe(3.5)
    expect(buf.maxValue).toBe(3.5)
    expect(buf.latestValue).toBe(3.5)
  })

  it('scrolls every point left by one tick per push', () => {
    const buf = new WindowedSeriesBuffer<2>({ colors: ['a', 'b'], capacity: 8 })
    buf.push(1, 0)
    buf.push(2, 1)
    buf.push(3, 0)
    const [s0, s1] = buf.points()
    expect(xsOf(s0)).toEqual([3, 4])
    expect(xsOf(s1)).toEqual([3.5])
  })

  it('evicts the oldest point once full (single series)', () => {
    const buf = new WindowedSeriesBuffer<1>({ colors: ['a'], capacity: 4 })
    for (const v of [1, 5, 3, 9, 2]) buf.push(v, 0)

    const [s0] = buf.points()
    expect(buf.size).toBe(4)
    expect(ysOf(s0)).toEqual([5, 3, 9, 2])
    expect(xsOf(s0)).toEqual([0.5, 1, 1.5, 2])
    expect(buf.minValue).toBe(2)
    expect(buf.maxValue).toBe(9)
    expect(buf.yBounds()).toEqual([1, 10])
    expect(buf.yLabels()).toEqual([' 1', '10'])
  })

  it('evicts across series by global age', () => {
    const buf = new WindowedSeriesBuffer<2>({ colors: ['a', 'b'], capacity: 4 })
    const pushes: [number, 0 | 1][] = [
      [10, 0],
      [20, 1],
      [10, 0],
      [20, 1],
      [10, 0],
    ]
    for (const [v, i] of pushes) {
      buf.push(v, i)
      expect(buf.size).toBeLessThanOrEqual(4)
    }

    const [s0, s1] = buf.points()
    expect(s0.points).toEqual([
      { x: 1, y: 10 },
      { x: 2, y: 10 },
    ])
    expect(s1.points).toEqual([
      { x: 0.5, y: 20 },
      { x: 1.5, y: 20 },
    ])
    expect(buf.minValue).toBe(10)
    expect(buf.maxValue).toBe(20)
  })

  it('lets a busy series starve a quiet one', () => {
    const buf = new WindowedSeriesBuffer<2>({ colors: ['a', 'b'], capacity: 4 })
    buf.push(7, 1)
    for (let i = 0; i < 4; i++) buf.push(1, 0)

    const [s0, s1] = buf.points()
    expect(s1.points).toEqual([])
    expect(ysOf(s0)).toEqual([1, 1, 1, 1])
    expect(buf.maxValue).toBe(1)
  })

  it('keeps its invariants under random pushes', () => {
    const rand = makePrng(42)
    const capacity = 16
    const buf = new WindowedSeriesBuffer<3>({ colors: ['a', 'b', 'c'], capacity })

    for (let n = 0; n < 500; n++) {
      const before = buf.points()
      let oldest: Readonly<Point> | null = null
      if (buf.size === capacity) {
        for (const s of before) {
          const front = s.points[0]
          if (front && (oldest === null || front.x < oldest.x)) oldest = front
        }
      }

      const index = Math.floor(rand() * 3)
      const value = Math.round(rand() * 2000 - 1000) / 10
      buf.push(value, index === 0 ? 0 : index === 1 ? 1 : 2)

      const sets = buf.points()
      const all = sets.flatMap((s) => s.points)
      expect(all.length).toBe(buf.size)
      expect(buf.size).toBe(Math.min(n + 1, capacity))
      expect(buf.latestValue).toBe(value)
      expect(buf.minValue).toBe(Math.min(...all.map((p) => p.y)))
      expect(buf.maxValue).toBe(Math.max(...all.map((p) => p.y)))

      if (oldest !== null) {
        expect(all).not.toContain(oldest)
      }

      for (const s of sets) {
        const xs = xsOf(s)
        for (let i = 1; i < xs.length; i++) {
          expect(xs[i]).toBeGreaterThan(xs[i - 1])
        }
        for (const x of xs) {
          expect(x).toBeGreaterThan(0)
          expect(x).toBeLessThanOrEqual(capacity / 2)
        }
      }
      expect(sets[index].points.at(-1)).toEqual({ x: capacity / 2, y: value })
    }
  })

  it('fails fast on an out-of-range series index', () => {
    const buf = new WindowedSeriesBuffer<number>({ colors: ['a', 'b'], capacity: 4 })
    expect(() => buf.push(1, 2)).toThrow(SeriesIndexError)
    expect(() => buf.push(1, -1)).toThrow(SeriesIndexError)
    expect(() => buf.push(1, 0.5)).toThrow('series index 0.5 out of range for 2 series')
    expect(buf.size).toBe(0)
  })

  it('reports degenerate bounds and no value while disabled', () => {
    const buf = new WindowedSeriesBuffer<1>({ colors: ['a'] })
    buf.push(5, 0)
    buf.setEnabled(false)

    expect(buf.yBounds()).toEqual([0, 0])
    expect(buf.yLabels()).toEqual([' 0', ' 0'])
    expect(buf.currentValueFormatted('V')).toBe(NOT_AVAILABLE)
    expect(buf.size).toBe(1)

    buf.setEnabled(true)
    expect(buf.yBounds()).toEqual([4, 6])
    expect(buf.currentValueFormatted('V')).toBe('5.00 V')
  })

  it('clamps a negative lower bound to -1', () => {
    const buf = new WindowedSeriesBuffer<1>({ colors: ['a'] })
    buf.push(0.5, 0)
    expect(buf.yBounds()).toEqual([-1, 2])
    buf.push(-20, 0)
    expect(buf.yBounds()).toEqual([-1, 2])
    expect(buf.yLabels()).toEqual(['-1', ' 2'])
  })

  it('formats the latest value with two decimals', () => {
    const buf = new WindowedSeriesBuffer<2>({ colors: ['a', 'b'] })
    buf.push(12.3456, 0)
    expect(buf.currentValueFormatted('V')).toBe('12.35 V')
    buf.push(3, 1)
    expect(buf.currentValueFormatted('W')).toBe('3.00 W')
  })

  it('returns identical results from repeated reads', () => {
    const buf = new WindowedSeriesBuffer<2>({ colors: ['#0f0', '#f00'], capacity: 6 })
    buf.push(4, 0)
    buf.push(8, 1)

    expect(buf.points()).toEqual(buf.points())
    expect(buf.yBounds()).toEqual(buf.yBounds())
    expect(buf.yLabels()).toEqual(buf.yLabels())
    expect(buf.xBounds()).toEqual([0, 3])
    expect(buf.points().map((s) => s.color)).toEqual(['#0f0', '#f00'])
  })

  it('hands out live views rather than copies', () => {
    const buf = new WindowedSeriesBuffer<1>({ colors: ['a'], capacity: 4 })
    buf.push(1, 0)
    const view = buf.points()[0].points
    buf.push(2, 0)
    expect(view).toEqual([
      { x: 1.5, y: 1 },
      { x: 2, y: 2 },
    ])
  })
})
