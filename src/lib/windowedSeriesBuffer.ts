import { CapacityError, SeriesIndexError } from './errors'

/** Total number of points kept across all series of one chart. */
export const RESOLUTION = 512

/** Placeholder returned by `currentValueFormatted` while the source is absent. */
export const NOT_AVAILABLE = 'NOT AVAILABLE'

const INITIAL_MIN = 100
const INITIAL_MAX = 0

export interface Point {
  x: number
  y: number
}

export interface SeriesPoints {
  points: readonly Readonly<Point>[]
  color: string
}

export type Bounds = [lower: number, upper: number]

type Tuple<T, N extends number, R extends T[] = []> = number extends N
  ? T[]
  : R['length'] extends N
    ? R
    : Tuple<T, N, [...R, T]>

type Indices<N extends number, R extends number[] = []> = number extends N
  ? number
  : R['length'] extends N
    ? R[number]
    : Indices<N, [...R, R['length']]>

/** One color per series, e.g. `[string, string]` for `N = 2`. */
export type SeriesColors<N extends number> = Extract<Tuple<string, N>, readonly string[]>

/** Valid series indices, e.g. `0 | 1` for `N = 2`. */
export type SeriesIndex<N extends number> = Extract<Indices<N>, number>

export interface WindowedSeriesBufferOptions<N extends number> {
  colors: SeriesColors<N>
  /** Defaults to {@link RESOLUTION}. */
  capacity?: number
}

/**
 * Sliding window of points shared by `N` series.
 *
 * The capacity is a single pool: once it is full, every push evicts the
 * oldest point of the whole buffer, whichever series holds it. A series that
 * stops receiving samples therefore drains to zero over time.
 *
 * x is a scroll position, not a timestamp. New points land at `capacity / 2`
 * and every push moves all existing points left by one tick
 * (`(capacity / 2) / capacity`), so a point reaches 0 just as it becomes the
 * eviction candidate.
 */
export class WindowedSeriesBuffer<N extends number = 1> {
  readonly capacity: number
  private readonly series: Point[][]
  private readonly colors: readonly string[]
  private readonly seedX: number
  private readonly tick: number

  private total = 0
  private latest = 0
  private min = INITIAL_MIN
  private max = INITIAL_MAX
  private isEnabled = true

  constructor({ colors, capacity = RESOLUTION }: WindowedSeriesBufferOptions<N>) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new CapacityError(capacity)
    }
    const palette: readonly string[] = colors
    this.capacity = capacity
    this.colors = palette
    this.series = palette.map((): Point[] => [])
    this.seedX = capacity / 2
    this.tick = this.seedX / capacity
  }

  get seriesCount(): number {
    return this.series.length
  }

  /** Number of points stored across all series. */
  get size(): number {
    return this.total
  }

  get latestValue(): number {
    return this.latest
  }

  get minValue(): number {
    return this.min
  }

  get maxValue(): number {
    return this.max
  }

  get enabled(): boolean {
    return this.isEnabled
  }

  push(value: number, index: SeriesIndex<N>): void {
    const target: number = index
    if (!Number.isInteger(target) || target < 0 || target >= this.series.length) {
      throw new SeriesIndexError(target, this.series.length)
    }

    if (this.total === this.capacity) {
      this.evictOldest()
    }

    for (const points of this.series) {
      for (const p of points) p.x -= this.tick
    }

    this.latest = value
    this.series[target].push({ x: this.seedX, y: value })
    this.total++
    this.rescan()
  }

  /** Marks the source as (un)available. Stored points are kept either way. */
  setEnabled(enabled: boolean): void {
    this.isEnabled = enabled
  }

  /**
   * Live views of each series, in series order. Re-fetch after every push:
   * the arrays are mutated in place.
   */
  points(): SeriesPoints[] {
    return this.series.map((points, i) => ({ points, color: this.colors[i] }))
  }

  xBounds(): Bounds {
    return [0, this.seedX]
  }

  yBounds(): Bounds {
    // Until a point exists the sentinels would give lower > upper
    if (!this.isEnabled || this.total === 0) return [0, 0]
    let lower = Math.floor(this.min - 1)
    if (lower < 0) lower = -1
    return [lower, Math.ceil(this.max + 1)]
  }

  yLabels(): [lower: string, upper: string] {
    const [lower, upper] = this.yBounds()
    return [lower.toFixed(0).padStart(2), upper.toFixed(0).padStart(2)]
  }

  currentValueFormatted(unit: string): string {
    if (!this.isEnabled) return NOT_AVAILABLE
    return `${this.latest.toFixed(2)} ${unit}`
  }

  // Fronts are the oldest point of each series; ties go to the lowest index.
  private evictOldest(): void {
    let victim: Point[] | null = null
    for (const points of this.series) {
      if (points.length === 0) continue
      if (victim === null || points[0].x < victim[0].x) victim = points
    }
    if (victim === null) return
    victim.shift()
    this.total--
  }

  private rescan(): void {
    let min = Number.POSITIVE_INFINITY
    let max = Number.NEGATIVE_INFINITY
    for (const points of this.series) {
      for (const { y } of points) {
        if (y < min) min = y
        if (y > max) max = y
      }
    }
    if (this.total === 0) return
    this.min = min
    this.max = max
  }
}
