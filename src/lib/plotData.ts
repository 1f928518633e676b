import type { SeriesPoints } from './windowedSeriesBuffer'

export interface AlignedSeries {
  xs: number[]
  ys: (number | null)[][]
}

/**
 * Merge per-series points onto one ascending x axis, as uPlot expects.
 * A series has `null` wherever another series owns the x, and the chart
 * spans those gaps.
 */
export function alignSeries(sets: readonly SeriesPoints[]): AlignedSeries {
  const xs: number[] = []
  for (const { points } of sets) {
    for (const p of points) xs.push(p.x)
  }
  xs.sort((a, b) => a - b)

  const uniq = xs.filter((x, i) => i === 0 || x !== xs[i - 1])
  const slot = new Map(uniq.map((x, i): [number, number] => [x, i]))

  const ys = sets.map(({ points }) => {
    const col: (number | null)[] = new Array<number | null>(uniq.length).fill(null)
    for (const p of points) {
      const i = slot.get(p.x)
      if (i !== undefined) col[i] = p.y
    }
    return col
  })

  return { xs: uniq, ys }
}
