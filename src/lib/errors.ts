/**
 * Contract violations raised by the chart buffers.
 * These signal caller bugs; app code never catches them.
 */

export class SeriesIndexError extends Error {
  readonly name = 'SeriesIndexError'

  constructor(
    readonly index: number,
    readonly seriesCount: number,
  ) {
    super(`series index ${index} out of range for ${seriesCount} series`)
  }
}

export class CapacityError extends Error {
  readonly name = 'CapacityError'

  constructor(readonly capacity: number) {
    super(`buffer capacity must be a positive integer, got ${capacity}`)
  }
}
