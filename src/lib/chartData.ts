import type { BatteryState } from '../types'
import { temperatureUnit, type Units, VOLT, WATT } from './units'
import {
  type Bounds,
  type SeriesColors,
  type SeriesIndex,
  type SeriesPoints,
  WindowedSeriesBuffer,
} from './windowedSeriesBuffer'

export type ChartType = 'voltage' | 'energyRate' | 'temperature'

/**
 * One chart of a battery tab: a series buffer plus the text around it.
 * Units only affect presentation; stored values are whatever the caller pushed.
 */
export class ChartData<N extends number = 1> {
  batteryState: BatteryState = 'unknown'
  private readonly buffer: WindowedSeriesBuffer<N>

  constructor(
    readonly chartType: ChartType,
    colors: SeriesColors<N>,
    capacity?: number,
  ) {
    this.buffer = new WindowedSeriesBuffer<N>({ colors, capacity })
  }

  get enabled(): boolean {
    return this.buffer.enabled
  }

  push(value: number, index: SeriesIndex<N>): void {
    this.buffer.push(value, index)
  }

  setEnabled(enabled: boolean): void {
    this.buffer.setEnabled(enabled)
  }

  title(): string {
    switch (this.chartType) {
      case 'voltage':
        return 'Voltage'
      case 'temperature':
        return 'Temperature'
      case 'energyRate':
        if (this.batteryState === 'charging') return 'Charging with'
        if (this.batteryState === 'discharging') return 'Discharging with'
        return 'Consumption'
    }
  }

  yTitle(units: Units): string {
    switch (this.chartType) {
      case 'voltage':
        return VOLT
      case 'energyRate':
        return WATT
      case 'temperature':
        return temperatureUnit(units)
    }
  }

  /** Latest value with its unit, e.g. `12.34 V`. */
  current(units: Units): string {
    return this.buffer.currentValueFormatted(this.yTitle(units))
  }

  points(): SeriesPoints[] {
    return this.buffer.points()
  }

  xBounds(): Bounds {
    return this.buffer.xBounds()
  }

  yBounds(): Bounds {
    return this.buffer.yBounds()
  }

  yLabels(): [lower: string, upper: string] {
    return this.buffer.yLabels()
  }
}
