import { COLOR_CHARGE, COLOR_DISCHARGE } from '../constants'
import type { BatteryReading } from '../types'
import { ChartData } from './chartData'
import { log } from './logger'
import { temperatureIn, type Units } from './units'

/**
 * Everything one battery tab shows: the latest reading plus three charts.
 * Energy rate keeps charge and discharge in separate series so they can be
 * colored apart.
 */
export class BatteryView {
  readonly voltage = new ChartData<1>('voltage', [COLOR_CHARGE])
  readonly energyRate = new ChartData<2>('energyRate', [COLOR_CHARGE, COLOR_DISCHARGE])
  private temp = new ChartData<1>('temperature', [COLOR_CHARGE])
  private last: BatteryReading

  constructor(reading: BatteryReading) {
    this.last = reading
  }

  get id(): string {
    return this.last.id
  }

  get reading(): BatteryReading {
    return this.last
  }

  get temperature(): ChartData<1> {
    return this.temp
  }

  /**
   * Temperatures are stored in the units active when they were pushed,
   * so switching units starts the chart over.
   */
  resetTemperature(): void {
    this.temp = new ChartData<1>('temperature', [COLOR_CHARGE])
    this.temp.batteryState = this.last.state
    this.temp.setEnabled(this.last.temperature_k !== null)
  }

  /** Push one reading into every chart. Does not trigger a redraw. */
  update(reading: BatteryReading, units: Units): void {
    this.last = reading
    const state = reading.state

    this.voltage.push(reading.voltage_v, 0)
    this.voltage.batteryState = state

    this.energyRate.push(reading.energy_rate_w, state === 'discharging' ? 1 : 0)
    this.energyRate.batteryState = state

    if (reading.temperature_k !== null) {
      this.temp.push(temperatureIn(units, reading.temperature_k), 0)
      this.temp.batteryState = state
      this.temp.setEnabled(true)
    } else {
      this.temp.setEnabled(false)
    }
  }

  /** Tab title: model, then vendor, then serial number. */
  title(): string {
    const { model, vendor, serial_number: sn } = this.last
    if (model) {
      log.debug(`battery ${this.id}: using model as tab title: ${model}`)
      return model
    }
    if (vendor) {
      log.debug(`battery ${this.id}: using vendor as tab title: ${vendor}`)
      return vendor
    }
    if (sn) {
      log.debug(`battery ${this.id}: using S/N as tab title: ${sn}`)
      return sn
    }
    log.warn(`battery ${this.id}: unable to determine tab title, falling back to unknown`)
    return 'Unknown battery'
  }
}
