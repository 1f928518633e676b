import { FEED_TICK_MS } from '../constants'
import type { BatteryReading, BatteryState } from '../types'
import { log } from './logger'
import { between, makePrng } from './prng'

const FULL_V = 12.6
const EMPTY_V = 10.8

/**
 * Synthetic battery that drains to 10% and then charges back to full,
 * with a little noise on every channel. Deterministic for a given seed.
 */
export function makeDemoBattery(
  id: string,
  seed: number,
  opts: { withTemperature?: boolean } = {},
): () => BatteryReading {
  const rand = makePrng(seed)
  const withTemperature = opts.withTemperature ?? true
  let charge = 0.8
  let state: BatteryState = 'discharging'

  return () => {
    if (state === 'discharging' && charge <= 0.1) state = 'charging'
    else if (state === 'charging' && charge >= 1) state = 'full'
    else if (state === 'full') state = 'discharging'

    const rate = state === 'full' ? 0 : between(rand, 6, 14)
    charge += state === 'charging' ? rate / 2000 : state === 'discharging' ? -rate / 2000 : 0
    charge = Math.min(1, Math.max(0, charge))

    return {
      id,
      vendor: 'Demo',
      model: `Demo pack ${id}`,
      serial_number: null,
      state,
      state_of_charge: charge,
      voltage_v: EMPTY_V + (FULL_V - EMPTY_V) * charge + between(rand, -0.02, 0.02),
      energy_rate_w: rate,
      temperature_k: withTemperature ? 300 + rate / 2 + between(rand, -0.2, 0.2) : null,
    }
  }
}

/**
 * Feed `sink` with two demo batteries every `intervalMs`; the second one
 * has no temperature sensor. Returns a stop function.
 */
export function startDemoFeed(
  sink: (readings: BatteryReading[]) => void,
  intervalMs = FEED_TICK_MS,
): () => void {
  const sources = [makeDemoBattery('BAT0', 1), makeDemoBattery('BAT1', 2, { withTemperature: false })]
  log.info(`demo feed: ${sources.length} batteries every ${intervalMs}ms`)
  const timer = setInterval(() => sink(sources.map((next) => next())), intervalMs)
  return () => clearInterval(timer)
}
