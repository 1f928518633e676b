import { BATTERY_SCHEMA } from '../constants'
import { BATTERY_STATES, type BatteryEnvelope, type BatteryReading, type BatteryState } from '../types'
import { log } from './logger'

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function isFiniteNumber(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v)
}

function optionalString(v: unknown): string | null {
  return typeof v === 'string' && v.length > 0 ? v : null
}

function toState(v: unknown): BatteryState {
  return BATTERY_STATES.find((s) => s === v) ?? 'unknown'
}

/**
 * Validate one battery entry. Returns null when a required number is missing;
 * an unrecognised state reads as `unknown`.
 */
export function parseReading(v: unknown): BatteryReading | null {
  if (!isRecord(v)) return null
  const { id, voltage_v, energy_rate_w, state_of_charge, temperature_k } = v
  if (typeof id !== 'string' || id.length === 0) return null
  if (!isFiniteNumber(voltage_v) || !isFiniteNumber(energy_rate_w)) return null

  return {
    id,
    vendor: optionalString(v.vendor),
    model: optionalString(v.model),
    serial_number: optionalString(v.serial_number),
    state: toState(v.state),
    state_of_charge: isFiniteNumber(state_of_charge) ? state_of_charge : 0,
    voltage_v,
    energy_rate_w,
    temperature_k: isFiniteNumber(temperature_k) ? temperature_k : null,
  }
}

/**
 * Decode one WS frame. Frames of another type or schema give null;
 * individual malformed batteries are dropped with a warning.
 */
export function parseEnvelope(raw: string): BatteryEnvelope | null {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (err) {
    log.warn('battery ws: dropping non-JSON frame', err)
    return null
  }

  if (!isRecord(data) || data.type !== 'battery' || data.schema !== BATTERY_SCHEMA) return null
  const { payload, ts_ms, seq } = data
  if (!isRecord(payload) || !Array.isArray(payload.batteries)) {
    log.warn('battery ws: frame without batteries payload')
    return null
  }

  const batteries: BatteryReading[] = []
  for (const entry of payload.batteries) {
    const reading = parseReading(entry)
    if (reading) {
      batteries.push(reading)
    } else {
      log.warn('battery ws: dropping malformed reading', entry)
    }
  }

  return {
    schema: BATTERY_SCHEMA,
    type: 'battery',
    ts_ms: isFiniteNumber(ts_ms) ? ts_ms : Date.now(),
    seq: isFiniteNumber(seq) ? seq : -1,
    payload: { batteries },
  }
}
