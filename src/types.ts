// ---- Battery stream from WS /ws/battery ----

export type BatteryState = 'charging' | 'discharging' | 'empty' | 'full' | 'unknown'

export const BATTERY_STATES: readonly BatteryState[] = [
  'charging',
  'discharging',
  'empty',
  'full',
  'unknown',
]

export interface BatteryEnvelope {
  schema: 'battery_ws_v1'
  type: 'battery'
  ts_ms: number
  seq: number
  payload: BatteryPayload
}

export interface BatteryPayload {
  batteries: BatteryReading[]
}

// One refresh of one battery as sampled by the supervisor
export interface BatteryReading {
  id: string
  vendor: string | null
  model: string | null
  serial_number: string | null
  state: BatteryState
  state_of_charge: number // 0..1
  voltage_v: number
  energy_rate_w: number
  temperature_k: number | null // null when the pack has no sensor
}

// ---- Static battery details from /batteries/{id} ----

export interface BatteryInfo {
  id: string
  vendor: string | null
  model: string | null
  serial_number: string | null
  technology: string
  energy_wh: number
  energy_full_wh: number
  energy_full_design_wh: number
  state_of_health: number // 0..1
  cycle_count: number | null
  time_to_full_s: number | null
  time_to_empty_s: number | null
}
