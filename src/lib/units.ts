/**
 * Display units. `human` shows temperatures in °C, `si` in kelvin;
 * voltage and power read the same in both.
 */
export type Units = 'human' | 'si'

export const UNITS: { id: Units; label: string }[] = [
  { id: 'human', label: 'Human' },
  { id: 'si', label: 'SI' },
]

export const VOLT = 'V'
export const WATT = 'W'
export const DEGREE_CELSIUS = '°C'
export const KELVIN = 'K'

const ZERO_CELSIUS_K = 273.15

export function kelvinToCelsius(kelvin: number): number {
  return kelvin - ZERO_CELSIUS_K
}

export function temperatureIn(units: Units, kelvin: number): number {
  return units === 'si' ? kelvin : kelvinToCelsius(kelvin)
}

export function temperatureUnit(units: Units): string {
  return units === 'si' ? KELVIN : DEGREE_CELSIUS
}
