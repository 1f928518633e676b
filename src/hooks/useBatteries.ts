import { useEffect, useRef, useState } from 'react'
import { coalesce } from '../lib/coalesce'
import { type BatteryStoreState, useBatteryStore } from '../stores/batteryStore'

/**
 * Battery-store selector that re-renders at most once per `batchMs`.
 * Views are mutated in place, so the selector must derive plain values
 * (strings, numbers) from them rather than return the views themselves.
 */
export function useBatteries<T>(selector: (state: BatteryStoreState) => T, batchMs = 250): T {
  const selectorRef = useRef(selector)
  selectorRef.current = selector
  const [value, setValue] = useState(() => selector(useBatteryStore.getState()))

  useEffect(() => {
    const batch = coalesce(() => {
      const next = selectorRef.current(useBatteryStore.getState())
      setValue(() => next)
    }, batchMs)
    const unsub = useBatteryStore.subscribe(batch.notify)
    return () => {
      unsub()
      batch.cancel()
    }
  }, [batchMs])

  return value
}

const selectOrder = (s: BatteryStoreState) => s.order

/** Battery ids in tab order. Changes only when a new battery appears. */
export function useBatteryOrder(): string[] {
  return useBatteryStore(selectOrder)
}

export function useUnits() {
  return useBatteryStore((s) => s.units)
}
