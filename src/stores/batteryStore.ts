import { create } from 'zustand'
import { BatteryView } from '../lib/batteryView'
import type { Units } from '../lib/units'
import type { BatteryReading } from '../types'

export interface WsMeta {
  lastRxMs: number
  lastSeq: number
  seqGaps: number
  reconnectCount: number
  wsState: 'connecting' | 'open' | 'closed'
}

/** Where readings come from: the supervisor's WS stream or the local demo feed. */
export type FeedSource = 'stream' | 'demo'

export interface BatteryStoreState {
  views: Map<string, BatteryView>
  order: string[] // battery ids in first-seen order, one tab each
  units: Units
  source: FeedSource
  meta: WsMeta
  version: number // bumped on every push

  // Actions
  push: (readings: BatteryReading[], serverSeq?: number) => void
  view: (id: string) => BatteryView | undefined
  setUnits: (units: Units) => void
  setSource: (source: FeedSource) => void
  setWsState: (state: WsMeta['wsState']) => void
  incrementReconnects: () => void
  resetSeqGaps: () => void
}

/**
 * Per-battery chart views. Views are mutated in place by `push`;
 * subscribers re-read them whenever `version` moves.
 */
export const useBatteryStore = create<BatteryStoreState>()((set, get) => ({
  views: new Map<string, BatteryView>(),
  order: [],
  units: 'human',
  source: 'stream',
  meta: {
    lastRxMs: 0,
    lastSeq: -1,
    seqGaps: 0,
    reconnectCount: 0,
    wsState: 'closed' as const,
  },
  version: 0,

  push: (readings: BatteryReading[], serverSeq?: number) => {
    const state = get()
    const now = performance.now()

    let order = state.order
    for (const reading of readings) {
      let v = state.views.get(reading.id)
      if (!v) {
        v = new BatteryView(reading)
        state.views.set(reading.id, v)
        order = [...order, reading.id]
      }
      v.update(reading, state.units)
    }

    // Track sequence gaps
    let gaps = state.meta.seqGaps
    const lastSeq = state.meta.lastSeq
    const seq = serverSeq !== undefined && serverSeq >= 0 ? serverSeq : undefined
    if (seq !== undefined && lastSeq >= 0 && seq !== lastSeq + 1) {
      gaps += 1
    }

    set({
      order,
      version: state.version + 1,
      meta: {
        ...state.meta,
        lastRxMs: now,
        lastSeq: seq ?? state.meta.lastSeq,
        seqGaps: gaps,
      },
    })
  },

  view: (id: string) => get().views.get(id),

  setUnits: (units: Units) => {
    const state = get()
    if (units === state.units) return
    for (const v of state.views.values()) v.resetTemperature()
    set({ units, version: state.version + 1 })
  },

  setSource: (source: FeedSource) => {
    set({ source })
  },

  setWsState: (wsState: WsMeta['wsState']) => {
    set((s) => ({ meta: { ...s.meta, wsState } }))
  },

  incrementReconnects: () => {
    set((s) => ({ meta: { ...s.meta, reconnectCount: s.meta.reconnectCount + 1 } }))
  },

  resetSeqGaps: () => {
    set((s) => ({ meta: { ...s.meta, seqGaps: 0, lastSeq: -1 } }))
  },
}))
