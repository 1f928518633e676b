import { create } from 'zustand'

interface UiState {
  activeBattery: string | null // null until the first battery is seen
  paused: boolean
  setActiveBattery: (id: string) => void
  setPaused: (paused: boolean) => void
}

export const useUiStore = create<UiState>()((set) => ({
  activeBattery: null,
  paused: false,
  setActiveBattery: (id) => set({ activeBattery: id }),
  setPaused: (paused) => set({ paused }),
}))
