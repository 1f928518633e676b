export interface Coalesced {
  /** Record a change; `fn` runs once the current batch window closes. */
  notify: () => void
  /** Drop a pending run. */
  cancel: () => void
}

/**
 * Folds bursts of change notifications into one call per `windowMs`.
 * The window opens on the first notification after a run, so the last
 * change of a burst is never lost.
 */
export function coalesce(fn: () => void, windowMs: number): Coalesced {
  let timer: ReturnType<typeof setTimeout> | null = null

  return {
    notify: () => {
      if (timer !== null) return
      timer = setTimeout(() => {
        timer = null
        fn()
      }, windowMs)
    },
    cancel: () => {
      if (timer === null) return
      clearTimeout(timer)
      timer = null
    },
  }
}
