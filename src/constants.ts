// ---- Chart series colors ----

export const COLOR_CHARGE = '#22c55e'
export const COLOR_DISCHARGE = '#ef4444'

// ---- Battery stream ----

export const BATTERY_WS_PATH = '/ws/battery'
export const BATTERY_SCHEMA = 'battery_ws_v1'
export const WS_BACKOFF_BASE_MS = 500
export const WS_BACKOFF_MAX_MS = 8000

/** Chart redraw cap: one redraw per this many ms at most. */
export const REDRAW_INTERVAL_MS = 200

// ---- Feed health ----

/** Interval between readings from the supervisor (and the demo feed). */
export const FEED_TICK_MS = 1000
/** Missed ticks after which the feed counts as stalled. */
export const FEED_STALLED_TICKS = 3
