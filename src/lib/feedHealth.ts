import { FEED_STALLED_TICKS, FEED_TICK_MS } from '../constants'

export type FeedStatus = 'waiting' | 'live' | 'late' | 'stalled'

export interface FeedHealth {
  status: FeedStatus
  ageMs: number
  missedTicks: number
}

/**
 * Grade the feed by how many readings are overdue. Half a tick of jitter
 * is allowed before a reading counts as missed.
 */
export function assessFeed(lastRxMs: number, now: number, tickMs = FEED_TICK_MS): FeedHealth {
  if (lastRxMs <= 0) return { status: 'waiting', ageMs: 0, missedTicks: 0 }

  const ageMs = Math.max(0, now - lastRxMs)
  const missedTicks = Math.max(0, Math.floor(ageMs / tickMs - 0.5))
  const status: FeedStatus =
    missedTicks === 0 ? 'live' : missedTicks < FEED_STALLED_TICKS ? 'late' : 'stalled'
  return { status, ageMs, missedTicks }
}
