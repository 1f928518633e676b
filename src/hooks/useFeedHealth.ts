import { useEffect, useState } from 'react'
import { FEED_TICK_MS } from '../constants'
import { assessFeed, type FeedHealth } from '../lib/feedHealth'
import { type FeedSource, useBatteryStore, type WsMeta } from '../stores/batteryStore'

export interface FeedState extends FeedHealth, WsMeta {
  source: FeedSource
}

function read(): FeedState {
  const { meta, source } = useBatteryStore.getState()
  return { ...meta, source, ...assessFeed(meta.lastRxMs, performance.now()) }
}

/** Feed source and staleness, re-graded four times per reading tick. */
export function useFeedHealth(): FeedState {
  const [state, setState] = useState(read)

  useEffect(() => {
    const timer = setInterval(() => setState(read()), FEED_TICK_MS / 4)
    return () => clearInterval(timer)
  }, [])

  return state
}
