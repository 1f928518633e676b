import { useFeedHealth } from '../hooks/useFeedHealth'
import type { FeedStatus } from '../lib/feedHealth'
import { UNITS } from '../lib/units'
import { useBatteryStore } from '../stores/batteryStore'
import { useUiStore } from '../stores/uiStore'
import styles from '../styles/header.module.css'

const AGE_CLASS: Record<FeedStatus, string | undefined> = {
  waiting: styles.meta,
  live: styles.meta,
  late: styles.metaWarn,
  stalled: styles.metaError,
}

export function Header() {
  const feed = useFeedHealth()
  const units = useBatteryStore((s) => s.units)
  const setUnits = useBatteryStore((s) => s.setUnits)
  const paused = useUiStore((s) => s.paused)
  const setPaused = useUiStore((s) => s.setPaused)

  const wsColor =
    feed.source === 'demo' || feed.wsState === 'open'
      ? styles.dotGreen
      : feed.wsState === 'connecting'
        ? styles.dotYellow
        : styles.dotRed

  return (
    <div className={styles.header}>
      <span className={styles.title}>Battery Dashboard</span>

      {/* Feed source */}
      <span className={styles.pill}>
        <span className={`${styles.dot} ${wsColor}`} />
        {feed.source === 'demo' ? 'DEMO' : 'WS'}
      </span>

      {/* Data age, graded in missed ticks */}
      <span className={`${styles.pill} ${AGE_CLASS[feed.status] ?? ''}`}>
        {feed.status === 'waiting' ? '—' : `${(feed.ageMs / 1000).toFixed(1)}s`}
        {feed.missedTicks > 0 && ` (${feed.missedTicks} missed)`}
      </span>

      {/* Seq gaps */}
      {feed.seqGaps > 0 && (
        <span className={styles.pill} style={{ color: 'var(--yellow)' }}>
          gaps:{feed.seqGaps}
        </span>
      )}

      {/* Reconnects */}
      {feed.reconnectCount > 0 && <span className={styles.pill}>reconn:{feed.reconnectCount}</span>}

      <span className={styles.spacer} />

      {/* Units */}
      {UNITS.map((u) => (
        <button
          type="button"
          key={u.id}
          className={`${styles.pill} ${units === u.id ? styles.pillActive : ''}`}
          onClick={() => setUnits(u.id)}
        >
          {u.label}
        </button>
      ))}

      <button type="button" className={styles.pill} onClick={() => setPaused(!paused)}>
        {paused ? '▶' : '⏸'}
      </button>
    </div>
  )
}
