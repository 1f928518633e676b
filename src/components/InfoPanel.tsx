import { useBatteries } from '../hooks/useBatteries'
import { useBatteryInfo } from '../hooks/useBatteryInfo'
import type { BatteryStoreState } from '../stores/batteryStore'
import styles from '../styles/global.module.css'

interface Props {
  batteryId: string
}

function pct(v: number): string {
  return `${(v * 100).toFixed(0)}%`
}

function duration(s: number | null): string {
  if (s === null) return '—'
  const h = Math.floor(s / 3600)
  const m = Math.floor((s % 3600) / 60)
  return `${h}h ${String(m).padStart(2, '0')}m`
}

/** Static battery details plus the live state and charge level. */
export function InfoPanel({ batteryId }: Props) {
  const info = useBatteryInfo(batteryId)
  const live = useBatteries((s: BatteryStoreState) => {
    const r = s.views.get(batteryId)?.reading
    return r ? `${r.state} · ${pct(r.state_of_charge)}` : '—'
  })

  const rows: [string, string][] = [['State', live]]
  if (info.data) {
    const d = info.data
    rows.push(
      ['Vendor', d.vendor ?? '—'],
      ['Model', d.model ?? '—'],
      ['S/N', d.serial_number ?? '—'],
      ['Technology', d.technology],
      ['Energy', `${d.energy_wh.toFixed(2)} Wh`],
      ['Energy full', `${d.energy_full_wh.toFixed(2)} Wh`],
      ['Energy full design', `${d.energy_full_design_wh.toFixed(2)} Wh`],
      ['Capacity', pct(d.state_of_health)],
      ['Cycle count', d.cycle_count === null ? '—' : String(d.cycle_count)],
      ['Time to full', duration(d.time_to_full_s)],
      ['Time to empty', duration(d.time_to_empty_s)],
    )
  }

  return (
    <div className={styles.card}>
      <div className={styles.cardTitle}>Information</div>
      {info.isError && <div className={styles.badgeRed}>details unavailable: {info.error.message}</div>}
      <table className={styles.mono}>
        <tbody>
          {rows.map(([k, v]) => (
            <tr key={k}>
              <td>{k}</td>
              <td>{v}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  )
}
