import { useEffect } from 'react'
import { useBatteries, useBatteryOrder } from '../hooks/useBatteries'
import type { BatteryStoreState } from '../stores/batteryStore'
import { useUiStore } from '../stores/uiStore'
import styles from '../styles/tabs.module.css'

// Titles follow the latest reading; joined so the selector result compares by value
const selectTitles = (s: BatteryStoreState) =>
  s.order.map((id) => s.views.get(id)?.title() ?? id).join('\n')

export function TabBar() {
  const order = useBatteryOrder()
  const titles = useBatteries(selectTitles, 1000).split('\n')
  const activeBattery = useUiStore((s) => s.activeBattery)
  const setActiveBattery = useUiStore((s) => s.setActiveBattery)

  // First battery seen becomes the active tab
  useEffect(() => {
    if (activeBattery === null && order.length > 0) setActiveBattery(order[0])
  }, [activeBattery, order, setActiveBattery])

  return (
    <div className={styles.tabBar}>
      {order.map((id, i) => (
        <button
          type="button"
          key={id}
          className={`${styles.tab} ${activeBattery === id ? styles.tabActive : ''}`}
          onClick={() => setActiveBattery(id)}
        >
          {titles[i] ?? id}
        </button>
      ))}
    </div>
  )
}
