import { BatteryChart } from '../components/BatteryChart'
import { InfoPanel } from '../components/InfoPanel'
import styles from '../styles/global.module.css'

// Stable references: a new array would rebuild the plot on every render
const VOLTAGE_LABELS = ['Voltage']
const ENERGY_RATE_LABELS = ['Charging', 'Discharging']
const TEMPERATURE_LABELS = ['Temperature']

interface Props {
  batteryId: string
}

export default function BatteryTab({ batteryId }: Props) {
  return (
    <div style={{ padding: 16, display: 'flex', flexDirection: 'column', gap: 16 }}>
      <div className={styles.grid2}>
        <InfoPanel batteryId={batteryId} />
        <BatteryChart batteryId={batteryId} chart="energyRate" labels={ENERGY_RATE_LABELS} />
      </div>
      <div className={styles.grid2}>
        <BatteryChart batteryId={batteryId} chart="voltage" labels={VOLTAGE_LABELS} />
        <BatteryChart batteryId={batteryId} chart="temperature" labels={TEMPERATURE_LABELS} />
      </div>
    </div>
  )
}
