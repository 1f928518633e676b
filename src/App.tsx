import { QueryClient, QueryClientProvider } from '@tanstack/react-query'
import { useEffect } from 'react'
import { Header } from './components/Header'
import { TabBar } from './components/TabBar'
import { startDemoFeed } from './lib/demoFeed'
import { wsManager } from './lib/wsManager'
import { useBatteryStore } from './stores/batteryStore'
import { useUiStore } from './stores/uiStore'
import BatteryTab from './tabs/BatteryTab'
import styles from './styles/global.module.css'

const queryClient = new QueryClient({
  defaultOptions: {
    queries: {
      retry: 2,
      staleTime: 5000,
    },
  },
})

function TabContent() {
  const activeBattery = useUiStore((s) => s.activeBattery)

  if (activeBattery === null) {
    return <div className={styles.empty}>Waiting for battery data…</div>
  }
  return <BatteryTab key={activeBattery} batteryId={activeBattery} />
}

export default function App() {
  useEffect(() => {
    // ?demo replaces the supervisor stream with synthetic batteries
    if (new URLSearchParams(window.location.search).has('demo')) {
      useBatteryStore.getState().setSource('demo')
      return startDemoFeed((readings) => useBatteryStore.getState().push(readings))
    }
    wsManager.connect()
    return () => {
      wsManager.dispose()
    }
  }, [])

  return (
    <QueryClientProvider client={queryClient}>
      <div className={styles.layout}>
        <Header />
        <TabBar />
        <div className={styles.tabContent}>
          <TabContent />
        </div>
      </div>
    </QueryClientProvider>
  )
}
