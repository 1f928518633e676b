import { useQuery } from '@tanstack/react-query'
import type { BatteryInfo } from '../types'

export function useBatteryInfo(id: string | null) {
  return useQuery<BatteryInfo>({
    queryKey: ['battery-info', id],
    queryFn: async () => {
      const res = await fetch(`/batteries/${encodeURIComponent(id ?? '')}`)
      if (!res.ok) throw new Error(`${res.status}`)
      return res.json()
    },
    enabled: id !== null,
    refetchInterval: 10000,
    refetchOnWindowFocus: true,
  })
}
