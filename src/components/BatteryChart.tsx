import { useEffect, useRef } from 'react'
import uPlot from 'uplot'
import 'uplot/dist/uPlot.min.css'
import { REDRAW_INTERVAL_MS } from '../constants'
import { useBatteries, useUnits } from '../hooks/useBatteries'
import type { BatteryView } from '../lib/batteryView'
import type { ChartData } from '../lib/chartData'
import { alignSeries } from '../lib/plotData'
import type { Bounds } from '../lib/windowedSeriesBuffer'
import { type BatteryStoreState, useBatteryStore } from '../stores/batteryStore'
import { useUiStore } from '../stores/uiStore'
import styles from '../styles/global.module.css'

export type ChartKey = 'voltage' | 'energyRate' | 'temperature'

interface Props {
  batteryId: string
  chart: ChartKey
  /** Legend label per series, in series order */
  labels: string[]
  /** Height in pixels */
  height?: number
}

function chartOf(view: BatteryView, key: ChartKey): ChartData<1> | ChartData<2> {
  switch (key) {
    case 'voltage':
      return view.voltage
    case 'energyRate':
      return view.energyRate
    case 'temperature':
      return view.temperature
  }
}

function headline(state: BatteryStoreState, id: string, key: ChartKey): string {
  const view = state.views.get(id)
  if (!view) return ''
  const chart = chartOf(view, key)
  return `${chart.title()}: ${chart.current(state.units)}`
}

/**
 * Live chart of one battery metric using uPlot.
 * Subscribes directly to the Zustand store; React only manages mount/unmount.
 * Axis ranges and labels come from the chart's buffer, never from uPlot's
 * auto-scaling.
 */
export function BatteryChart({ batteryId, chart, labels, height = 180 }: Props) {
  const containerRef = useRef<HTMLDivElement>(null)
  const plotRef = useRef<uPlot | null>(null)
  const units = useUnits()
  const title = useBatteries((s) => headline(s, batteryId, chart))

  useEffect(() => {
    if (!containerRef.current) return
    const container = containerRef.current

    const current = (): ChartData<1> | ChartData<2> | undefined => {
      const view = useBatteryStore.getState().views.get(batteryId)
      return view ? chartOf(view, chart) : undefined
    }
    const xRange = (): Bounds => current()?.xBounds() ?? [0, 1]
    const yRange = (): Bounds => current()?.yBounds() ?? [0, 0]

    const initial = current()?.points() ?? []
    const uSeries: uPlot.Series[] = [
      { label: 'Age' },
      ...labels.map((label, i) => ({
        label,
        stroke: initial[i]?.color ?? '#888',
        width: 1.5,
        spanGaps: true,
      })),
    ]

    const opts: uPlot.Options = {
      width: container.clientWidth || 600,
      height,
      cursor: { show: true, drag: { x: false, y: false } },
      legend: { show: labels.length > 1 },
      scales: {
        x: { time: false, range: () => xRange() },
        y: { range: () => yRange() },
      },
      axes: [
        { show: false },
        {
          size: 50,
          label: current()?.yTitle(units),
          splits: () => yRange(),
          values: () => current()?.yLabels() ?? [],
        },
      ],
      series: uSeries,
    }

    const emptyData: uPlot.AlignedData = [[], ...labels.map(() => [])]
    const plot = new uPlot(opts, emptyData, container)
    plotRef.current = plot

    const ro = new ResizeObserver((entries) => {
      const entry = entries[0]
      if (entry && plotRef.current) {
        plotRef.current.setSize({ width: entry.contentRect.width, height })
      }
    })
    ro.observe(container)

    function updateChart() {
      const c = current()
      if (!plotRef.current || !c) return
      const { xs, ys } = alignSeries(c.points())
      const data: uPlot.AlignedData = [xs, ...ys]
      plotRef.current.setData(data)
    }

    // Transient subscription, bypasses React
    let lastUpdate = 0
    const unsub = useBatteryStore.subscribe(() => {
      if (useUiStore.getState().paused) return
      const now = performance.now()
      if (now - lastUpdate < REDRAW_INTERVAL_MS) return
      lastUpdate = now
      updateChart()
    })
    updateChart()

    const onVis = () => {
      if (!document.hidden) updateChart()
    }
    document.addEventListener('visibilitychange', onVis)

    return () => {
      unsub()
      ro.disconnect()
      document.removeEventListener('visibilitychange', onVis)
      plot.destroy()
      plotRef.current = null
    }
  }, [batteryId, chart, labels, height, units])

  return (
    <div className={styles.card}>
      <div className={styles.cardTitle}>{title}</div>
      <div ref={containerRef} />
    </div>
  )
}
