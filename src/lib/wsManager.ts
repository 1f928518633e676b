import { BATTERY_WS_PATH, WS_BACKOFF_BASE_MS, WS_BACKOFF_MAX_MS } from '../constants'
import { useBatteryStore } from '../stores/batteryStore'
import { parseEnvelope } from './batteryProtocol'
import { log } from './logger'

/**
 * Battery stream client with exponential backoff reconnect.
 * Writes only to BatteryStore.
 */
class WsManager {
  private ws: WebSocket | null = null
  private attempt = 0
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null
  private disposed = false
  private receivedFirstMessage = false

  connect(): void {
    this.disposed = false
    this.cleanup()

    const store = useBatteryStore.getState()
    store.setWsState('connecting')
    store.resetSeqGaps()
    this.receivedFirstMessage = false

    const proto = window.location.protocol === 'https:' ? 'wss:' : 'ws:'
    const url = `${proto}//${window.location.host}${BATTERY_WS_PATH}`

    const ws = new WebSocket(url)
    this.ws = ws

    ws.onopen = () => {
      // 'open' is set on the first valid message
      this.attempt = 0
    }

    ws.onmessage = (event: MessageEvent<unknown>) => {
      if (typeof event.data !== 'string') return
      const envelope = parseEnvelope(event.data)
      if (!envelope) return

      if (!this.receivedFirstMessage) {
        this.receivedFirstMessage = true
        useBatteryStore.getState().setWsState('open')
        log.info(`battery ws: streaming from ${url}`)
      }

      useBatteryStore.getState().push(envelope.payload.batteries, envelope.seq)
    }

    ws.onclose = (event) => {
      log.warn(`battery ws: closed (code ${event.code})`)
      useBatteryStore.getState().setWsState('closed')
      this.scheduleReconnect()
    }

    ws.onerror = () => {
      // onclose will fire after this
    }
  }

  dispose(): void {
    this.disposed = true
    this.cleanup()
    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer)
      this.reconnectTimer = null
    }
  }

  private cleanup(): void {
    if (this.ws) {
      this.ws.onopen = null
      this.ws.onmessage = null
      this.ws.onclose = null
      this.ws.onerror = null
      if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
        this.ws.close()
      }
      this.ws = null
    }
  }

  private scheduleReconnect(): void {
    if (this.disposed) return
    const delay = Math.min(WS_BACKOFF_BASE_MS * 2 ** this.attempt, WS_BACKOFF_MAX_MS)
    this.attempt++
    useBatteryStore.getState().incrementReconnects()

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null
      this.connect()
    }, delay)
  }
}

// Singleton
export const wsManager = new WsManager()
