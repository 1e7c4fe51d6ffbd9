import net from 'node:net'
import dgram from 'node:dgram'
import { createReadStream } from 'node:fs'
import { access } from 'node:fs/promises'
import { createInterface } from 'node:readline'
import type { NmeaSourceConfig } from './config.js'

// ── Line framing ──────────────────────────────────────────────────────────────

/**
 * Reassembles lines from arbitrary chunks. TCP and UDP both deliver partial
 * sentences; the remainder waits for the next chunk.
 */
export class LineBuffer {
  private pending = ''

  push(chunk: string): string[] {
    this.pending += chunk
    const lines = this.pending.split('\n')
    this.pending = lines.pop() ?? ''
    return lines.map(l => l.replace(/\r$/, '')).filter(l => l.trim() !== '')
  }

  /** Emit whatever is left once the stream has ended. */
  flush(): string[] {
    const rest = this.pending.replace(/\r$/, '')
    this.pending = ''
    return rest.trim() ? [rest] : []
  }

  reset(): void {
    this.pending = ''
  }
}

// ── Capture file replay ───────────────────────────────────────────────────────

/** Feed every line of a capture file to `onLine`; resolves with the line count. */
export async function replayFile(path: string, onLine: (line: string) => void): Promise<number> {
  await access(path)
  const rl = createInterface({ input: createReadStream(path, { encoding: 'latin1' }), crlfDelay: Infinity })
  let count = 0
  for await (const line of rl) {
    onLine(line)
    count++
  }
  return count
}

// ── Gateway connection (TCP / UDP) ────────────────────────────────────────────

export interface GatewayEvents {
  line(line: string): void
  status(connected: boolean): void
}

/** Network NMEA source; TCP reconnects after `reconnectIntervalMs` until disconnected. */
export class GatewayConnection {
  private tcpSocket: net.Socket | null = null
  private udpSocket: dgram.Socket | null = null
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null
  private autoReconnect = false
  private readonly buffer = new LineBuffer()
  private isConnected = false

  constructor(private source: NmeaSourceConfig, private readonly events: GatewayEvents) {}

  get connected(): boolean {
    return this.isConnected
  }

  /** Swap the source settings; takes effect on the next connect(). */
  configure(source: NmeaSourceConfig): void {
    this.source = source
  }

  connect(): void {
    this.disconnect()
    this.autoReconnect = true
    if (this.source.protocol === 'udp') {
      this.listenUDP()
    } else {
      this.connectTCP()
    }
  }

  disconnect(): void {
    this.autoReconnect = false
    if (this.reconnectTimer) { clearTimeout(this.reconnectTimer); this.reconnectTimer = null }
    this.tcpSocket?.destroy(); this.tcpSocket = null
    this.udpSocket?.close(); this.udpSocket = null
    this.setConnected(false)
  }

  private setConnected(connected: boolean): void {
    if (this.isConnected === connected) return
    this.isConnected = connected
    this.events.status(connected)
  }

  private receive(chunk: string): void {
    for (const line of this.buffer.push(chunk)) this.events.line(line)
  }

  private connectTCP(): void {
    if (this.reconnectTimer) { clearTimeout(this.reconnectTimer); this.reconnectTimer = null }
    const { host, port, reconnectIntervalMs } = this.source

    const socket = new net.Socket()
    this.tcpSocket = socket

    socket.connect(port, host, () => {
      console.log(`[nmea] Connected to NMEA device at ${host}:${port} (TCP)`)
      this.buffer.reset()
      this.setConnected(true)
    })

    socket.on('data', (data: Buffer) => this.receive(data.toString('latin1')))

    socket.on('error', (err: Error) => {
      console.warn(`[nmea] TCP error: ${err.message}, retrying in ${reconnectIntervalMs}ms`)
    })

    socket.on('close', () => {
      console.log('[nmea] TCP connection closed')
      // Only the current socket may reconnect; a replaced one is already gone
      if (this.tcpSocket !== socket) return
      this.tcpSocket = null
      this.setConnected(false)
      if (this.autoReconnect) {
        this.reconnectTimer = setTimeout(() => this.connectTCP(), reconnectIntervalMs)
      }
    })
  }

  private listenUDP(): void {
    const socket = dgram.createSocket('udp4')
    this.udpSocket = socket

    // One datagram carries whole sentences; no state between packets
    socket.on('message', (msg: Buffer) => {
      const framing = new LineBuffer()
      for (const line of [...framing.push(msg.toString('latin1')), ...framing.flush()]) this.events.line(line)
    })

    socket.on('error', (err: Error) => {
      console.warn(`[nmea] UDP error: ${err.message}`)
      socket.close()
      if (this.udpSocket === socket) this.udpSocket = null
      this.setConnected(false)
    })

    socket.bind(this.source.port, () => {
      const addr = socket.address()
      console.log(`[nmea] Listening for UDP NMEA on port ${addr.port}`)
      this.setConnected(true)
    })
  }
}
