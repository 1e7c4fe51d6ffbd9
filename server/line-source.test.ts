import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import net from 'node:net'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { NmeaSourceConfig } from './config.js'
import { GatewayConnection, LineBuffer, replayFile } from './line-source.js'

describe('LineBuffer', () => {
  it('returns complete lines and keeps the partial tail', () => {
    const buffer = new LineBuffer()
    expect(buffer.push('$GPGGA,1*00\r\n$GPRMC,')).toEqual(['$GPGGA,1*00'])
    expect(buffer.push('2*00\r\n')).toEqual(['$GPRMC,2*00'])
  })

  it('drops blank lines', () => {
    expect(new LineBuffer().push('\r\n\n  \n$GPVTG*00\n')).toEqual(['$GPVTG*00'])
  })

  it('flushes an unterminated last line once', () => {
    const buffer = new LineBuffer()
    buffer.push('$GPGLL,1*00')
    expect(buffer.flush()).toEqual(['$GPGLL,1*00'])
    expect(buffer.flush()).toEqual([])
  })

  it('forgets the partial line on reset', () => {
    const buffer = new LineBuffer()
    buffer.push('$GPGGA,12')
    buffer.reset()
    expect(buffer.push('$GPRMC*00\n')).toEqual(['$GPRMC*00'])
  })
})

describe('replayFile', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'nmea-replay-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('hands over every line without its terminator', async () => {
    const path = join(dir, 'capture.nmea')
    await writeFile(path, 'first\r\nsecond\n\nthird', 'latin1')
    const lines: string[] = []
    const count = await replayFile(path, line => lines.push(line))
    expect(lines).toEqual(['first', 'second', '', 'third'])
    expect(count).toBe(4)
  })

  it('rejects when the file does not exist', async () => {
    await expect(replayFile(join(dir, 'missing.nmea'), () => {})).rejects.toThrow()
  })
})

describe('GatewayConnection (TCP)', () => {
  let server: net.Server
  let port: number
  let gateway: GatewayConnection
  let lines: string[]
  let statuses: boolean[]
  const peers = new Set<net.Socket>()

  const pause = (ms: number) => new Promise(resolve => setTimeout(resolve, ms))

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    server = net.createServer(peer => {
      peers.add(peer)
      peer.on('close', () => peers.delete(peer))
    })
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()))
    const address = server.address()
    if (address === null || typeof address === 'string') throw new Error('server has no port')
    port = address.port

    lines = []
    statuses = []
    const source: NmeaSourceConfig = { host: '127.0.0.1', port, protocol: 'tcp', reconnectIntervalMs: 100 }
    gateway = new GatewayConnection(source, {
      line: line => lines.push(line),
      status: connected => statuses.push(connected),
    })
  })

  afterEach(async () => {
    gateway.disconnect()
    for (const peer of peers) peer.destroy()
    await new Promise<void>(resolve => server.close(() => resolve()))
    vi.restoreAllMocks()
  })

  async function connected(): Promise<void> {
    gateway.connect()
    await vi.waitFor(() => {
      expect(gateway.connected).toBe(true)
      expect(peers.size).toBe(1)
    })
  }

  it('reassembles lines split across chunks', async () => {
    await connected()
    const [peer] = [...peers]
    peer.write('$GPGGA,1*00\r\n$GPRMC,')
    await pause(20)
    peer.write('2*00\r\n')
    await vi.waitFor(() => expect(lines).toEqual(['$GPGGA,1*00', '$GPRMC,2*00']))
    expect(statuses).toEqual([true])
  })

  it('keeps a single socket when connect() is called while connected', async () => {
    await connected()
    gateway.connect()
    await vi.waitFor(() => expect(statuses).toEqual([true, false, true]))
    await pause(300)

    expect(peers.size).toBe(1)
    for (const peer of peers) peer.write('$GPVTG*00\n')
    await vi.waitFor(() => expect(lines).toEqual(['$GPVTG*00']))
    await pause(50)
    expect(lines).toEqual(['$GPVTG*00'])
  })

  it('stays down after disconnect()', async () => {
    await connected()
    gateway.disconnect()
    await pause(300)
    expect(gateway.connected).toBe(false)
    expect(peers.size).toBe(0)
    expect(statuses).toEqual([true, false])
  })

  it('reconnects when the gateway drops the connection', async () => {
    await connected()
    for (const peer of peers) peer.destroy()
    await vi.waitFor(() => {
      expect(statuses).toEqual([true, false, true])
      expect(peers.size).toBe(1)
    })
  })
})
