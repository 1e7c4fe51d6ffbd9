/**
 * NMEA Bridge Server
 * ──────────────────
 * Reads NMEA 0183 sentences from a gateway on the boat network (TCP or UDP)
 * or replays a capture file, feeds them into a position session, and serves
 * statistics, positions and exports over HTTP. New and enriched position
 * reports are pushed to browser clients over WebSocket.
 *
 * Configuration: edit server/config.json  (or POST /api/config)
 * Start:         npm run server
 */

import http from 'node:http'
import { WebSocketServer, type WebSocket } from 'ws'
import { NMEASession } from '../src/session/session.js'
import { applyNmeaPatch, defaultConfigPath, loadConfig, saveConfig } from './config.js'
import type { Config } from './config.js'
import { GatewayConnection, replayFile } from './line-source.js'
import { heartbeatMessage, pushMessage, routeRequest } from './api.js'
import type { ApiContext, PushMessage } from './api.js'

// ── Config ────────────────────────────────────────────────────────────────────

let cfg: Config = loadConfig(defaultConfigPath)
const WS_PORT = cfg.websocket.port

// ── Session ───────────────────────────────────────────────────────────────────

const session = new NMEASession({ retainRawSentences: cfg.session.retainRawSentences })

function ingest(line: string): void {
  const message = pushMessage(session.processLine(line))
  if (message) broadcast(message)
}

// ── NMEA source ───────────────────────────────────────────────────────────────

const gateway = new GatewayConnection(cfg.nmea, {
  line: ingest,
  status: connected => {
    // Exports are refused while a live source is feeding the session
    if (connected) session.startIngest()
    else session.stopIngest()
  },
})

let replaying = false

function replay(path: string): void {
  if (replaying) return
  replaying = true
  session.startIngest()
  console.log(`[nmea] Replaying ${path}`)
  replayFile(path, ingest)
    .then(lines => {
      const stats = session.statistics()
      console.log(`[nmea] Replay finished: ${lines} lines, ${stats.totalReports} positions, ${stats.checksumErrors} checksum errors`)
    })
    .catch((e: unknown) => {
      console.error(`[nmea] Replay of ${path} failed: ${e instanceof Error ? e.message : String(e)}`)
    })
    .finally(() => {
      replaying = false
      session.stopIngest()
    })
}

function connect(): void {
  if (cfg.nmea.protocol === 'file') {
    gateway.disconnect()
    if (cfg.nmea.file) replay(cfg.nmea.file)
    return
  }
  gateway.configure(cfg.nmea)
  gateway.connect()
}

function disconnect(): void {
  gateway.disconnect()
  console.log('[nmea] NMEA connection disconnected')
}

// ── HTTP API ──────────────────────────────────────────────────────────────────

function setCorsHeaders(res: http.ServerResponse): void {
  res.setHeader('Access-Control-Allow-Origin', '*')
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS')
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type')
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = ''
    req.on('data', chunk => { body += chunk })
    req.on('end', () => resolve(body))
    req.on('error', reject)
  })
}

const api: ApiContext = {
  session,
  config: () => cfg,
  state: () => ({ nmeaConnected: gateway.connected || replaying, wsClients: clients.size }),
  connect,
  disconnect,
  updateNmeaConfig: patch => {
    cfg = applyNmeaPatch(cfg, patch)
    saveConfig(cfg, defaultConfigPath)
    return cfg
  },
}

function handleHttp(req: http.IncomingMessage, res: http.ServerResponse): void {
  const method = req.method ?? 'GET'
  const body: Promise<string | undefined> = method === 'POST' ? readBody(req) : Promise.resolve(undefined)

  body
    .then(text => routeRequest(api, { method, url: req.url ?? '/', host: req.headers.host, body: text }))
    .then(reply => {
      setCorsHeaders(res)
      const headers: Record<string, string> = { ...reply.headers }
      if (reply.contentType) headers['Content-Type'] = reply.contentType
      res.writeHead(reply.status, headers)
      res.end(reply.body)
    })
    .catch((e: unknown) => {
      console.error(`[nmea] ${method} ${req.url ?? ''} failed:`, e)
      setCorsHeaders(res)
      res.writeHead(500, { 'Content-Type': 'application/json' })
      res.end(JSON.stringify({ error: String(e) }))
    })
}

// ── HTTP + WebSocket server ───────────────────────────────────────────────────

const httpServer = http.createServer(handleHttp)
const wss = new WebSocketServer({ server: httpServer })
const clients = new Set<WebSocket>()

httpServer.listen(WS_PORT, () => {
  console.log(`[nmea] HTTP + WebSocket server listening on port ${WS_PORT}`)
})

wss.on('connection', ws => {
  clients.add(ws)
  console.log(`[nmea] Browser client connected (${clients.size} total)`)
  ws.on('close', () => {
    clients.delete(ws)
    console.log(`[nmea] Browser client disconnected (${clients.size} remaining)`)
  })
})

function broadcast(data: PushMessage): void {
  if (clients.size === 0) return
  const msg = JSON.stringify(data)
  for (const ws of clients) {
    if (ws.readyState === ws.OPEN) ws.send(msg)
  }
}

const heartbeat = setInterval(() => {
  broadcast(heartbeatMessage(session, gateway.connected || replaying))
}, cfg.websocket.heartbeatMs)

// ── Start ─────────────────────────────────────────────────────────────────────

const source = cfg.nmea.protocol === 'file'
  ? `file ${cfg.nmea.file ?? ''}`
  : `${cfg.nmea.protocol.toUpperCase()} ${cfg.nmea.host}:${cfg.nmea.port}`
console.log(`[nmea] Starting bridge, NMEA source: ${source}`)

connect()

// Graceful shutdown
process.on('SIGINT', () => {
  console.log('\n[nmea] Shutting down...')
  clearInterval(heartbeat)
  gateway.disconnect()
  wss.close()
  httpServer.close()
  process.exit(0)
})
