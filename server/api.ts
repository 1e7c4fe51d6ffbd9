import { z } from 'zod'
import {
  EXPORT_CONTENT_TYPES,
  EXPORT_EXTENSIONS,
  ExportError,
  exportSession,
  parseExportFormat,
  toKml,
  toNetworkLink,
} from '../src/export/index.js'
import type { ExportErrorCode, ExportSink } from '../src/export/index.js'
import type { NMEASession, LineOutcome } from '../src/session/session.js'
import { formatSummaryText, summarize } from '../src/session/summary.js'
import type { PositionReport, Statistics } from '../src/nmea/types.js'
import type { Config } from './config.js'

// ── HTTP API ──────────────────────────────────────────────────────────────────
// Routing is kept free of node:http so it can be exercised without a socket.

export interface BridgeState {
  nmeaConnected: boolean
  wsClients: number
}

export interface ApiContext {
  session: NMEASession
  config(): Config
  state(): BridgeState
  connect(): void
  disconnect(): void
  /** Apply and persist a source patch; throws a ZodError when it is invalid. */
  updateNmeaConfig(patch: unknown): Config
}

export interface ApiRequest {
  method: string
  url: string
  /** Host header, used to build absolute links. */
  host?: string
  body?: string
}

export interface ApiResponse {
  status: number
  contentType?: string
  headers?: Record<string, string>
  body: string | Uint8Array
}

const JSON_TYPE = 'application/json'

function json(status: number, data: unknown): ApiResponse {
  return { status, contentType: JSON_TYPE, body: JSON.stringify(data) }
}

const EXPORT_STATUS: Record<ExportErrorCode, number> = {
  'unknown-format': 400,
  'ingest-active': 409,
  empty: 409,
  sink: 500,
}

const SinceQuery = z.coerce.number().int().min(0)

async function handleExport(ctx: ApiContext, name: string): Promise<ApiResponse> {
  try {
    const format = parseExportFormat(name)
    let payload: string | Uint8Array = ''
    const sink: ExportSink = { write: data => { payload = data } }
    await exportSession(ctx.session, format, sink, { name: ctx.config().export.name })
    return {
      status: 200,
      contentType: EXPORT_CONTENT_TYPES[format],
      headers: { 'Content-Disposition': `attachment; filename="positions${EXPORT_EXTENSIONS[format]}"` },
      body: payload,
    }
  } catch (e) {
    if (e instanceof ExportError) return json(EXPORT_STATUS[e.code], { error: e.message, code: e.code })
    throw e
  }
}

function handleConfig(ctx: ApiContext, body: string | undefined): ApiResponse {
  let patch: unknown
  try {
    patch = JSON.parse(body ?? '')
  } catch (e) {
    return json(400, { error: `invalid JSON body: ${e instanceof Error ? e.message : String(e)}` })
  }
  try {
    const cfg = ctx.updateNmeaConfig(patch)
    console.log('[nmea] Config updated:', cfg.nmea)
    ctx.connect()
    return json(200, { ok: true, config: { nmea: cfg.nmea } })
  } catch (e) {
    if (e instanceof z.ZodError) {
      return json(400, { error: e.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ') })
    }
    throw e
  }
}

export async function routeRequest(ctx: ApiContext, req: ApiRequest): Promise<ApiResponse> {
  const { method } = req
  const url = new URL(req.url, `http://${req.host ?? 'localhost'}`)
  const path = url.pathname

  // Preflight
  if (method === 'OPTIONS') return { status: 204, body: '' }

  if (method === 'GET') {
    if (path === '/api/status') {
      return json(200, {
        ...ctx.state(),
        ingesting: ctx.session.isIngesting,
        config: { nmea: ctx.config().nmea },
      })
    }
    if (path === '/api/statistics') return json(200, ctx.session.statistics())

    if (path === '/api/positions') {
      const since = SinceQuery.safeParse(url.searchParams.get('since') ?? 0)
      if (!since.success) return json(400, { error: 'since must be a non-negative integer' })
      return json(200, ctx.session.positions().filter(r => r.ref > since.data))
    }

    if (path === '/api/summary') {
      const summary = summarize(ctx.session)
      if (url.searchParams.get('format') === 'text') {
        return { status: 200, contentType: 'text/plain', body: formatSummaryText(summary) }
      }
      return json(200, summary)
    }

    // Snapshot of the positions so far, the target of the network link
    if (path === '/api/live/kml') {
      return { status: 200, contentType: EXPORT_CONTENT_TYPES.kml, body: toKml(ctx.session.positions(), ctx.config().export.name) }
    }

    if (path === '/api/export/kml-link') {
      const href = `${url.origin}/api/live/kml`
      return {
        status: 200,
        contentType: EXPORT_CONTENT_TYPES.kml,
        headers: { 'Content-Disposition': 'attachment; filename="live.kml"' },
        body: toNetworkLink(href, ctx.config().export.refreshSeconds),
      }
    }

    if (path.startsWith('/api/export/')) {
      let name: string
      try {
        name = decodeURIComponent(path.substring('/api/export/'.length))
      } catch (e) {
        if (e instanceof URIError) return json(400, { error: `malformed export path: ${path}` })
        throw e
      }
      return handleExport(ctx, name)
    }
  }

  if (method === 'POST') {
    if (path === '/api/reset') {
      ctx.session.reset()
      console.log('[nmea] Session reset')
      return json(200, { ok: true })
    }
    if (path === '/api/config') return handleConfig(ctx, req.body)
    if (path === '/api/connect') {
      ctx.connect()
      return json(200, { ok: true })
    }
    if (path === '/api/disconnect') {
      ctx.disconnect()
      return json(200, { ok: true })
    }
  }

  return json(404, { error: 'Not found' })
}

// ── WebSocket push messages ───────────────────────────────────────────────────

export type PushMessage =
  | { type: 'report'; report: PositionReport }
  | { type: 'enriched'; report: PositionReport }
  | { type: 'heartbeat'; nmeaConnected: boolean; statistics: Pick<Statistics, 'totalSentences' | 'totalReports' | 'checksumErrors'> }

/** Message for browser clients, if the line changed the stored reports. */
export function pushMessage(outcome: LineOutcome): PushMessage | undefined {
  if (outcome.kind === 'report' || outcome.kind === 'enriched') {
    return { type: outcome.kind, report: outcome.report }
  }
  return undefined
}

export function heartbeatMessage(session: NMEASession, nmeaConnected: boolean): PushMessage {
  const { totalSentences, totalReports, checksumErrors } = session.statistics()
  return { type: 'heartbeat', nmeaConnected, statistics: { totalSentences, totalReports, checksumErrors } }
}
