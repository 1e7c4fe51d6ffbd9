import { existsSync, readFileSync, writeFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'
import { z } from 'zod'

// ── Bridge configuration ──────────────────────────────────────────────────────
// server/config.json, edited by hand or through POST /api/config.

const NmeaSourceSchema = z.object({
  host:                z.string().min(1),
  port:                z.number().int().min(1).max(65535),
  protocol:            z.enum(['tcp', 'udp', 'file']),
  file:                z.string().min(1).optional(),
  reconnectIntervalMs: z.number().int().min(100),
})

const WebsocketSchema = z.object({
  port:        z.number().int().min(1).max(65535),
  heartbeatMs: z.number().int().min(100),
})

const ExportSchema = z.object({
  name:           z.string().min(1),
  refreshSeconds: z.number().positive(),
})

const SessionSchema = z.object({
  retainRawSentences: z.boolean(),
})

export const ConfigSchema = z.object({
  nmea:      NmeaSourceSchema,
  websocket: WebsocketSchema,
  export:    ExportSchema,
  session:   SessionSchema,
}).refine(cfg => cfg.nmea.protocol !== 'file' || cfg.nmea.file !== undefined, {
  message: 'nmea.file is required when nmea.protocol is "file"',
  path: ['nmea', 'file'],
})

export type Config = z.infer<typeof ConfigSchema>
export type NmeaSourceConfig = Config['nmea']

/** Fields of the NMEA source that POST /api/config may change. */
export const NmeaPatchSchema = NmeaSourceSchema.partial().strict()

// Every section may be partial on disk; missing keys fall back to defaults
const StoredConfigSchema = z.object({
  nmea:      NmeaSourceSchema.partial().optional(),
  websocket: WebsocketSchema.partial().optional(),
  export:    ExportSchema.partial().optional(),
  session:   SessionSchema.partial().optional(),
})

export const DEFAULT_CONFIG: Config = {
  nmea: { host: '192.168.0.1', port: 10110, protocol: 'tcp', reconnectIntervalMs: 5000 },
  websocket: { port: 3001, heartbeatMs: 10000 },
  export: { name: 'NMEA positions', refreshSeconds: 1 },
  session: { retainRawSentences: true },
}

export const defaultConfigPath = join(dirname(fileURLToPath(import.meta.url)), 'config.json')

/** Validate a parsed config.json; throws a ZodError on bad values. */
export function parseConfig(raw: unknown): Config {
  const stored = StoredConfigSchema.parse(raw)
  return ConfigSchema.parse({
    nmea:      { ...DEFAULT_CONFIG.nmea, ...stored.nmea },
    websocket: { ...DEFAULT_CONFIG.websocket, ...stored.websocket },
    export:    { ...DEFAULT_CONFIG.export, ...stored.export },
    session:   { ...DEFAULT_CONFIG.session, ...stored.session },
  })
}

export function loadConfig(path = defaultConfigPath): Config {
  if (!existsSync(path)) {
    console.warn('[nmea] config.json not found, using defaults')
    return DEFAULT_CONFIG
  }
  try {
    return parseConfig(JSON.parse(readFileSync(path, 'utf-8')))
  } catch (e) {
    const reason = e instanceof z.ZodError
      ? e.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
      : e instanceof Error ? e.message : String(e)
    console.warn(`[nmea] Failed to parse config.json (${reason}), using defaults`)
    return DEFAULT_CONFIG
  }
}

export function saveConfig(cfg: Config, path = defaultConfigPath): void {
  writeFileSync(path, JSON.stringify(cfg, null, 2) + '\n', 'utf-8')
}

/** New config with `patch` applied to the NMEA source; throws a ZodError if invalid. */
export function applyNmeaPatch(cfg: Config, patch: unknown): Config {
  const changes = NmeaPatchSchema.parse(patch)
  return ConfigSchema.parse({ ...cfg, nmea: { ...cfg.nmea, ...changes } })
}
