import { writeFile } from 'node:fs/promises'
import type { NMEASession } from '../session/session.js'
import type { PositionReport } from '../nmea/types.js'
import { toCsv, toGeoJson, toJsonLines, toNmea, toTsv } from './exporters.js'
import { toKml, toKmz } from './kml.js'
import { EXPORT_FORMATS, ExportError } from './types.js'
import type { ExportFormat, ExportResult, ExportSink } from './types.js'

export * from './types.js'
export * from './exporters.js'
export { escapeXml, formatPlacemarkDescription, toKml, toKmz, toNetworkLink } from './kml.js'

export function isExportFormat(name: string): name is ExportFormat {
  return EXPORT_FORMATS.some(format => format === name)
}

export function parseExportFormat(name: string): ExportFormat {
  const normalised = name.trim().toLowerCase()
  if (!isExportFormat(normalised)) {
    throw new ExportError('unknown-format', `unknown export format "${name}" (expected ${EXPORT_FORMATS.join(', ')})`)
  }
  return normalised
}

function renderPositions(
  format: Exclude<ExportFormat, 'nmea'>,
  reports: ReadonlyArray<PositionReport>,
  name?: string,
): Promise<string | Uint8Array> | string {
  switch (format) {
    case 'csv': return toCsv(reports)
    case 'tsv': return toTsv(reports)
    case 'jsonl': return toJsonLines(reports)
    case 'geojson': return toGeoJson(reports)
    case 'kml': return toKml(reports, name)
    case 'kmz': return toKmz(reports, name)
  }
}

/** Writes the whole export to `path` in one go. */
export function createFileSink(path: string): ExportSink {
  return { write: data => writeFile(path, data) }
}

/**
 * Serialise the session in `format` and hand the result to `sink`.
 *
 * The snapshot is taken before anything is rendered. Live ingest must be
 * stopped first; the session is not locked here.
 */
export async function exportSession(
  session: NMEASession,
  format: ExportFormat,
  sink: ExportSink,
  options: { name?: string } = {},
): Promise<ExportResult> {
  if (session.isIngesting) {
    throw new ExportError('ingest-active', 'cannot export while reading from a live source; stop ingest first')
  }

  let payload: string | Uint8Array
  let items: number
  if (format === 'nmea') {
    const log = session.sentenceLog()
    if (log.length === 0) throw new ExportError('empty', 'no sentences to export')
    payload = toNmea(log)
    items = log.length
  } else {
    const reports = session.positions()
    if (reports.length === 0) throw new ExportError('empty', 'no positions to export')
    items = reports.length
    payload = await renderPositions(format, reports, options.name)
  }

  try {
    await sink.write(payload)
  } catch (e) {
    throw new ExportError('sink', `writing ${format} export failed: ${e instanceof Error ? e.message : String(e)}`, { cause: e })
  }

  const bytes = typeof payload === 'string' ? Buffer.byteLength(payload, 'utf8') : payload.byteLength
  return { format, items, bytes }
}
