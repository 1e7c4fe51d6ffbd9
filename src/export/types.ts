export const EXPORT_FORMATS = ['csv', 'tsv', 'kml', 'kmz', 'geojson', 'jsonl', 'nmea'] as const

export type ExportFormat = typeof EXPORT_FORMATS[number]

export const EXPORT_EXTENSIONS: Record<ExportFormat, string> = {
  csv: '.csv',
  tsv: '.tsv',
  kml: '.kml',
  kmz: '.kmz',
  geojson: '.geojson',
  jsonl: '.jsonl',
  nmea: '.nmea',
}

export const EXPORT_CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv',
  tsv: 'text/tab-separated-values',
  kml: 'application/vnd.google-earth.kml+xml',
  kmz: 'application/vnd.google-earth.kmz',
  geojson: 'application/geo+json',
  jsonl: 'application/jsonl',
  nmea: 'text/plain',
}

/** Destination of an export: a file, an HTTP response, a buffer in a test. */
export interface ExportSink {
  write(data: string | Uint8Array): Promise<void> | void
}

export type ExportErrorCode = 'ingest-active' | 'empty' | 'unknown-format' | 'sink'

export class ExportError extends Error {
  readonly code: ExportErrorCode

  constructor(code: ExportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ExportError'
    this.code = code
  }
}

export interface ExportResult {
  format: ExportFormat
  /** Positions (or raw sentences, for NMEA) written. */
  items: number
  bytes: number
}
