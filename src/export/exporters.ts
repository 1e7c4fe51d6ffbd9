import type { Feature, FeatureCollection, Point } from 'geojson'
import type { PositionReport, RawSentence } from '../nmea/types.js'
import { formatTimestamp } from '../nmea/coordinates.js'

// ── Tabular / line formats ────────────────────────────────────────────────────
// All serialisers are pure: same snapshot in, same bytes out.

const COORD_PRECISION = 6

const fmtCoord = (value: number): string => value.toFixed(COORD_PRECISION)

function toSeparated(reports: ReadonlyArray<PositionReport>, sep: string): string {
  const rows = [['ref', 'latitude', 'longitude', 'timestamp'].join(sep)]
  for (const r of reports) {
    rows.push([String(r.ref), fmtCoord(r.latitude), fmtCoord(r.longitude), formatTimestamp(r.timestamp)].join(sep))
  }
  return rows.join('\n') + '\n'
}

export const toCsv = (reports: ReadonlyArray<PositionReport>): string => toSeparated(reports, ',')

export const toTsv = (reports: ReadonlyArray<PositionReport>): string => toSeparated(reports, '\t')

export interface PositionProperties {
  ref: number
  lat: number
  lon: number
  time: string
}

export function positionProperties(r: PositionReport): PositionProperties {
  return { ref: r.ref, lat: r.latitude, lon: r.longitude, time: formatTimestamp(r.timestamp) }
}

export function toJsonLines(reports: ReadonlyArray<PositionReport>): string {
  return reports.map(r => JSON.stringify(positionProperties(r)) + '\n').join('')
}

// ── GeoJSON ───────────────────────────────────────────────────────────────────

export function toFeatureCollection(
  reports: ReadonlyArray<PositionReport>,
): FeatureCollection<Point, PositionProperties> {
  const features = reports.map((r): Feature<Point, PositionProperties> => ({
    type: 'Feature',
    geometry: { type: 'Point', coordinates: [r.longitude, r.latitude] },
    properties: positionProperties(r),
  }))
  return { type: 'FeatureCollection', features }
}

export function toGeoJson(reports: ReadonlyArray<PositionReport>): string {
  return JSON.stringify(toFeatureCollection(reports))
}

// ── Raw NMEA ──────────────────────────────────────────────────────────────────

/** The raw log verbatim, failed sentences included. */
export function toNmea(log: ReadonlyArray<RawSentence>): string {
  return log.map(s => s.text + '\n').join('')
}
