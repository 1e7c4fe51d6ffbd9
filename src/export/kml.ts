import JSZip from 'jszip'
import type { PositionReport } from '../nmea/types.js'
import { formatTimestamp } from '../nmea/coordinates.js'
import { formatHeading, formatSpeed } from '../utils/units.js'
import { formatPosition } from '../utils/geo.js'

// ── Keyhole Markup Language ───────────────────────────────────────────────────

/** Make a string safe for KML element text: escapes markup, flattens whitespace. */
export const escapeXml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/\t/g, '    ')
    .replace(/\r?\n/g, '')

/** Key/value pairs rendered as HTML lines inside a CDATA block. */
export function formatPlacemarkDescription(items: Record<string, string | number>): string {
  const lines = Object.entries(items).map(([key, value]) => `${key.toUpperCase()} - ${value}<br  />\n`)
  return `<![CDATA[${lines.join('')}]]>`
}

const coords = (r: PositionReport): string => `${r.longitude},${r.latitude},0`

function placemark(r: PositionReport): string {
  const time = formatTimestamp(r.timestamp)
  const details: Record<string, string | number> = {
    ref: r.ref,
    time,
    latitude: r.latitude,
    longitude: r.longitude,
    position: formatPosition(r.latitude, r.longitude),
  }
  if (r.speedKnots !== undefined) details.speed = formatSpeed(r.speedKnots)
  if (r.courseTrue !== undefined) details.course = formatHeading(r.courseTrue)
  if (r.altitude !== undefined) details.altitude = `${r.altitude} m`

  // KML <when> needs a full dateTime; time-of-day alone is not valid there
  const timestamp = r.timestamp.date ? `\n<TimeStamp>\n<when>${time}</when>\n</TimeStamp>` : ''
  return `
<Placemark>
<name>${escapeXml(`Position ${r.ref}`)}</name>
<description>${formatPlacemarkDescription(details)}</description>${timestamp}
<LookAt>
<longitude>${r.longitude}</longitude>
<latitude>${r.latitude}</latitude>
<altitude>0</altitude>
<heading>-0</heading>
<tilt>0</tilt>
<range>500</range>
</LookAt>
<Point>
<coordinates>${coords(r)}</coordinates>
</Point>
</Placemark>`
}

function trackPlacemark(reports: ReadonlyArray<PositionReport>): string {
  return `
<Placemark>
<name>Track</name>
<LineString>
<coordinates>${reports.map(coords).join('\n')}</coordinates>
</LineString>
</Placemark>`
}

export function toKml(reports: ReadonlyArray<PositionReport>, name = 'NMEA positions'): string {
  const parts = [
    `<?xml version="1.0" encoding="UTF-8"?>
<kml xmlns="http://www.opengis.net/kml/2.2">
<Document>
<name>${escapeXml(name)}</name>
<open>1</open>`,
  ]
  for (const r of reports) parts.push(placemark(r))
  if (reports.length >= 2) parts.push(trackPlacemark(reports))
  parts.push('\n</Document></kml>\n')
  return parts.join('')
}

/** Companion document that makes Google Earth re-fetch `href` every `refreshSeconds`. */
export function toNetworkLink(href: string, refreshSeconds = 1): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<kml xmlns="http://www.opengis.net/kml/2.2">
  <NetworkLink>
    <name>Live GPS Position</name>
    <description>current GPS position</description>
    <Link>
      <href>${escapeXml(href)}</href>
      <refreshVisibility>1</refreshVisibility>
      <refreshMode>onInterval</refreshMode>
      <refreshInterval>${refreshSeconds}</refreshInterval>
    </Link>
  </NetworkLink>
</kml>
`
}

/** KML zipped as doc.kml, the layout Google Earth expects in a .kmz. */
export async function toKmz(reports: ReadonlyArray<PositionReport>, name?: string): Promise<Uint8Array> {
  const zip = new JSZip()
  zip.file('doc.kml', toKml(reports, name))
  return zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE', compressionOptions: { level: 6 } })
}
