import { differenceInSeconds } from 'date-fns'
import type { PositionReport } from '../nmea/types.js'
import { formatTimestamp, toDate } from '../nmea/coordinates.js'
import { trackDistance } from '../utils/geo.js'
import { roundTo } from '../utils/units.js'
import type { NMEASession } from './session.js'

export interface SummaryPosition {
  'position no': number
  latitude: number
  longitude: number
  time: string
  'speed (knots)'?: number
}

export interface SessionSummary {
  'total positions': number
  'checksum errors': number
  'sentence types'?: Record<string, number>
  'start position'?: SummaryPosition
  'end position'?: SummaryPosition
  duration?: { days: number; hours: number; minutes: number; seconds: number }
  'speeds'?: { 'maximum speed (knots)': number; 'average speed (knots)': number }
  'distance (nm)'?: number
}

function summaryPosition(report: PositionReport): SummaryPosition {
  const pos: SummaryPosition = {
    'position no': report.ref,
    latitude: report.latitude,
    longitude: report.longitude,
    time: formatTimestamp(report.timestamp),
  }
  if (report.speedKnots !== undefined) pos['speed (knots)'] = report.speedKnots
  return pos
}

export function calculateDuration(start: Date, end: Date): NonNullable<SessionSummary['duration']> {
  let remaining = Math.abs(differenceInSeconds(end, start))
  const days = Math.floor(remaining / 86400)
  remaining -= days * 86400
  const hours = Math.floor(remaining / 3600)
  remaining -= hours * 3600
  const minutes = Math.floor(remaining / 60)
  return { days, hours, minutes, seconds: remaining - minutes * 60 }
}

/**
 * Overall statistics for a session. An empty session only reports the two
 * counters; everything else appears once there are positions.
 */
export function summarize(session: NMEASession): SessionSummary {
  const stats = session.statistics()
  const reports = session.positions()
  const summary: SessionSummary = {
    'total positions': reports.length,
    'checksum errors': stats.checksumErrors,
  }
  if (reports.length === 0) return summary

  const first = reports[0]
  const last = reports[reports.length - 1]
  summary['sentence types'] = { ...stats.sentenceTypes }
  summary['start position'] = summaryPosition(first)
  summary['end position'] = summaryPosition(last)

  const start = toDate(first.timestamp)
  const end = toDate(last.timestamp)
  if (start && end) summary.duration = calculateDuration(start, end)

  // Folded in one pass; a multi-day capture holds too many reports to spread
  let maxSpeed = -Infinity
  let speedSum = 0
  let speedCount = 0
  for (const r of reports) {
    if (r.speedKnots === undefined) continue
    if (r.speedKnots > maxSpeed) maxSpeed = r.speedKnots
    speedSum += r.speedKnots
    speedCount++
  }
  if (speedCount) {
    summary.speeds = {
      'maximum speed (knots)': maxSpeed,
      'average speed (knots)': roundTo(speedSum / speedCount, 3),
    }
  }

  summary['distance (nm)'] = roundTo(trackDistance(reports), 3)
  return summary
}

/** Plain-text rendering: the JSON layout without braces, commas or quotes. */
export function formatSummaryText(summary: SessionSummary): string {
  return JSON.stringify(summary, null, 3).replace(/[{},"]/g, '')
}
