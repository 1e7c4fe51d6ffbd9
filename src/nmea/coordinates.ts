import type { CalendarDate, TimeOfDay, UtcTimestamp } from './types.js'
import { coordToDecimal, type Hemisphere } from '../utils/geo.js'

// ── Coordinate / time codec ───────────────────────────────────────────────────
// NMEA encodes positions as (D)DDMM.MMMM plus a hemisphere letter, times as
// HHMMSS[.sss] and dates as DDMMYY. Everything here is UTC.

export type CodecResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: 'invalid-coordinate' | 'invalid-time' | 'invalid-date'; reason: string }

type Axis = 'latitude' | 'longitude'

const AXES: Record<Axis, { max: number; positive: Hemisphere; negative: Hemisphere }> = {
  latitude: { max: 90, positive: 'N', negative: 'S' },
  longitude: { max: 180, positive: 'E', negative: 'W' },
}

const NUMERIC = /^\d+(?:\.\d+)?$/

// Convert NMEA lat/lon (DDDMM.MMMM) + hemisphere to signed decimal degrees
function parseAxis(raw: string, dir: string, axis: Axis): CodecResult<number> {
  const { max, positive, negative } = AXES[axis]
  if (!NUMERIC.test(raw)) {
    return { ok: false, error: 'invalid-coordinate', reason: `${axis} "${raw}" is not numeric` }
  }
  if (dir !== positive && dir !== negative) {
    return { ok: false, error: 'invalid-coordinate', reason: `${axis} hemisphere "${dir}" is not ${positive} or ${negative}` }
  }

  const dot = raw.indexOf('.')
  const split = (dot < 0 ? raw.length : dot) - 2
  if (split < 1) {
    return { ok: false, error: 'invalid-coordinate', reason: `${axis} "${raw}" has no degree digits` }
  }
  const deg = parseInt(raw.substring(0, split), 10)
  const min = parseFloat(raw.substring(split))
  if (deg > max || min >= 60) {
    return { ok: false, error: 'invalid-coordinate', reason: `${axis} "${raw}" out of range` }
  }

  const value = coordToDecimal({ degrees: deg, minutes: min, direction: dir === negative ? negative : positive })
  if (Math.abs(value) > max) {
    return { ok: false, error: 'invalid-coordinate', reason: `${axis} "${raw}" exceeds ${max}°` }
  }
  return { ok: true, value }
}

export function parseLatitude(raw: string, dir: string): CodecResult<number> {
  return parseAxis(raw, dir, 'latitude')
}

export function parseLongitude(raw: string, dir: string): CodecResult<number> {
  return parseAxis(raw, dir, 'longitude')
}

export function isValidPosition(latitude: number, longitude: number): boolean {
  return Number.isFinite(latitude) && Number.isFinite(longitude) &&
    latitude >= -90 && latitude <= 90 && longitude >= -180 && longitude <= 180
}

// ── Time & date ───────────────────────────────────────────

const TIME = /^(\d{2})(\d{2})(\d{2})(?:\.(\d+))?$/
const DATE = /^(\d{2})(\d{2})(\d{2})$/

/** HHMMSS or HHMMSS.sss; fractions finer than a millisecond are truncated. */
export function parseTime(raw: string): CodecResult<TimeOfDay> {
  const m = TIME.exec(raw)
  if (!m) return { ok: false, error: 'invalid-time', reason: `time "${raw}" is not HHMMSS[.sss]` }
  const hours = Number(m[1])
  const minutes = Number(m[2])
  const seconds = Number(m[3])
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return { ok: false, error: 'invalid-time', reason: `time "${raw}" out of range` }
  }
  const fraction = m[4] ?? ''
  const milliseconds = fraction ? Number(fraction.substring(0, 3).padEnd(3, '0')) : 0
  return { ok: true, value: { hours, minutes, seconds, milliseconds } }
}

/** DDMMYY; the year is always 2000 + YY. */
export function parseDate(raw: string): CodecResult<CalendarDate> {
  const m = DATE.exec(raw)
  if (!m) return { ok: false, error: 'invalid-date', reason: `date "${raw}" is not DDMMYY` }
  const day = Number(m[1])
  const month = Number(m[2])
  const year = 2000 + Number(m[3])
  const probe = new Date(Date.UTC(year, month - 1, day))
  if (month < 1 || month > 12 || day < 1 || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return { ok: false, error: 'invalid-date', reason: `date "${raw}" is not a calendar date` }
  }
  return { ok: true, value: { year, month, day } }
}

export function combineTimestamp(time: TimeOfDay, date?: CalendarDate): UtcTimestamp {
  return date ? { ...time, date } : { ...time }
}

export function sameInstant(a: TimeOfDay, b: TimeOfDay): boolean {
  return a.hours === b.hours && a.minutes === b.minutes &&
    a.seconds === b.seconds && a.milliseconds === b.milliseconds
}

const pad = (n: number, width = 2) => n.toString().padStart(width, '0')

/** ISO-8601 UTC; time-only ("HH:MM:SSZ") while no date is known. */
export function formatTimestamp(ts: UtcTimestamp): string {
  const ms = ts.milliseconds ? `.${pad(ts.milliseconds, 3)}` : ''
  const time = `${pad(ts.hours)}:${pad(ts.minutes)}:${pad(ts.seconds)}${ms}Z`
  if (!ts.date) return time
  return `${pad(ts.date.year, 4)}-${pad(ts.date.month)}-${pad(ts.date.day)}T${time}`
}

export function toDate(ts: UtcTimestamp): Date | undefined {
  if (!ts.date) return undefined
  return new Date(Date.UTC(ts.date.year, ts.date.month - 1, ts.date.day,
    ts.hours, ts.minutes, ts.seconds, ts.milliseconds))
}
