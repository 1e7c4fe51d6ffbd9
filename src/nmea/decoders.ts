// ── NMEA 0183 sentence decoders ───────────────────────────────────────────────
// One rule per supported sentence type, keyed by the type code. Anything not
// in DECODERS is valid NMEA outside the supported set and is ignored.

import { parseDate, parseLatitude, parseLongitude, parseTime } from './coordinates.js'
import type { CalendarDate, ParsedFields, PositionSentenceType, TimeOfDay } from './types.js'
import { kmhToKts } from '../utils/units.js'

export interface DecodedPosition {
  latitude: number
  longitude: number
  time: TimeOfDay
  date?: CalendarDate
  fixQuality?: number
  speedKnots?: number
  courseTrue?: number
  altitude?: number
  satellites?: number
}

export type DecodeOutcome =
  | { kind: 'position'; sentenceType: PositionSentenceType; position: DecodedPosition }
  | { kind: 'no-fix'; sentenceType: PositionSentenceType; time?: TimeOfDay; date?: CalendarDate }
  | { kind: 'velocity'; speedKnots?: number; courseTrue?: number }
  | { kind: 'satellites'; inView: number }
  | { kind: 'unsupported'; type: string }
  | { kind: 'error'; type: string; reason: string }

type Decoder = (f: string[]) => DecodeOutcome

class DecodeFailure extends Error {}

function field(f: string[], i: number): string {
  return f[i] ?? ''
}

// Optional numeric field: empty → undefined, garbage → DecodeFailure
function optionalNumber(f: string[], i: number, name: string): number | undefined {
  const raw = field(f, i)
  if (raw === '') return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) throw new DecodeFailure(`${name} "${raw}" is not a number`)
  return value
}

function required<T>(result: { ok: true; value: T } | { ok: false; reason: string }): T {
  if (!result.ok) throw new DecodeFailure(result.reason)
  return result.value
}

function latLon(f: string[], at: number): { latitude: number; longitude: number } {
  return {
    latitude: required(parseLatitude(field(f, at), field(f, at + 1))),
    longitude: required(parseLongitude(field(f, at + 2), field(f, at + 3))),
  }
}

// Time/date on a no-fix sentence is still useful context, but a bad value
// there is not worth failing the sentence over.
function lenientTime(raw: string): TimeOfDay | undefined {
  const r = parseTime(raw)
  return r.ok ? r.value : undefined
}

function lenientDate(raw: string): CalendarDate | undefined {
  const r = parseDate(raw)
  return r.ok ? r.value : undefined
}

// $xxGGA,hhmmss.ss,llll.ll,a,yyyyy.yy,a,q,nn,hdop,alt,M,sep,M,age,stn
const decodeGGA: Decoder = f => {
  const qualityRaw = field(f, 6)
  const fixQuality = qualityRaw === '' ? 0 : Number(qualityRaw)
  if (!Number.isInteger(fixQuality)) throw new DecodeFailure(`fix quality "${qualityRaw}" is not an integer`)
  if (fixQuality === 0) return { kind: 'no-fix', sentenceType: 'GGA', time: lenientTime(field(f, 1)) }

  const time = required(parseTime(field(f, 1)))
  return {
    kind: 'position',
    sentenceType: 'GGA',
    position: {
      ...latLon(f, 2),
      time,
      fixQuality,
      satellites: optionalNumber(f, 7, 'satellites'),
      altitude: optionalNumber(f, 9, 'altitude'),
    },
  }
}

// $xxRMC,hhmmss,A,llll.ll,a,yyyyy.yy,a,sog,cog,ddmmyy,magvar,E/W,mode
const decodeRMC: Decoder = f => {
  if (field(f, 2) !== 'A') {
    return { kind: 'no-fix', sentenceType: 'RMC', time: lenientTime(field(f, 1)), date: lenientDate(field(f, 9)) }
  }

  const time = required(parseTime(field(f, 1)))
  const dateRaw = field(f, 9)
  const date = dateRaw === '' ? undefined : required(parseDate(dateRaw))
  return {
    kind: 'position',
    sentenceType: 'RMC',
    position: {
      ...latLon(f, 3),
      time,
      date,
      speedKnots: optionalNumber(f, 7, 'speed'),
      courseTrue: optionalNumber(f, 8, 'course'),
    },
  }
}

// $xxGLL,llll.ll,a,yyyyy.yy,a,hhmmss,A,mode
const decodeGLL: Decoder = f => {
  if (field(f, 6) !== 'A') return { kind: 'no-fix', sentenceType: 'GLL', time: lenientTime(field(f, 5)) }

  const position = latLon(f, 1)
  const time = required(parseTime(field(f, 5)))
  return { kind: 'position', sentenceType: 'GLL', position: { ...position, time } }
}

// $xxVTG,cogT,T,cogM,M,sogKn,N,sogKmh,K,mode
const decodeVTG: Decoder = f => {
  const courseTrue = optionalNumber(f, 1, 'course')
  const knots = optionalNumber(f, 5, 'speed')
  const kmh = optionalNumber(f, 7, 'speed')
  const speedKnots = knots ?? (kmh !== undefined ? kmhToKts(kmh) : undefined)
  return { kind: 'velocity', speedKnots, courseTrue }
}

// $xxGSV,total,msgNo,inView,(prn,elev,azim,snr)x4
const decodeGSV: Decoder = f => {
  const inView = optionalNumber(f, 3, 'satellites in view')
  if (inView === undefined || !Number.isInteger(inView)) {
    throw new DecodeFailure(`satellites in view "${field(f, 3)}" is not an integer`)
  }
  return { kind: 'satellites', inView }
}

export const DECODERS: Readonly<Record<string, Decoder>> = {
  GGA: decodeGGA,
  RMC: decodeRMC,
  GLL: decodeGLL,
  VTG: decodeVTG,
  GSV: decodeGSV,
}

export function isSupported(type: string): boolean {
  return Object.prototype.hasOwnProperty.call(DECODERS, type)
}

export function decodeSentence(sentence: ParsedFields): DecodeOutcome {
  if (!isSupported(sentence.type)) return { kind: 'unsupported', type: sentence.type }
  const decoder = DECODERS[sentence.type]
  try {
    return decoder(sentence.fields)
  } catch (e) {
    if (e instanceof DecodeFailure) return { kind: 'error', type: sentence.type, reason: e.message }
    throw e
  }
}
