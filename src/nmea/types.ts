// ============================================================
// DATA MODELS – NMEA sentences and position reports
// ============================================================

// ── Raw input ─────────────────────────────────────────────

/** One non-blank input line as received, terminator stripped. */
export interface RawSentence {
  readonly text: string
  readonly index: number
  readonly valid: boolean
}

// ── Tokenized sentence ────────────────────────────────────

export interface ParsedFields {
  talker: string // e.g. "GP", "GN"
  type: string   // e.g. "GGA", "RMC"
  fields: string[] // fields[0] is the address field ("GPGGA")
}

// ── Time ──────────────────────────────────────────────────

export interface CalendarDate {
  year: number
  month: number // 1-12
  day: number
}

export interface TimeOfDay {
  hours: number
  minutes: number
  seconds: number
  milliseconds: number
}

/** UTC instant; `date` is unset until a date-bearing sentence has been seen. */
export interface UtcTimestamp extends TimeOfDay {
  date?: CalendarDate
}

// ── Position report ───────────────────────────────────────

export type PositionSentenceType = 'GGA' | 'RMC' | 'GLL'

/** A decoded fix before the store assigns its reference number. */
export interface PositionFix {
  latitude: number      // decimal degrees, positive = N
  longitude: number     // decimal degrees, positive = E
  timestamp: UtcTimestamp
  fixQuality?: number   // GGA only
  speedKnots?: number   // speed over ground
  courseTrue?: number   // course over ground, degrees true
  altitude?: number     // metres above mean sea level, GGA only
  satellites?: number   // satellites used in the fix, GGA only
  talker: string
  sentenceType: PositionSentenceType
}

export interface PositionReport extends Readonly<PositionFix> {
  readonly ref: number
}

// ── Statistics ────────────────────────────────────────────

export interface Statistics {
  readonly totalSentences: number
  readonly checksumErrors: number
  readonly malformedSentences: number
  readonly decodeErrors: number
  readonly noFix: number
  readonly ignored: number
  readonly totalReports: number
  readonly lastReport?: PositionReport
  readonly sentenceTypes: Readonly<Record<string, number>>
  readonly satellitesInView?: number
}
