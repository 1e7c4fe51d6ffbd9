import type { CalendarDate, PositionReport, RawSentence, Statistics, TimeOfDay } from '../nmea/types.js'
import { validateChecksum } from '../nmea/checksum.js'
import { tokenize } from '../nmea/tokenizer.js'
import { decodeSentence } from '../nmea/decoders.js'
import { combineTimestamp, sameInstant } from '../nmea/coordinates.js'
import { PositionStore } from './positionStore.js'
import { SentenceLog } from './sentenceLog.js'

export type LineOutcome =
  | { kind: 'blank' }
  | { kind: 'checksum-failure'; sentence: RawSentence; checksum?: string; computed?: string }
  | { kind: 'malformed-sentence'; sentence: RawSentence; reason: string }
  | { kind: 'decode-failure'; sentence: RawSentence; type: string; reason: string }
  | { kind: 'no-fix'; sentence: RawSentence; type: string }
  | { kind: 'report'; sentence: RawSentence; report: PositionReport }
  | { kind: 'enriched'; sentence: RawSentence; report: PositionReport }
  | { kind: 'dropped'; sentence: RawSentence; reason: string }
  | { kind: 'satellites'; sentence: RawSentence; inView: number }
  | { kind: 'ignored'; sentence: RawSentence; type: string }

export interface SessionOptions {
  /** Keep every raw line for the NMEA export (default true). */
  retainRawSentences?: boolean
}

interface Counters {
  totalSentences: number
  checksumErrors: number
  malformedSentences: number
  decodeErrors: number
  noFix: number
  ignored: number
}

const emptyCounters = (): Counters => ({
  totalSentences: 0,
  checksumErrors: 0,
  malformedSentences: 0,
  decodeErrors: 0,
  noFix: 0,
  ignored: 0,
})

/**
 * One read session: feeds lines through checksum → tokenizer → decoder and
 * keeps the resulting position store, raw log and counters.
 *
 * Every method is synchronous. The caller marks live reading with
 * `startIngest()`/`stopIngest()`; exports refuse to run in between.
 */
export class NMEASession {
  readonly store = new PositionStore()
  readonly log = new SentenceLog()
  readonly retainRawSentences: boolean

  private counters = emptyCounters()
  private sentenceTypes = new Map<string, number>()
  private satellitesInView: number | undefined
  private lastDate: CalendarDate | undefined
  private currentTime: TimeOfDay | undefined
  private ingesting = false

  constructor(options: SessionOptions = {}) {
    this.retainRawSentences = options.retainRawSentences ?? true
  }

  get isIngesting(): boolean {
    return this.ingesting
  }

  startIngest(): void {
    this.ingesting = true
  }

  stopIngest(): void {
    this.ingesting = false
  }

  processLine(line: string): LineOutcome {
    const text = line.replace(/[\r\n]+$/, '')
    if (text.trim() === '') return { kind: 'blank' }

    const check = validateChecksum(text)
    const sentence: RawSentence = Object.freeze({
      text,
      index: this.counters.totalSentences,
      valid: check.valid,
    })
    this.counters.totalSentences++
    if (this.retainRawSentences) this.log.append(sentence)

    if (!check.valid) {
      this.counters.checksumErrors++
      return { kind: 'checksum-failure', sentence, checksum: check.checksum, computed: check.computed }
    }

    const tokens = tokenize(check.body)
    if (!tokens.ok) {
      this.counters.malformedSentences++
      return { kind: 'malformed-sentence', sentence, reason: tokens.reason }
    }

    const { talker, type } = tokens.sentence
    const key = talker + type
    this.sentenceTypes.set(key, (this.sentenceTypes.get(key) ?? 0) + 1)

    const decoded = decodeSentence(tokens.sentence)
    switch (decoded.kind) {
      case 'unsupported':
        this.counters.ignored++
        return { kind: 'ignored', sentence, type }

      case 'error':
        this.counters.decodeErrors++
        return { kind: 'decode-failure', sentence, type, reason: decoded.reason }

      case 'no-fix':
        if (decoded.date) this.lastDate = decoded.date
        if (decoded.time) this.currentTime = decoded.time
        this.counters.noFix++
        return { kind: 'no-fix', sentence, type }

      case 'satellites':
        this.satellitesInView = decoded.inView
        return { kind: 'satellites', sentence, inView: decoded.inView }

      case 'velocity': {
        const last = this.store.last()
        if (!last) return { kind: 'dropped', sentence, reason: 'no stored report to enrich' }
        if (!this.currentTime || !sameInstant(this.currentTime, last.timestamp)) {
          return { kind: 'dropped', sentence, reason: 'last report belongs to an earlier instant' }
        }
        const update: { speedKnots?: number; courseTrue?: number } = {}
        if (decoded.speedKnots !== undefined) update.speedKnots = decoded.speedKnots
        if (decoded.courseTrue !== undefined) update.courseTrue = decoded.courseTrue
        const report = this.store.replaceLast(update) ?? last
        return { kind: 'enriched', sentence, report }
      }

      case 'position': {
        const { position, sentenceType } = decoded
        if (position.date) this.lastDate = position.date
        this.currentTime = position.time
        const { time, date, ...rest } = position
        const ref = this.store.append({
          ...rest,
          timestamp: combineTimestamp(time, date ?? this.lastDate),
          talker,
          sentenceType,
        })
        const report = this.store.get(ref)
        if (!report) throw new Error(`report ${ref} missing right after append`)
        return { kind: 'report', sentence, report }
      }
    }
  }

  statistics(): Statistics {
    return Object.freeze({
      ...this.counters,
      totalReports: this.store.count(),
      lastReport: this.store.last(),
      sentenceTypes: Object.freeze(Object.fromEntries(this.sentenceTypes)),
      satellitesInView: this.satellitesInView,
    })
  }

  positions(): ReadonlyArray<PositionReport> {
    return this.store.all()
  }

  sentenceLog(): ReadonlyArray<RawSentence> {
    return this.log.all()
  }

  /** Start a new read session: clears reports, raw log and every counter. */
  reset(): void {
    this.store.reset()
    this.log.reset()
    this.counters = emptyCounters()
    this.sentenceTypes = new Map()
    this.satellitesInView = undefined
    this.lastDate = undefined
    this.currentTime = undefined
  }
}
