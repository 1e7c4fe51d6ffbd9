export * from './nmea/types.js'
export { computeChecksum, validateChecksum } from './nmea/checksum.js'
export type { ChecksumResult } from './nmea/checksum.js'
export { tokenize } from './nmea/tokenizer.js'
export type { TokenizeResult } from './nmea/tokenizer.js'
export {
  combineTimestamp,
  formatTimestamp,
  isValidPosition,
  parseDate,
  parseLatitude,
  parseLongitude,
  parseTime,
  toDate,
} from './nmea/coordinates.js'
export type { CodecResult } from './nmea/coordinates.js'
export { DECODERS, decodeSentence, isSupported } from './nmea/decoders.js'
export type { DecodeOutcome, DecodedPosition } from './nmea/decoders.js'
export { PositionStore } from './session/positionStore.js'
export { SentenceLog } from './session/sentenceLog.js'
export { NMEASession } from './session/session.js'
export type { LineOutcome, SessionOptions } from './session/session.js'
export { calculateDuration, formatSummaryText, summarize } from './session/summary.js'
export type { SessionSummary, SummaryPosition } from './session/summary.js'
export * from './export/index.js'
