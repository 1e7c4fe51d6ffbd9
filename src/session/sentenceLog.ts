import type { RawSentence } from '../nmea/types.js'

/** Every non-blank line seen this session, valid or not, for the NMEA dump. */
export class SentenceLog {
  private entries: RawSentence[] = []

  append(sentence: RawSentence): void {
    this.entries.push(Object.freeze({ ...sentence }))
  }

  all(): ReadonlyArray<RawSentence> {
    return Object.freeze(this.entries.slice())
  }

  count(): number {
    return this.entries.length
  }

  reset(): void {
    this.entries = []
  }
}
