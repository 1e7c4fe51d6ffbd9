import type { ParsedFields } from './types.js'

export type TokenizeResult =
  | { ok: true; sentence: ParsedFields }
  | { ok: false; error: 'malformed-sentence'; reason: string }

// Talker is two characters (GP, GN, GL, or P + manufacturer prefix),
// followed by a type code that starts with a letter.
const ADDRESS = /^([A-Z][A-Z0-9])([A-Z][A-Z0-9]{2,})$/

/** Split a checksum-validated body (text between `$` and `*`) into fields. */
export function tokenize(body: string): TokenizeResult {
  const fields = body.split(',')
  const address = fields[0]

  if (address.length < 5) {
    return { ok: false, error: 'malformed-sentence', reason: `address field too short: "${address}"` }
  }
  const match = ADDRESS.exec(address)
  if (!match) {
    return { ok: false, error: 'malformed-sentence', reason: `unrecognised address field: "${address}"` }
  }

  return { ok: true, sentence: { talker: match[1], type: match[2], fields } }
}
