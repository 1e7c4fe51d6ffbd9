// ── NMEA 0183 checksum ────────────────────────────────────────────────────────
// $<body>*<HH>[\r\n] where HH is the XOR of every byte of <body>.

export interface ChecksumResult {
  valid: boolean
  /** Text between `$` and `*`; the whole remainder when framing is broken. */
  body: string
  /** The two hex digits as supplied, when the framing carried them. */
  checksum?: string
  /** XOR of the body, two uppercase hex digits. */
  computed?: string
}

const TRAILER = /^[0-9A-Fa-f]{2}(?:\r\n|\n|\r)?$/

export function computeChecksum(body: string): string {
  let xor = 0
  for (const byte of Buffer.from(body, 'latin1')) xor ^= byte
  return xor.toString(16).toUpperCase().padStart(2, '0')
}

export function validateChecksum(line: string): ChecksumResult {
  if (!line.startsWith('$')) return { valid: false, body: line }

  const star = line.indexOf('*')
  if (star < 0 || star !== line.lastIndexOf('*')) {
    return { valid: false, body: line.substring(1) }
  }

  const body = line.substring(1, star)
  const trailer = line.substring(star + 1)
  if (!TRAILER.test(trailer)) return { valid: false, body }

  const checksum = trailer.substring(0, 2)
  const computed = computeChecksum(body)
  return { valid: checksum.toUpperCase() === computed, body, checksum, computed }
}
