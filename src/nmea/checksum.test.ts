import { describe, it, expect } from 'vitest'
import { computeChecksum, validateChecksum } from './checksum.js'

const GGA = '$GPGGA,123519,4807.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,*47'
const RMC = '$GPRMC,152904.000,A,4611.1699,N,00117.8182,W,000.00,0.0,240714,,,E*46'

describe('computeChecksum', () => {
  it('XORs every body character', () => {
    expect(computeChecksum('GPGGA,123519,4807.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,')).toBe('47')
  })

  it('pads single-digit results to two hex digits', () => {
    expect(computeChecksum('GNRMC,135734.00,A,5152.423142,N,00210.276118,W,0.0,,100221,4.2,W,A')).toBe('0D')
  })
})

describe('validateChecksum', () => {
  it('accepts a correct checksum', () => {
    const result = validateChecksum(GGA)
    expect(result.valid).toBe(true)
    expect(result.checksum).toBe('47')
    expect(result.body).toBe('GPGGA,123519,4807.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,')
  })

  it('accepts an RMC sentence with a correct checksum', () => {
    expect(validateChecksum(RMC).valid).toBe(true)
  })

  it('rejects an incorrect checksum and reports both values', () => {
    const result = validateChecksum(RMC.replace('*46', '*48'))
    expect(result.valid).toBe(false)
    expect(result.checksum).toBe('48')
    expect(result.computed).toBe('46')
  })

  it('compares hex digits case-insensitively', () => {
    const line = '$GNRMC,135734.00,A,5152.423142,N,00210.276118,W,0.0,,100221,4.2,W,A*0d'
    expect(validateChecksum(line).valid).toBe(true)
  })

  it('allows a trailing line terminator', () => {
    expect(validateChecksum(GGA + '\r\n').valid).toBe(true)
    expect(validateChecksum(GGA + '\n').valid).toBe(true)
  })

  it('rejects a corrupted checksum field', () => {
    expect(validateChecksum(GGA.replace('*47', '*00')).valid).toBe(false)
  })

  it('rejects an incomplete sentence with no checksum', () => {
    const result = validateChecksum('$GPRMC,165629.00,V,,')
    expect(result.valid).toBe(false)
    expect(result.checksum).toBeUndefined()
  })

  it('rejects a line that does not start with $', () => {
    expect(validateChecksum(GGA.substring(1)).valid).toBe(false)
  })

  it('rejects more than one *', () => {
    expect(validateChecksum('$GPGGA,1*2*47').valid).toBe(false)
  })

  it('rejects malformed checksum digits', () => {
    expect(validateChecksum(GGA.replace('*47', '*4')).valid).toBe(false)
    expect(validateChecksum(GGA.replace('*47', '*4G')).valid).toBe(false)
    expect(validateChecksum(GGA.replace('*47', '*477')).valid).toBe(false)
  })

  it('never throws on arbitrary input', () => {
    for (const input of ['', '$', '*', '$*', '$*zz', 'garbage\u0000ÿ']) {
      expect(() => validateChecksum(input)).not.toThrow()
      expect(validateChecksum(input).valid).toBe(false)
    }
  })
})
