import { describe, it, expect } from 'vitest'
import { decodeSentence, isSupported } from './decoders.js'
import { tokenize } from './tokenizer.js'

function decode(body: string) {
  const tokens = tokenize(body)
  if (!tokens.ok) throw new Error(tokens.reason)
  return decodeSentence(tokens.sentence)
}

describe('GGA', () => {
  it('decodes a fix with quality, satellites and altitude', () => {
    const result = decode('GPGGA,123519,4807.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,')
    expect(result.kind).toBe('position')
    if (result.kind !== 'position') return
    expect(result.sentenceType).toBe('GGA')
    expect(result.position.latitude).toBeCloseTo(48.1173, 6)
    expect(result.position.longitude).toBeCloseTo(11.516667, 6)
    expect(result.position.time).toEqual({ hours: 12, minutes: 35, seconds: 19, milliseconds: 0 })
    expect(result.position.date).toBeUndefined()
    expect(result.position.fixQuality).toBe(1)
    expect(result.position.satellites).toBe(8)
    expect(result.position.altitude).toBe(545.4)
  })

  it('reports quality 0 as no-fix', () => {
    const result = decode('GPGGA,123519,,,,,0,00,,,M,,M,,')
    expect(result).toEqual({
      kind: 'no-fix',
      sentenceType: 'GGA',
      time: { hours: 12, minutes: 35, seconds: 19, milliseconds: 0 },
    })
  })

  it('treats an empty quality field as no-fix', () => {
    expect(decode('GPGGA,123519,,,,,,,,,M,,M,,').kind).toBe('no-fix')
  })

  it('fails on a non-integer quality', () => {
    const result = decode('GPGGA,123519,4807.038,N,01131.000,E,x,08,0.9,545.4,M,46.9,M,,')
    expect(result.kind).toBe('error')
  })

  it('fails on a latitude above 90 degrees', () => {
    const result = decode('GPGGA,123519,9107.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,')
    expect(result.kind).toBe('error')
    if (result.kind === 'error') expect(result.type).toBe('GGA')
  })

  it('fails on a bad hemisphere', () => {
    expect(decode('GPGGA,235959,4807.038,X,01131.000,E,1,08,0.9,545.4,M,46.9,M,,').kind).toBe('error')
  })

  it('fails on a malformed time', () => {
    expect(decode('GPGGA,12x519,4807.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,').kind).toBe('error')
  })

  it('leaves empty optional fields undefined', () => {
    const result = decode('GPGGA,123519,4807.038,N,01131.000,E,1,,,,M,,M,,')
    expect(result.kind === 'position' && result.position.satellites).toBeUndefined()
    expect(result.kind === 'position' && result.position.altitude).toBeUndefined()
  })
})

describe('RMC', () => {
  it('decodes a fix with date, speed and course', () => {
    const result = decode('GPRMC,225446,A,4916.45,N,12311.12,W,000.5,054.7,191194,020.3,E')
    expect(result.kind).toBe('position')
    if (result.kind !== 'position') return
    expect(result.position.latitude).toBeCloseTo(49.274167, 6)
    expect(result.position.longitude).toBeCloseTo(-123.185333, 6)
    expect(result.position.date).toEqual({ year: 2094, month: 11, day: 19 })
    expect(result.position.speedKnots).toBe(0.5)
    expect(result.position.courseTrue).toBe(54.7)
  })

  it('leaves an empty course undefined', () => {
    const result = decode('GNRMC,135734.00,A,5152.423142,N,00210.276118,W,0.0,,100221,4.2,W,A')
    expect(result.kind === 'position' && result.position.courseTrue).toBeUndefined()
    expect(result.kind === 'position' && result.position.speedKnots).toBe(0)
  })

  it('reports status V as no-fix and keeps time and date', () => {
    expect(decode('GPRMC,123519,V,,,,,,,230394,,,N')).toEqual({
      kind: 'no-fix',
      sentenceType: 'RMC',
      time: { hours: 12, minutes: 35, seconds: 19, milliseconds: 0 },
      date: { year: 2094, month: 3, day: 23 },
    })
  })

  it('fails on an impossible date', () => {
    const result = decode('GPRMC,123519,A,4807.038,N,01131.000,E,022.4,084.4,310299,003.1,W')
    expect(result.kind).toBe('error')
  })

  it('fails on a non-numeric speed', () => {
    expect(decode('GPRMC,123519,A,4807.038,N,01131.000,E,fast,084.4,230394,003.1,W').kind).toBe('error')
  })
})

describe('GLL', () => {
  it('decodes an active fix', () => {
    const result = decode('GPGLL,4916.45,N,12311.12,W,225444,A,')
    expect(result.kind).toBe('position')
    if (result.kind !== 'position') return
    expect(result.sentenceType).toBe('GLL')
    expect(result.position.latitude).toBeCloseTo(49.274167, 6)
    expect(result.position.time).toEqual({ hours: 22, minutes: 54, seconds: 44, milliseconds: 0 })
  })

  it('reports status V as no-fix', () => {
    expect(decode('GPGLL,4916.45,N,12311.12,W,225444,V,N').kind).toBe('no-fix')
  })

  it('treats a missing status as no-fix', () => {
    expect(decode('GPGLL,4916.45,N,12311.12,W,225444').kind).toBe('no-fix')
  })
})

describe('VTG', () => {
  it('reads course and speed in knots', () => {
    expect(decode('GPVTG,054.7,T,034.4,M,005.5,N,010.2,K')).toEqual({
      kind: 'velocity',
      speedKnots: 5.5,
      courseTrue: 54.7,
    })
  })

  it('falls back to km/h when knots are missing', () => {
    const result = decode('GPVTG,,T,,M,,N,010.2,K,A')
    expect(result.kind).toBe('velocity')
    if (result.kind !== 'velocity') return
    expect(result.courseTrue).toBeUndefined()
    expect(result.speedKnots).toBeCloseTo(5.5076, 3)
  })
})

describe('GSV', () => {
  it('reads the number of satellites in view', () => {
    expect(decode('GPGSV,3,1,11,03,03,111,00,04,15,270,00,06,01,010,00,13,06,292,00')).toEqual({
      kind: 'satellites',
      inView: 11,
    })
  })

  it('fails when the count is missing', () => {
    expect(decode('GPGSV,3,1,,03,03,111,00').kind).toBe('error')
  })
})

describe('decodeSentence', () => {
  it('ignores types outside the supported set', () => {
    expect(decode('GPTXT,01,01,02,ANTSTATUS=OK')).toEqual({ kind: 'unsupported', type: 'TXT' })
  })

  it('knows which types are supported', () => {
    expect(isSupported('GGA')).toBe(true)
    expect(isSupported('GSA')).toBe(false)
    expect(isSupported('toString')).toBe(false)
  })
})
