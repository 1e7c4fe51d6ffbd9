export type SpeedUnit = 'kts' | 'kmh' | 'ms'

// Speed conversions
export function ktsToKmh(kts: number): number { return kts * 1.852 }
export function ktsToMs(kts: number): number { return kts * 0.514444 }
export function kmhToKts(kmh: number): number { return kmh / 1.852 }

export function formatSpeed(kts: number, unit: SpeedUnit = 'kts'): string {
  switch (unit) {
    case 'kmh': return `${ktsToKmh(kts).toFixed(1)} km/h`
    case 'ms': return `${ktsToMs(kts).toFixed(1)} m/s`
    default: return `${kts.toFixed(1)} kts`
  }
}

// Format heading/course
export function formatHeading(degrees: number): string {
  return `${Math.round(degrees).toString().padStart(3, '0')}°`
}

/** Round to a fixed number of decimals, returning a number rather than a string. */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals
  return Math.round(value * factor) / factor
}
