export type Hemisphere = 'N' | 'S' | 'E' | 'W'

/** Degrees and decimal minutes, as NMEA and nautical charts write positions. */
export interface Coordinate {
  degrees: number
  minutes: number
  direction: Hemisphere
}

// Haversine formula for distance between two coordinates
export function haversineDistance(
  lat1: number, lon1: number,
  lat2: number, lon2: number
): number {
  const R = 3440.065 // Earth radius in nautical miles
  const dLat = toRad(lat2 - lat1)
  const dLon = toRad(lon2 - lon1)
  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) *
    Math.sin(dLon / 2) * Math.sin(dLon / 2)
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a))
  return R * c
}

function toRad(deg: number): number {
  return deg * (Math.PI / 180)
}

// Convert Coordinate object to decimal degrees
export function coordToDecimal(coord: Coordinate): number {
  const decimal = coord.degrees + coord.minutes / 60
  return (coord.direction === 'S' || coord.direction === 'W') ? -decimal : decimal
}

// Convert decimal degrees to Coordinate object
export function decimalToCoord(decimal: number, isLat: boolean): Coordinate {
  const abs = Math.abs(decimal)
  let degrees = Math.floor(abs)
  let minutes = parseFloat(((abs - degrees) * 60).toFixed(3))
  // 59.9999' rounds up to a whole degree
  if (minutes >= 60) {
    degrees += 1
    minutes = 0
  }
  let direction: Hemisphere
  if (isLat) {
    direction = decimal >= 0 ? 'N' : 'S'
  } else {
    direction = decimal >= 0 ? 'E' : 'W'
  }
  return { degrees, minutes, direction }
}

// Format coordinate for display (e.g., "48°07.038'N")
export function formatCoordinate(coord: Coordinate): string {
  const minStr = coord.minutes.toFixed(3).padStart(6, '0')
  return `${coord.degrees}°${minStr}'${coord.direction}`
}

/** Signed decimal degrees as a chart position, e.g. "48°07.038'N 11°31.000'E". */
export function formatPosition(latitude: number, longitude: number): string {
  return `${formatCoordinate(decimalToCoord(latitude, true))} ${formatCoordinate(decimalToCoord(longitude, false))}`
}

/** Total distance along a track of decimal-degree points, nautical miles. */
export function trackDistance(points: ReadonlyArray<{ latitude: number; longitude: number }>): number {
  let total = 0
  for (let i = 1; i < points.length; i++) {
    const a = points[i - 1]
    const b = points[i]
    total += haversineDistance(a.latitude, a.longitude, b.latitude, b.longitude)
  }
  return total
}
