#!/usr/bin/env node
/**
 * nmea-replay
 * ───────────
 * Replays an NMEA capture file, prints the session summary and optionally
 * writes one export.
 *
 *   nmea-replay -i track.nmea
 *   nmea-replay -i track.nmea -f kml -o track.kml
 *   nmea-replay -i track.nmea -f kml -o track.kml --network-link
 */

import { main } from './replay.js'

main(process.argv.slice(2))
  .then(code => { process.exitCode = code })
  .catch((e: unknown) => {
    console.error('[replay] Unexpected failure:', e)
    process.exitCode = 1
  })
