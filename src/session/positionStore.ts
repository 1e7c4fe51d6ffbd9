import type { PositionFix, PositionReport } from '../nmea/types.js'
import { isValidPosition } from '../nmea/coordinates.js'

/**
 * Append-only ledger of position reports, oldest first. Reference numbers
 * start at 1 and increase by one per append; `reset()` restarts them.
 *
 * Every stored report is frozen. `replaceLast` swaps the slot for a new
 * frozen value, so snapshots taken earlier keep the report they saw.
 */
export class PositionStore {
  private reports: PositionReport[] = []

  append(fix: PositionFix): number {
    if (!isValidPosition(fix.latitude, fix.longitude)) {
      throw new RangeError(`position ${fix.latitude},${fix.longitude} is outside ±90/±180`)
    }
    const ref = this.reports.length + 1
    this.reports.push(freeze({ ...fix, ref }))
    return ref
  }

  /** Replace the newest report with an updated copy carrying the same ref. */
  replaceLast(update: Partial<Pick<PositionFix, 'speedKnots' | 'courseTrue'>>): PositionReport | undefined {
    const current = this.last()
    if (!current) return undefined
    const next = freeze({ ...current, ...update, ref: current.ref })
    this.reports[this.reports.length - 1] = next
    return next
  }

  all(): ReadonlyArray<PositionReport> {
    return Object.freeze(this.reports.slice())
  }

  last(): PositionReport | undefined {
    return this.reports[this.reports.length - 1]
  }

  get(ref: number): PositionReport | undefined {
    return this.reports[ref - 1]
  }

  count(): number {
    return this.reports.length
  }

  reset(): void {
    this.reports = []
  }
}

function freeze(report: PositionReport): PositionReport {
  if (report.timestamp.date) Object.freeze(report.timestamp.date)
  Object.freeze(report.timestamp)
  return Object.freeze(report)
}
