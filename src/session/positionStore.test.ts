import { describe, it, expect } from 'vitest'
import { PositionStore } from './positionStore.js'
import type { PositionFix } from '../nmea/types.js'

const fix = (latitude: number, longitude: number, seconds = 0): PositionFix => ({
  latitude,
  longitude,
  timestamp: { hours: 12, minutes: 0, seconds, milliseconds: 0 },
  talker: 'GP',
  sentenceType: 'GGA',
})

describe('PositionStore', () => {
  it('numbers reports from 1 without gaps', () => {
    const store = new PositionStore()
    expect(store.append(fix(1, 1))).toBe(1)
    expect(store.append(fix(2, 2))).toBe(2)
    expect(store.append(fix(3, 3))).toBe(3)
    expect(store.all().map(r => r.ref)).toEqual([1, 2, 3])
  })

  it('rejects positions outside the valid range', () => {
    const store = new PositionStore()
    expect(() => store.append(fix(91, 0))).toThrow(RangeError)
    expect(() => store.append(fix(0, 181))).toThrow(RangeError)
    expect(store.count()).toBe(0)
  })

  it('looks reports up by reference number', () => {
    const store = new PositionStore()
    store.append(fix(10, 20))
    expect(store.get(1)?.latitude).toBe(10)
    expect(store.get(2)).toBeUndefined()
    expect(store.get(0)).toBeUndefined()
  })

  it('stores frozen reports', () => {
    const store = new PositionStore()
    store.append(fix(10, 20))
    const report = store.last()
    expect(Object.isFrozen(report)).toBe(true)
    expect(Object.isFrozen(report?.timestamp)).toBe(true)
  })

  it('replaces the last report without touching earlier snapshots', () => {
    const store = new PositionStore()
    store.append(fix(10, 20))
    const before = store.all()
    const updated = store.replaceLast({ speedKnots: 4.2, courseTrue: 90 })

    expect(updated?.ref).toBe(1)
    expect(updated?.speedKnots).toBe(4.2)
    expect(store.last()?.courseTrue).toBe(90)
    expect(before[0].speedKnots).toBeUndefined()
    expect(store.count()).toBe(1)
  })

  it('has nothing to replace while empty', () => {
    expect(new PositionStore().replaceLast({ speedKnots: 1 })).toBeUndefined()
  })

  it('restarts numbering after reset', () => {
    const store = new PositionStore()
    store.append(fix(1, 1))
    store.append(fix(2, 2))
    store.reset()
    expect(store.count()).toBe(0)
    expect(store.last()).toBeUndefined()
    expect(store.append(fix(3, 3))).toBe(1)
  })
})
