/**
 * Segment 08: Triage Rule Set
 *
 * Status precedence (manual > auto > default from event timing) and the
 * default ordering position.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import {
  attachTriage,
  decideCalculated,
  defaultTriage,
  decidePosition,
  triageLabel,
  TriageCode,
} from '../src/triage'
import { attachEvent } from '../src/event'
import { createItem, type Item } from '../src/item'
import { naive } from '../src/time-date'
import { TriageRangeError, NaiveTimestampError, ImmutabilityError } from '../src/errors'
import { at, dt, testRuntime, type TestRuntime } from './helpers/fixtures'

let rt: TestRuntime
let item: Item

beforeEach(() => {
  rt = testRuntime('UTC')
  item = createItem({ title: 'Report' }, rt)
})

afterEach(() => {
  rt.dispose()
})

// ============================================================================
// Codes
// ============================================================================

describe('Codes', () => {
  it('labels the legacy codes', () => {
    expect(triageLabel(TriageCode.NOW)).toBe('now')
    expect(triageLabel(TriageCode.LATER)).toBe('later')
    expect(triageLabel(TriageCode.DONE)).toBe('done')
  })

  it('has no label for codes in between', () => {
    expect(triageLabel(150)).toBeNull()
  })
})

// ============================================================================
// Decision Functions
// ============================================================================

describe('decideCalculated', () => {
  it('manual wins and auto is never consulted', () => {
    let consulted = false
    expect(decideCalculated(300, () => { consulted = true; return 200 }, () => 100)).toBe(300)
    expect(consulted).toBe(false)
  })

  it('auto wins when manual is absent', () => {
    expect(decideCalculated(null, () => 250, () => 100)).toBe(250)
  })

  it('falls back when both are absent', () => {
    expect(decideCalculated(null, () => null, () => 200)).toBe(200)
  })
})

describe('defaultTriage', () => {
  it('is LATER for an unstarted event and NOW otherwise', () => {
    expect(defaultTriage(true)).toBe(200)
    expect(defaultTriage(false)).toBe(100)
  })
})

describe('decidePosition', () => {
  const createdOn = at('2024-03-15T12:00:00', 'UTC')

  it('uses the start when it is not before creation', () => {
    const start = at('2024-03-16T09:00:00', 'UTC')
    expect(decidePosition(start, createdOn)).toBe(start)
  })

  it('uses the creation time for a start in the past', () => {
    expect(decidePosition(at('2024-03-14T09:00:00', 'UTC'), createdOn)).toBe(createdOn)
  })

  it('compares instants, not wall times', () => {
    const sameInstant = at('2024-03-15T21:00:00', 'Asia/Tokyo')
    expect(decidePosition(sameInstant, createdOn)).toBe(sameInstant)
    const earlier = at('2024-03-15T13:00:00', 'Europe/Paris')
    expect(decidePosition(earlier, createdOn)).toBe(createdOn)
  })

  it('uses the creation time without a start', () => {
    expect(decidePosition(null, createdOn)).toBe(createdOn)
  })
})

// ============================================================================
// Calculated Status
// ============================================================================

describe('calculated', () => {
  it('is NOW for a plain item', () => {
    const triage = attachTriage(item)
    expect(rt.graph.read(triage.calculated)).toBe(TriageCode.NOW)
  })

  it('is LATER for an event that has not started', () => {
    attachEvent(item, { baseStart: at('2024-03-16T09:00:00', 'UTC') })
    const triage = attachTriage(item)
    expect(rt.graph.read(triage.calculated)).toBe(TriageCode.LATER)
  })

  it('is LATER for an event with no start', () => {
    attachEvent(item)
    const triage = attachTriage(item)
    expect(rt.graph.read(triage.calculated)).toBe(TriageCode.LATER)
  })

  it('is NOW again once an event without a start gets a past one', () => {
    const event = attachEvent(item)
    const triage = attachTriage(item)
    expect(rt.graph.read(triage.calculated)).toBe(TriageCode.LATER)
    rt.graph.write(event.baseStart, at('2024-03-15T08:00:00', 'UTC'))
    expect(rt.graph.read(triage.calculated)).toBe(TriageCode.NOW)
  })

  it('is NOW for a future day event', () => {
    attachEvent(item, { baseStart: at('2024-03-20T00:00:00', 'UTC'), allDay: true })
    const triage = attachTriage(item)
    expect(rt.graph.read(triage.calculated)).toBe(TriageCode.NOW)
  })

  it('reacts to an event attached after triage', () => {
    const triage = attachTriage(item)
    expect(rt.graph.read(triage.calculated)).toBe(TriageCode.NOW)
    attachEvent(item, { baseStart: at('2024-03-16T09:00:00', 'UTC') })
    expect(rt.graph.read(triage.calculated)).toBe(TriageCode.LATER)
  })

  it('moves from LATER to NOW when the event starts', () => {
    attachEvent(item, { baseStart: at('2024-03-15T12:30:00', 'UTC') })
    const triage = attachTriage(item)
    const seen: unknown[] = []
    rt.observers.observeCell(triage.calculated, (v) => seen.push(v))
    rt.clock.advance(1800)
    expect(seen).toEqual([200, 100])
  })

  it('auto overrides the default', () => {
    const triage = attachTriage(item, { auto: TriageCode.DONE })
    expect(rt.graph.read(triage.calculated)).toBe(300)
  })

  it('manual overrides auto', () => {
    const triage = attachTriage(item, { auto: 300, manual: 250 })
    expect(rt.graph.read(triage.calculated)).toBe(250)
  })

  it('clearing manual falls back to auto, then to the default', () => {
    const triage = attachTriage(item, { auto: 300, manual: 250 })
    rt.graph.write(triage.manual, null)
    expect(rt.graph.read(triage.calculated)).toBe(300)
    rt.graph.write(triage.auto, null)
    expect(rt.graph.read(triage.calculated)).toBe(100)
  })

  it('with manual set, event timing is not a dependency', () => {
    const event = attachEvent(item, { baseStart: at('2024-03-16T09:00:00', 'UTC') })
    const triage = attachTriage(item, { manual: 300 })
    rt.graph.read(triage.calculated)
    expect(rt.graph.dependenciesOf(triage.calculated)).toEqual([triage.manual.key])
    rt.graph.write(event.baseStart, at('2024-03-10T09:00:00', 'UTC'))
    expect(rt.graph.isStale(triage.calculated)).toBe(false)
  })

  it('codes below 100 are refused', () => {
    const triage = attachTriage(item)
    expect(() => rt.graph.write(triage.manual, 50)).toThrow(TriageRangeError)
    expect(() => rt.graph.write(triage.auto, 99)).toThrow(TriageRangeError)
    expect(rt.graph.read(triage.manual)).toBeNull()
  })

  it('a rejected attach leaves nothing behind', () => {
    expect(() => attachTriage(item, { auto: 10 })).toThrow(TriageRangeError)
    expect(item.extensions.size).toBe(0)
    expect(rt.graph.read(item.triage)).toBeNull()
  })

  it('attaching twice returns the same extension with the new input applied', () => {
    const first = attachTriage(item, { auto: 300 })
    const second = attachTriage(item, { manual: 250 })
    expect(second).toBe(first)
    expect(item.extensions.size).toBe(1)
    expect(rt.graph.read(item.triage)).toBe(first)
    expect(rt.graph.read(first.auto)).toBe(300)
    expect(rt.graph.read(first.calculated)).toBe(250)
  })

  it('a rejected re-attach changes nothing', () => {
    const triage = attachTriage(item, { auto: 300 })
    expect(() => attachTriage(item, { auto: 200, manual: 10 })).toThrow(TriageRangeError)
    expect(rt.graph.read(triage.auto)).toBe(300)
    expect(rt.graph.read(triage.manual)).toBeNull()
  })

  it('codes between the legacy values pass through', () => {
    const triage = attachTriage(item, { manual: 150 })
    expect(rt.graph.read(triage.calculated)).toBe(150)
  })

  it('calculated cannot be written', () => {
    const triage = attachTriage(item)
    expect(() => rt.graph.write(triage.calculated, 100)).toThrow(ImmutabilityError)
  })
})

// ============================================================================
// Position
// ============================================================================

describe('position', () => {
  it('is the creation time for a plain item', () => {
    const triage = attachTriage(item)
    expect(rt.graph.read(triage.position)).toEqual({ wall: '2024-03-15T12:00:00', tz: 'UTC' })
  })

  it('is the event start when it lies ahead', () => {
    attachEvent(item, { baseStart: at('2024-03-16T09:00:00', 'America/New_York') })
    const triage = attachTriage(item)
    expect(rt.graph.read(triage.position)).toEqual({ wall: '2024-03-16T13:00:00', tz: 'UTC' })
  })

  it('is the creation time when the event started before the item existed', () => {
    attachEvent(item, { baseStart: at('2024-03-01T09:00:00', 'UTC') })
    const triage = attachTriage(item)
    expect(rt.graph.read(triage.position)).toEqual({ wall: '2024-03-15T12:00:00', tz: 'UTC' })
  })

  it('follows changes to the event start', () => {
    const event = attachEvent(item, { baseStart: at('2024-03-16T09:00:00', 'UTC') })
    const triage = attachTriage(item)
    rt.graph.write(event.baseStart, at('2024-03-18T09:00:00', 'UTC'))
    expect(rt.graph.read(triage.position)).toEqual({ wall: '2024-03-18T09:00:00', tz: 'UTC' })
  })

  it('an override takes precedence', () => {
    attachEvent(item, { baseStart: at('2024-03-16T09:00:00', 'UTC') })
    const override = at('2024-01-01T00:00:00', 'Europe/Paris')
    const triage = attachTriage(item, { positionOverride: override })
    expect(rt.graph.read(triage.position)).toEqual(override)
  })

  it('a naive override is refused', () => {
    const triage = attachTriage(item)
    expect(() => rt.graph.write(triage.positionOverride, naive(dt('2024-01-01T00:00:00')))).toThrow(NaiveTimestampError)
  })

  it('uses a creation time given at construction', () => {
    const older = createItem({ title: 'Old', createdOn: at('2024-03-01T08:00:00', 'Europe/Paris') }, rt)
    attachEvent(older, { baseStart: at('2024-03-01T07:30:00', 'UTC') })
    const triage = attachTriage(older)
    expect(rt.graph.read(triage.position)).toEqual({ wall: '2024-03-01T07:30:00', tz: 'UTC' })
  })
})
