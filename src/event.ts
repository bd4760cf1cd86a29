/**
 * Event Rule Set
 *
 * Derived timing and transparency attributes for calendar events.
 *
 * Stored (writable):  baseStart, baseDuration, baseAnyTime, allDay, tzinfo,
 *                     location, baseTransparency
 * Derived (read-only): isDay, anyTime, start, duration, end,
 *                     impliedTransparency, transparency, isStarted
 *
 * Each derived attribute is a small decision function over plain values plus
 * a rule that feeds it. Rules read their inputs lazily so the recorded
 * dependencies follow the branch actually taken: a day event's start depends
 * on the floating zone, a timed event's start on tzinfo.
 */

import type { Entity, StoredCell, DerivedCell } from './types'
import type { Timestamp, ZonedTimestamp } from './time-date'
import type { Item } from './item'
import {
  convertTimestamp, addSecondsToTimestamp, timestampEquals,
  instantOf, startOfDay, dateOf,
} from './time-date'
import { type Duration, hours, days, wholeDaysAtLeastOne } from './duration'
import {
  validDuration, zonedTimestamp, knownTimezone, oneOf, stage, commitAll,
} from './constraints'

// ============================================================================
// Types
// ============================================================================

export const TRANSPARENCIES = ['confirmed', 'tentative', 'fyi'] as const
export type Transparency = (typeof TRANSPARENCIES)[number]

export const DEFAULT_DURATION: Duration = hours(1)
export const DEFAULT_TRANSPARENCY: Transparency = 'confirmed'

export type EventEntity = {
  readonly entity: Entity
  readonly item: Item

  readonly baseStart: StoredCell<Timestamp | null>
  readonly baseDuration: StoredCell<Duration>
  readonly baseAnyTime: StoredCell<boolean>
  readonly allDay: StoredCell<boolean>
  /** Display zone for timed events; null follows the floating zone */
  readonly tzinfo: StoredCell<string | null>
  readonly location: StoredCell<string | null>
  readonly baseTransparency: StoredCell<Transparency>

  readonly isDay: DerivedCell<boolean>
  readonly anyTime: DerivedCell<boolean>
  readonly start: DerivedCell<ZonedTimestamp | null>
  readonly duration: DerivedCell<Duration>
  readonly end: DerivedCell<ZonedTimestamp | null>
  readonly impliedTransparency: DerivedCell<Transparency | null>
  readonly transparency: DerivedCell<Transparency>
  readonly isStarted: DerivedCell<boolean>
}

export type EventInput = {
  baseStart?: Timestamp | null
  baseDuration?: Duration
  baseAnyTime?: boolean
  allDay?: boolean
  tzinfo?: string | null
  location?: string | null
  baseTransparency?: Transparency
}

// ============================================================================
// Decision Functions
// ============================================================================

/** allDay wins over anyTime; either makes the event a day event */
export function decideIsDay(allDay: boolean, baseAnyTime: boolean): boolean {
  return allDay || (baseAnyTime && !allDay)
}

export function decideAnyTime(baseAnyTime: boolean, allDay: boolean): boolean {
  return baseAnyTime && !allDay
}

/** Calendar date of `baseStart`, at midnight in the floating zone */
export function floatingDayStart(baseStart: Timestamp, floatingZone: string): ZonedTimestamp {
  return { wall: startOfDay(dateOf(baseStart.wall)), tz: floatingZone }
}

export function decideDuration(baseDuration: Duration, isDay: boolean): Duration {
  return isDay ? days(wholeDaysAtLeastOne(baseDuration)) : baseDuration
}

/** Wall-clock addition in the start's own zone */
export function decideEnd(start: ZonedTimestamp | null, duration: Duration): ZonedTimestamp | null {
  return start === null ? null : addSecondsToTimestamp(start, duration)
}

export function decideImpliedTransparency(
  anyTime: boolean,
  isTimedZeroLength: () => boolean
): Transparency | null {
  return anyTime || isTimedZeroLength() ? 'fyi' : null
}

export function decideTransparency(implied: Transparency | null, base: Transparency): Transparency {
  return implied ?? base
}

export type StartedDecision = {
  started: boolean
  /** Instant (epoch ms) at which the answer flips, when it will */
  wakeAt: number | null
}

export function decideIsStarted(start: ZonedTimestamp | null, isDay: () => boolean, now: number): StartedDecision {
  if (start === null || isDay()) return { started: true, wakeAt: null }
  const at = instantOf(start)
  return at <= now ? { started: true, wakeAt: null } : { started: false, wakeAt: at }
}

// ============================================================================
// Attach
// ============================================================================

/**
 * Attach the event extension to an item. Attaching twice returns the existing
 * extension; `input` is then written through the usual validators, all of it
 * or none of it. When the input of a fresh attach is rejected, nothing stays
 * attached.
 */
export function attachEvent(item: Item, input: EventInput = {}): EventEntity {
  const { graph, timeReference } = item.runtime
  const existing = graph.read(item.event)
  if (existing) {
    applyEventInput(existing, input)
    return existing
  }

  const entity = graph.entity('event', `${item.entity.label}:event`)

  // ========== Stored ==========

  const baseStart = graph.stored<Timestamp | null>(entity, 'baseStart', null, {
    validators: [zonedTimestamp],
    equals: timestampEquals,
  })
  const baseDuration = graph.stored(entity, 'baseDuration', DEFAULT_DURATION, { validators: [validDuration] })
  const baseAnyTime = graph.stored(entity, 'baseAnyTime', false)
  const allDay = graph.stored(entity, 'allDay', false)
  const tzinfo = graph.stored<string | null>(entity, 'tzinfo', null, { validators: [knownTimezone] })
  const location = graph.stored<string | null>(entity, 'location', null)
  const baseTransparency = graph.stored<Transparency>(entity, 'baseTransparency', DEFAULT_TRANSPARENCY, {
    validators: [oneOf(TRANSPARENCIES, 'transparency')],
  })

  // ========== Derived ==========

  const isDay = graph.derived(entity, 'isDay', (ctx) =>
    decideIsDay(ctx.get(allDay), ctx.get(baseAnyTime))
  )

  const anyTime = graph.derived(entity, 'anyTime', (ctx) =>
    decideAnyTime(ctx.get(baseAnyTime), ctx.get(allDay))
  )

  const start = graph.derived<ZonedTimestamp | null>(entity, 'start', (ctx) => {
    const base = ctx.get(baseStart)
    if (base === null) return null
    if (ctx.get(isDay)) return floatingDayStart(base, timeReference.track(ctx))
    return convertTimestamp(base, ctx.get(tzinfo) ?? timeReference.track(ctx))
  }, { equals: timestampEquals })

  const duration = graph.derived(entity, 'duration', (ctx) =>
    decideDuration(ctx.get(baseDuration), ctx.get(isDay))
  )

  const end = graph.derived(entity, 'end', (ctx) => {
    const s = ctx.get(start)
    return s === null ? null : decideEnd(s, ctx.get(duration))
  }, { equals: timestampEquals })

  const impliedTransparency = graph.derived(entity, 'impliedTransparency', (ctx) =>
    decideImpliedTransparency(ctx.get(anyTime), () => !ctx.get(isDay) && ctx.get(duration) === 0)
  )

  const transparency = graph.derived(entity, 'transparency', (ctx) =>
    decideTransparency(ctx.get(impliedTransparency), ctx.get(baseTransparency))
  )

  const isStarted = graph.derived(entity, 'isStarted', (ctx) => {
    const decision = decideIsStarted(ctx.get(start), () => ctx.get(isDay), ctx.now())
    if (decision.wakeAt !== null) ctx.wakeAt(decision.wakeAt)
    return decision.started
  })

  const event: EventEntity = {
    entity,
    item,
    baseStart,
    baseDuration,
    baseAnyTime,
    allDay,
    tzinfo,
    location,
    baseTransparency,
    isDay,
    anyTime,
    start,
    duration,
    end,
    impliedTransparency,
    transparency,
    isStarted,
  }

  graph.batch(() => {
    try {
      applyEventInput(event, input)
    } catch (e) {
      graph.dispose(entity)
      throw e
    }
    graph.write(item.event, event)
    item.extensions.add(entity)
  })
  return event
}

function applyEventInput(event: EventEntity, input: EventInput): void {
  commitAll(event.item.runtime.graph, [
    ...stage(event.baseStart, input.baseStart),
    ...stage(event.baseDuration, input.baseDuration),
    ...stage(event.baseAnyTime, input.baseAnyTime),
    ...stage(event.allDay, input.allDay),
    ...stage(event.tzinfo, input.tzinfo),
    ...stage(event.location, input.location),
    ...stage(event.baseTransparency, input.baseTransparency),
  ])
}
