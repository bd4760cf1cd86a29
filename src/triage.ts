/**
 * Triage Rule Set
 *
 * Triage status precedence (manual, then auto, then a default from the item's
 * event timing) and the default ordering position within a triage state.
 */

import type { Entity, StoredCell, DerivedCell } from './types'
import type { Timestamp, ZonedTimestamp } from './time-date'
import type { Item } from './item'
import { instantOf, isZoned, timestampEquals } from './time-date'
import { triageRange, zonedTimestamp, stage, commitAll } from './constraints'

// ============================================================================
// Codes
// ============================================================================

/** Legacy three-state vocabulary. Any other code >= 100 passes through unchanged. */
export const TriageCode = {
  NOW: 100,
  LATER: 200,
  DONE: 300,
} as const

export type TriageLabel = 'now' | 'later' | 'done'

export function triageLabel(code: number): TriageLabel | null {
  switch (code) {
    case TriageCode.NOW: return 'now'
    case TriageCode.LATER: return 'later'
    case TriageCode.DONE: return 'done'
    default: return null
  }
}

// ============================================================================
// Types
// ============================================================================

export type TriageEntity = {
  readonly entity: Entity
  readonly item: Item
  readonly manual: StoredCell<number | null>
  readonly auto: StoredCell<number | null>
  /** Explicit ordering key; null falls back to the computed default */
  readonly positionOverride: StoredCell<Timestamp | null>
  readonly calculated: DerivedCell<number>
  readonly position: DerivedCell<ZonedTimestamp>
}

export type TriageInput = {
  manual?: number | null
  auto?: number | null
  positionOverride?: Timestamp | null
}

// ============================================================================
// Decision Functions
// ============================================================================

export function decideCalculated(
  manual: number | null,
  auto: () => number | null,
  fallback: () => number
): number {
  if (manual !== null) return manual
  const automatic = auto()
  if (automatic !== null) return automatic
  return fallback()
}

/** LATER for an event with no start or one that has not started yet, NOW for everything else */
export function defaultTriage(isPendingEvent: boolean): number {
  return isPendingEvent ? TriageCode.LATER : TriageCode.NOW
}

/** The event start when it is not earlier than creation, else the creation time */
export function decidePosition(start: ZonedTimestamp | null, createdOn: ZonedTimestamp): ZonedTimestamp {
  if (start !== null && instantOf(start) >= instantOf(createdOn)) return start
  return createdOn
}

// ============================================================================
// Attach
// ============================================================================

/**
 * Attach the triage extension to an item. Attaching twice returns the existing
 * extension with `input` applied, all of it or none of it.
 */
export function attachTriage(item: Item, input: TriageInput = {}): TriageEntity {
  const { graph } = item.runtime
  const existing = graph.read(item.triage)
  if (existing) {
    applyTriageInput(existing, input)
    return existing
  }

  const entity = graph.entity('triage', `${item.entity.label}:triage`)

  const manual = graph.stored<number | null>(entity, 'manual', null, { validators: [triageRange] })
  const auto = graph.stored<number | null>(entity, 'auto', null, { validators: [triageRange] })
  const positionOverride = graph.stored<Timestamp | null>(entity, 'positionOverride', null, {
    validators: [zonedTimestamp],
    equals: timestampEquals,
  })

  const calculated = graph.derived(entity, 'calculated', (ctx) =>
    decideCalculated(ctx.get(manual), () => ctx.get(auto), () => {
      const event = ctx.get(item.event)
      return defaultTriage(event !== null && (ctx.get(event.start) === null || !ctx.get(event.isStarted)))
    })
  )

  const position = graph.derived<ZonedTimestamp>(entity, 'position', (ctx) => {
    const override = ctx.get(positionOverride)
    if (override !== null && isZoned(override)) return override
    const event = ctx.get(item.event)
    return decidePosition(event === null ? null : ctx.get(event.start), item.createdOn)
  }, { equals: timestampEquals })

  const triage: TriageEntity = { entity, item, manual, auto, positionOverride, calculated, position }

  graph.batch(() => {
    try {
      applyTriageInput(triage, input)
    } catch (e) {
      graph.dispose(entity)
      throw e
    }
    graph.write(item.triage, triage)
    item.extensions.add(entity)
  })
  return triage
}

function applyTriageInput(triage: TriageEntity, input: TriageInput): void {
  commitAll(triage.item.runtime.graph, [
    ...stage(triage.manual, input.manual),
    ...stage(triage.auto, input.auto),
    ...stage(triage.positionOverride, input.positionOverride),
  ])
}
