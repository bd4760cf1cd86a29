/**
 * Floating Time Reference
 *
 * The process-wide default timezone, held in a stored cell so that every rule
 * computing floating (zone-less) times depends on it and goes stale when the
 * default changes.
 */

import type { Entity, StoredCell, RuleContext } from './types'
import type { CellGraph } from './cell-graph'
import { knownTimezone } from './constraints'
import { InvalidTimezoneError } from './errors'
import { isValidTimezone } from './time-date'

export type TimeReference = {
  readonly entity: Entity
  readonly zone: StoredCell<string>
  /** Default zone, read untracked */
  get(): string
  /** Default zone, read as a dependency of the evaluating rule */
  track(ctx: RuleContext): string
  set(tz: string): void
}

export function createTimeReference(graph: CellGraph, timezone: string): TimeReference {
  if (!isValidTimezone(timezone)) {
    throw new InvalidTimezoneError(`Unknown timezone: '${timezone}'`)
  }
  const entity = graph.entity('time-reference', 'floating')
  const zone = graph.stored<string>(entity, 'defaultTimezone', timezone, { validators: [knownTimezone] })

  return {
    entity,
    zone,
    get: () => graph.read(zone),
    track: (ctx) => ctx.get(zone),
    set: (tz) => graph.write(zone, tz),
  }
}
