/**
 * Items
 *
 * The underlying record that rule-set extensions attach to. Storage of items
 * lives outside this library; an Item here is just identity, a creation
 * timestamp and the slots recording which event and triage extensions, if
 * any, are attached.
 */

import type { Entity, StoredCell } from './types'
import type { ZonedTimestamp, Timestamp } from './time-date'
import type { EventEntity } from './event'
import type { TriageEntity } from './triage'
import { fromInstant, isZoned, formatTimestamp } from './time-date'
import { getRuntime, type Runtime } from './runtime'
import { NaiveTimestampError } from './errors'

export type Item = {
  readonly entity: Entity
  readonly createdOn: ZonedTimestamp
  readonly title: StoredCell<string>
  /** Written by attachEvent; rules read it to learn whether the item is an event */
  readonly event: StoredCell<EventEntity | null>
  /** Written by attachTriage */
  readonly triage: StoredCell<TriageEntity | null>
  /** Every extension entity attached to this item */
  readonly extensions: Set<Entity>
  readonly runtime: Runtime
}

export type ItemInput = {
  title?: string
  /** Defaults to the clock's current instant in the floating zone */
  createdOn?: Timestamp
}

export function createItem(input: ItemInput = {}, runtime: Runtime = getRuntime()): Item {
  const { graph, clock, timeReference } = runtime
  const createdOn = input.createdOn ?? fromInstant(clock.now(), timeReference.get())
  if (!isZoned(createdOn)) {
    throw new NaiveTimestampError(`Item creation timestamp must carry a timezone, got '${formatTimestamp(createdOn)}'`)
  }

  const title = input.title ?? ''
  const entity = graph.entity('item', title || undefined)

  return {
    entity,
    createdOn,
    title: graph.stored(entity, 'title', title),
    event: graph.stored<EventEntity | null>(entity, 'event', null),
    triage: graph.stored<TriageEntity | null>(entity, 'triage', null),
    extensions: new Set(),
    runtime,
  }
}

export function disposeItem(item: Item): void {
  const { graph } = item.runtime
  for (const extension of item.extensions) graph.dispose(extension)
  item.extensions.clear()
  graph.dispose(item.entity)
}
