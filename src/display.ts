/**
 * Display Helpers
 *
 * Presentation conventions built on the event rule set. A day event's `end` is
 * the midnight after its last day, so that day is shown as end minus one.
 */

import type { EventEntity } from './event'
import type { CellGraph } from './cell-graph'
import type { LocalDate } from './time-date'
import { addDays, dateOf } from './time-date'

export function lastCalendarDay(graph: CellGraph, event: EventEntity): LocalDate | null {
  const end = graph.read(event.end)
  if (end === null) return null
  const endDate = dateOf(end.wall)
  return graph.read(event.isDay) ? addDays(endDate, -1) : endDate
}
