/**
 * iCalendar Interchange
 *
 * Maps event transparency onto iCalendar STATUS. iCalendar has no notion of
 * "any time", so such events are exported as all-day.
 */

import type { EventEntity, Transparency } from './event'
import type { CellGraph } from './cell-graph'
import { type Result, Ok, Err } from './result'
import { ParseError } from './errors'

export type ICalStatus = 'CONFIRMED' | 'TENTATIVE' | 'CANCELLED'

const TO_ICAL: Record<Transparency, ICalStatus> = {
  confirmed: 'CONFIRMED',
  tentative: 'TENTATIVE',
  fyi: 'CANCELLED',
}

const FROM_ICAL: Record<ICalStatus, Transparency> = {
  CONFIRMED: 'confirmed',
  TENTATIVE: 'tentative',
  CANCELLED: 'fyi',
}

function isICalStatus(value: string): value is ICalStatus {
  return value in FROM_ICAL
}

export function transparencyToICalStatus(transparency: Transparency): ICalStatus {
  return TO_ICAL[transparency]
}

/** Case-insensitive; surrounding whitespace is ignored */
export function icalStatusToTransparency(status: string): Result<Transparency, ParseError> {
  const normalized = status.trim().toUpperCase()
  if (!isICalStatus(normalized)) {
    return Err(new ParseError(`Unknown iCalendar STATUS: '${status}'`))
  }
  return Ok(FROM_ICAL[normalized])
}

/** Whether consumers without any-time support should see the event as all-day */
export function exportsAsAllDay(graph: CellGraph, event: EventEntity): boolean {
  return graph.read(event.allDay) || graph.read(event.anyTime)
}
