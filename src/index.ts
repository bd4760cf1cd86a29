/**
 * attrcell
 *
 * Public API exports
 */

// Error system: base class, codes, error classes
export {
  CellError, CellErrorCode,
  ImmutabilityError, CyclicDependencyError, NotFoundError,
  BadDurationError, NaiveTimestampError, TriageRangeError,
  InvalidTimezoneError, ValidationError, ParseError,
} from './errors'
export type { CellErrorCode as CellErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime, Timestamp, ZonedTimestamp } from './time-date'
export {
  isLeapYear, daysInMonth, isValidTimezone,
  parseDate, parseTime, parseDateTime, parseTimestamp,
  makeDate, makeTime, makeDateTime,
  yearOf, monthOf, dayOf, hourOf, minuteOf, secondOf, dateOf, timeOf,
  addDays, addSeconds, startOfDay,
  toLocal, toUTC, isDSTAt,
  zoned, naive, isZoned, instantOf, fromInstant, convertTimestamp,
  addSecondsToTimestamp, timestampEquals, formatTimestamp,
} from './time-date'

// Durations
export type { Duration } from './duration'
export {
  SECONDS_PER_DAY, seconds, minutes, hours, days,
  isValidDuration, wholeDaysAtLeastOne, formatDuration,
} from './duration'

// Entities & cells
export type {
  EntityId, Entity, Validator,
  StoredCell, DerivedCell, Cell, CellValue,
  Rule, RuleContext, CellOptions, StoredCellOptions,
} from './types'

// Clock service
export type { Clock, ManualClock, WakeUp, WakeListener } from './clock'
export { createManualClock, createSystemClock } from './clock'

// Cell graph
export type { CellGraph, CellGraphDeps } from './cell-graph'
export { createCellGraph } from './cell-graph'

// Constraint layer
export type { StagedWrite } from './constraints'
export {
  MIN_TRIAGE_CODE,
  validDuration, zonedTimestamp, knownTimezone, triageRange, oneOf, enforce,
  stage, commitAll,
} from './constraints'

// Observer registry
export type { ObserverRegistry, ObserverRegistryDeps, ObserverCallback } from './observers'
export { createObserverRegistry } from './observers'

// Floating time reference
export type { TimeReference } from './time-reference'
export { createTimeReference } from './time-reference'

// Runtime (configuration + process-wide lifecycle)
export type { Runtime, RuntimeConfig, Logger } from './runtime'
export {
  createRuntime, initRuntime, getRuntime, resetRuntime,
  defaultTimezone, setDefaultTimezone,
  read, write, observe,
} from './runtime'

// Items
export type { Item, ItemInput } from './item'
export { createItem, disposeItem } from './item'

// Event rule set
export type { EventEntity, EventInput, Transparency, StartedDecision } from './event'
export {
  TRANSPARENCIES, DEFAULT_DURATION, DEFAULT_TRANSPARENCY,
  decideIsDay, decideAnyTime, floatingDayStart, decideDuration, decideEnd,
  decideImpliedTransparency, decideTransparency, decideIsStarted,
  attachEvent,
} from './event'

// Triage rule set
export type { TriageEntity, TriageInput, TriageLabel } from './triage'
export {
  TriageCode, triageLabel,
  decideCalculated, defaultTriage, decidePosition,
  attachTriage,
} from './triage'

// iCalendar interchange
export type { ICalStatus } from './ical'
export { transparencyToICalStatus, icalStatusToTransparency, exportsAsAllDay } from './ical'

// Display helpers
export { lastCalendarDay } from './display'
