/**
 * Constraint Layer
 *
 * Validators attached to stored cells. They run in declaration order against
 * the candidate value before a write commits; the first failure throws and the
 * cell keeps its value.
 */

import type { StoredCell, Validator } from './types'
import type { CellGraph } from './cell-graph'
import type { Timestamp } from './time-date'
import { isValidTimezone, formatTimestamp } from './time-date'
import { isValidDuration, type Duration } from './duration'
import {
  BadDurationError, NaiveTimestampError, TriageRangeError,
  InvalidTimezoneError, ValidationError,
} from './errors'

/** Lowest triage code; anything present must be at least this */
export const MIN_TRIAGE_CODE = 100

// ============================================================================
// Validator Library
// ============================================================================

export const validDuration: Validator<Duration> = {
  name: 'validDuration',
  check: (candidate) => isValidDuration(candidate),
  error: (candidate) => new BadDurationError(
    typeof candidate === 'number' && candidate < 0
      ? `Duration must not be negative, got ${candidate}s`
      : `Not a valid duration: ${String(candidate)}`
  ),
}

export const zonedTimestamp: Validator<Timestamp | null> = {
  name: 'zonedTimestamp',
  check: (candidate) => candidate === null || candidate.tz !== null,
  error: (candidate) => new NaiveTimestampError(
    `Timestamp must carry a timezone, got '${candidate === null ? 'null' : formatTimestamp(candidate)}'`
  ),
}

export const knownTimezone: Validator<string | null> = {
  name: 'knownTimezone',
  check: (candidate) => candidate === null || isValidTimezone(candidate),
  error: (candidate) => new InvalidTimezoneError(`Unknown timezone: '${String(candidate)}'`),
}

export const triageRange: Validator<number | null> = {
  name: 'triageRange',
  check: (candidate) => candidate === null || (Number.isFinite(candidate) && candidate >= MIN_TRIAGE_CODE),
  error: (candidate) => new TriageRangeError(
    `Triage status must be a number >= ${MIN_TRIAGE_CODE}, got ${String(candidate)}`
  ),
}

export function oneOf<T extends string>(values: readonly T[], label: string): Validator<T> {
  return {
    name: `oneOf(${label})`,
    check: (candidate) => values.includes(candidate),
    error: (candidate) => new ValidationError(
      `Invalid ${label} '${candidate}', expected one of: ${values.join(', ')}`
    ),
  }
}

// ============================================================================
// Enforcement
// ============================================================================

/** Throws the first failing validator's error; returns normally when all pass */
export function enforce<T>(cell: StoredCell<T>, candidate: T): void {
  for (const validator of cell.validators) {
    if (!validator.check(candidate)) throw validator.error(candidate)
  }
}

/** A pending write, checkable before anything in its group commits */
export type StagedWrite = {
  readonly validate: () => void
  readonly commit: (graph: CellGraph) => void
}

/** Stages `value` for `cell`; an undefined value stages nothing */
export function stage<T>(cell: StoredCell<T>, value: T | undefined): StagedWrite[] {
  if (value === undefined) return []
  return [{
    validate: () => enforce(cell, value),
    commit: (graph) => graph.write(cell, value),
  }]
}

/**
 * Validates every staged write, then commits them together in one batch.
 * If any write is rejected, none of them commit.
 */
export function commitAll(graph: CellGraph, writes: readonly StagedWrite[]): void {
  for (const write of writes) write.validate()
  graph.batch(() => {
    for (const write of writes) write.commit(graph)
  })
}
