/**
 * Shared test fixtures: a runtime on a manual clock, a silent logger,
 * and shorthands for building dates and timestamps.
 */
import { vi } from 'vitest'
import { createManualClock, type ManualClock } from '../../src/clock'
import { createRuntime, type Runtime } from '../../src/runtime'
import { parseDateTime, type LocalDateTime, type ZonedTimestamp, zoned } from '../../src/time-date'
import { unwrap } from '../../src/result'

/** 2024-03-15T12:00:00Z */
export const NOW = Date.UTC(2024, 2, 15, 12, 0, 0)

export function dt(s: string): LocalDateTime {
  return unwrap(parseDateTime(s))
}

export function at(s: string, tz: string): ZonedTimestamp {
  return zoned(dt(s), tz)
}

export function silentLogger() {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

export type TestRuntime = Runtime & { clock: ManualClock; logger: ReturnType<typeof silentLogger> }

export function testRuntime(timezone: string = 'UTC'): TestRuntime {
  const clock = createManualClock(NOW)
  const logger = silentLogger()
  return { ...createRuntime({ clock, logger, timezone }), clock, logger }
}
