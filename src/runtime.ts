/**
 * Runtime
 *
 * Wires the clock, cell graph, observer registry and floating time reference
 * together. `createRuntime` builds an independent instance (inject a manual
 * clock for tests); `initRuntime`/`getRuntime`/`resetRuntime` manage the
 * process-wide one the rule sets default to.
 */

import type { Cell, Entity } from './types'
import type { Logger } from './internal/types'
import type { Clock } from './clock'
import { createSystemClock } from './clock'
import { createCellGraph, type CellGraph } from './cell-graph'
import { createObserverRegistry, type ObserverRegistry, type ObserverCallback } from './observers'
import { createTimeReference, type TimeReference } from './time-reference'
import { isValidTimezone } from './time-date'
import { InvalidTimezoneError, ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type { Logger } from './internal/types'

export type RuntimeConfig = {
  /** Initial floating (default) timezone. Defaults to 'UTC' */
  timezone?: string
  clock?: Clock
  logger?: Logger
  /** Log wake-ups at debug level */
  debug?: boolean
}

export type Runtime = {
  readonly clock: Clock
  readonly graph: CellGraph
  readonly observers: ObserverRegistry
  readonly timeReference: TimeReference
  readonly logger: Logger
  /** Drop every observer, wake-up and listener; the runtime is unusable afterwards */
  dispose(): void
}

// ============================================================================
// Factory
// ============================================================================

export function createRuntime(config: RuntimeConfig = {}): Runtime {
  const timezone = config.timezone ?? 'UTC'
  if (!isValidTimezone(timezone)) {
    throw new InvalidTimezoneError(`Unknown timezone: '${timezone}'`)
  }

  const logger: Logger = config.logger ?? console
  const clock = config.clock ?? createSystemClock()
  const graph = createCellGraph({ clock, logger, debug: config.debug ?? false })
  const observers = createObserverRegistry({ graph, logger })
  const timeReference = createTimeReference(graph, timezone)

  return {
    clock,
    graph,
    observers,
    timeReference,
    logger,
    dispose() {
      observers.close()
      graph.close()
      clock.dispose()
    },
  }
}

// ============================================================================
// Process-wide Runtime
// ============================================================================

let current: Runtime | null = null

export function initRuntime(config: RuntimeConfig = {}): Runtime {
  if (current !== null) {
    throw new ValidationError('Runtime already initialized; call resetRuntime() first')
  }
  current = createRuntime(config)
  return current
}

/** The process-wide runtime, created with defaults on first use */
export function getRuntime(): Runtime {
  if (current === null) current = createRuntime()
  return current
}

export function resetRuntime(): void {
  current?.dispose()
  current = null
}

// ============================================================================
// Floating Timezone
// ============================================================================

export function defaultTimezone(runtime: Runtime = getRuntime()): string {
  return runtime.timeReference.get()
}

export function setDefaultTimezone(tz: string, runtime: Runtime = getRuntime()): void {
  runtime.timeReference.set(tz)
}

// ============================================================================
// Cell Access
// ============================================================================

export function read<T>(cell: Cell<T>, runtime: Runtime = getRuntime()): T {
  return runtime.graph.read(cell)
}

export function write<T>(cell: Cell<T>, value: T, runtime: Runtime = getRuntime()): void {
  runtime.graph.write(cell, value)
}

export function observe(
  entity: Entity,
  cellName: string,
  callback: ObserverCallback | null,
  runtime: Runtime = getRuntime()
): void {
  runtime.observers.observe(entity, cellName, callback)
}
