/**
 * Clock Service
 *
 * Process-wide notion of "now" plus one-shot wake-ups. A wake-up asks the clock
 * to tell its listeners that `(entity, cell)` went stale at `instant`, with no
 * write involved. At most one wake-up is pending per (entity, cell) pair.
 *
 * Two implementations:
 * - createManualClock: time only moves on advance(); wake-ups fire in instant order
 * - createSystemClock: wall time, wake-ups on unref'd timers
 */

import type { Entity, EntityId } from './types'

// ============================================================================
// Types
// ============================================================================

export type WakeUp = {
  readonly entityId: EntityId
  readonly cellName: string
  /** Epoch ms */
  readonly instant: number
}

export type WakeListener = (wake: WakeUp) => void

export type Clock = {
  /** Epoch ms */
  now(): number
  /** Register, or replace, the wake-up for (entity, cellName) */
  wakeAt(entity: Entity, cellName: string, instant: number): void
  cancel(entity: Entity, cellName: string): void
  cancelAll(entity: Entity): void
  /** Pending wake-ups, earliest first */
  pending(): WakeUp[]
  subscribe(listener: WakeListener): () => void
  dispose(): void
}

export type ManualClock = Clock & {
  /** Move time forward, firing every wake-up that falls due on the way */
  advance(seconds: number): void
}

// ============================================================================
// Helpers
// ============================================================================

function wakeKey(entityId: EntityId, cellName: string): string {
  return `${entityId}.${cellName}`
}

function byInstant(a: WakeUp, b: WakeUp): number {
  return a.instant - b.instant
}

function createWakeTable() {
  const wakes = new Map<string, WakeUp>()
  const listeners = new Set<WakeListener>()

  function put(entity: Entity, cellName: string, instant: number): WakeUp {
    const wake: WakeUp = { entityId: entity.id, cellName, instant }
    wakes.set(wakeKey(entity.id, cellName), wake)
    return wake
  }

  function remove(entityId: EntityId, cellName: string): boolean {
    return wakes.delete(wakeKey(entityId, cellName))
  }

  function removeEntity(entity: Entity): WakeUp[] {
    const removed = [...wakes.values()].filter(w => w.entityId === entity.id)
    for (const w of removed) remove(w.entityId, w.cellName)
    return removed
  }

  function isCurrent(wake: WakeUp): boolean {
    return wakes.get(wakeKey(wake.entityId, wake.cellName)) === wake
  }

  function fire(wake: WakeUp): void {
    remove(wake.entityId, wake.cellName)
    for (const listener of [...listeners]) listener(wake)
  }

  function subscribe(listener: WakeListener): () => void {
    listeners.add(listener)
    return () => { listeners.delete(listener) }
  }

  function sorted(): WakeUp[] {
    return [...wakes.values()].sort(byInstant)
  }

  function clear(): void {
    wakes.clear()
    listeners.clear()
  }

  return { put, remove, removeEntity, isCurrent, fire, subscribe, sorted, clear }
}

// ============================================================================
// Manual Clock
// ============================================================================

export function createManualClock(startMs: number = Date.UTC(2024, 0, 1)): ManualClock {
  const table = createWakeTable()
  let current = startMs

  function advance(seconds: number): void {
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new RangeError(`Clock can only advance by a non-negative amount, got ${seconds}`)
    }
    const target = current + seconds * 1000

    // Re-read the table each round: firing may register new wake-ups
    for (;;) {
      const next = table.sorted()[0]
      if (!next || next.instant > target) break
      current = Math.max(current, next.instant)
      table.fire(next)
    }
    current = target
  }

  return {
    now: () => current,
    wakeAt(entity, cellName, instant) {
      table.put(entity, cellName, instant)
    },
    cancel(entity, cellName) {
      table.remove(entity.id, cellName)
    },
    cancelAll(entity) {
      table.removeEntity(entity)
    },
    pending: table.sorted,
    subscribe: table.subscribe,
    dispose: table.clear,
    advance,
  }
}

// ============================================================================
// System Clock
// ============================================================================

// setTimeout overflows past 2^31 - 1 ms
const MAX_TIMER_MS = 2 ** 31 - 1

export function createSystemClock(): Clock {
  const table = createWakeTable()
  const timers = new Map<string, ReturnType<typeof setTimeout>>()

  function clearTimer(key: string): void {
    const timer = timers.get(key)
    if (timer !== undefined) {
      clearTimeout(timer)
      timers.delete(key)
    }
  }

  function arm(wake: WakeUp): void {
    const key = wakeKey(wake.entityId, wake.cellName)
    clearTimer(key)
    const delay = Math.min(Math.max(0, wake.instant - Date.now()), MAX_TIMER_MS)
    const timer = setTimeout(() => {
      timers.delete(key)
      if (!table.isCurrent(wake)) return
      if (Date.now() < wake.instant) {
        arm(wake)
        return
      }
      table.fire(wake)
    }, delay)
    timer.unref()
    timers.set(key, timer)
  }

  return {
    now: () => Date.now(),
    wakeAt(entity, cellName, instant) {
      arm(table.put(entity, cellName, instant))
    },
    cancel(entity, cellName) {
      table.remove(entity.id, cellName)
      clearTimer(wakeKey(entity.id, cellName))
    },
    cancelAll(entity) {
      for (const w of table.removeEntity(entity)) clearTimer(wakeKey(w.entityId, w.cellName))
    },
    pending: table.sorted,
    subscribe: table.subscribe,
    dispose() {
      for (const timer of timers.values()) clearTimeout(timer)
      timers.clear()
      table.clear()
    },
  }
}
