/**
 * Observer Registry
 *
 * Synchronous change taps keyed by (entity, cell name). An observer fires once
 * on registration with the current value, then at the end of every write batch
 * or wake-up after which the cell resolves to a different value. Observed cells
 * are therefore resolved eagerly; everything else stays lazy.
 */

import type { Cell, Entity, EntityId } from './types'
import type { Logger } from './internal/types'
import type { CellGraph } from './cell-graph'
import { cellKey, describeCell } from './internal/helpers'

// ============================================================================
// Types
// ============================================================================

export type ObserverCallback<T = unknown> = (value: T) => void

export type ObserverRegistryDeps = {
  graph: CellGraph
  logger?: Logger
}

type Entry = {
  readonly entityId: EntityId
  readonly label: string
  /** Resolve the cell and call back if the value moved since the last delivery */
  check(): void
}

// ============================================================================
// Factory
// ============================================================================

export function createObserverRegistry(deps: ObserverRegistryDeps) {
  const { graph } = deps
  const logger: Logger = deps.logger ?? graph.logger

  const entries = new Map<string, Entry>()
  let flushing = false
  let flushAgain = false

  const unsubscribeSettle = graph.onSettle(flush)
  const unsubscribeDispose = graph.onDispose(forget)

  function track<T>(cell: Cell<T>, callback: ObserverCallback<T>): Entry {
    let last: { value: T } | null = null
    return {
      entityId: cell.entity.id,
      label: describeCell(cell.entity, cell.name),
      check() {
        const value = cell.resolve()
        if (last !== null && cell.equals(last.value, value)) return
        last = { value }
        callback(value)
      },
    }
  }

  function install(key: string, entry: Entry): void {
    entries.set(key, entry)
    entry.check()
  }

  // ========== Registration ==========

  /** Replace the observer on (entity, cellName); `null` detaches */
  function observe(entity: Entity, cellName: string, callback: ObserverCallback | null): void {
    const key = cellKey(entity.id, cellName)
    if (callback === null) {
      entries.delete(key)
      return
    }
    install(key, track(graph.cell(entity, cellName), callback))
  }

  function observeCell<T>(cell: Cell<T>, callback: ObserverCallback<T> | null): void {
    if (callback === null) {
      entries.delete(cell.key)
      return
    }
    install(cell.key, track(cell, callback))
  }

  function unobserve(entity: Entity, cellName: string): void {
    entries.delete(cellKey(entity.id, cellName))
  }

  function isObserved(entity: Entity, cellName: string): boolean {
    return entries.has(cellKey(entity.id, cellName))
  }

  // ========== Delivery ==========

  function flush(): void {
    if (flushing) {
      flushAgain = true
      return
    }
    flushing = true
    try {
      do {
        flushAgain = false
        for (const [key, entry] of [...entries]) {
          // A callback earlier in this pass may have replaced or removed it
          if (entries.get(key) !== entry) continue
          try {
            entry.check()
          } catch (e) {
            logger.error(`Observer error on '${entry.label}':`, e)
          }
        }
      } while (flushAgain)
    } finally {
      flushing = false
    }
  }

  function forget(entity: Entity): void {
    for (const [key, entry] of [...entries]) {
      if (entry.entityId === entity.id) entries.delete(key)
    }
  }

  // ========== Lifecycle ==========

  function reset(): void {
    entries.clear()
  }

  function close(): void {
    entries.clear()
    unsubscribeSettle()
    unsubscribeDispose()
  }

  return {
    observe,
    observeCell,
    unobserve,
    isObserved,
    flush,
    reset,
    close,
  }
}

export type ObserverRegistry = ReturnType<typeof createObserverRegistry>
