/**
 * Cell Graph
 *
 * The dependency-tracking and propagation engine.
 *
 * - Stored cells are written directly, after their validators pass.
 * - Derived cells run a rule; every cell the rule reads becomes a dependency,
 *   re-recorded on each evaluation.
 * - A write marks all transitive dependents stale. Nothing is recomputed until
 *   the next read (pull), except what settle listeners read at the end of the
 *   batch (the observer registry uses this to resolve observed cells eagerly).
 * - Wake-ups from the clock invalidate a derived cell without a write.
 */

import type {
  Cell, StoredCell, DerivedCell, Entity, EntityId,
  Rule, RuleContext, CellOptions, StoredCellOptions,
} from './types'
import type { GraphNode, Logger } from './internal/types'
import type { Clock, WakeUp } from './clock'
import { createEvaluationStack } from './internal/evaluation-stack'
import { newEntityId, cellKey, describeCell } from './internal/helpers'
import { enforce } from './constraints'
import { CyclicDependencyError, ImmutabilityError, NotFoundError, ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type CellGraphDeps = {
  clock: Clock
  logger?: Logger
  debug?: boolean
}

type AnyCell = Cell<unknown>

// ============================================================================
// Factory
// ============================================================================

export function createCellGraph(deps: CellGraphDeps) {
  const { clock } = deps
  const logger: Logger = deps.logger ?? console
  const debug = deps.debug ?? false

  const stack = createEvaluationStack()
  const cells = new Map<string, AnyCell>()
  const entities = new Map<EntityId, { entity: Entity; cells: Map<string, AnyCell> }>()
  const settleListeners = new Set<() => void>()
  const disposeListeners = new Set<(entity: Entity) => void>()

  let batchDepth = 0

  const unsubscribeClock = clock.subscribe(onWake)

  // ========== Entities ==========

  function entity(kind: string, label?: string): Entity {
    const id = newEntityId()
    const created: Entity = { id, kind, label: label ?? `${kind}:${id.slice(0, 8)}` }
    entities.set(id, { entity: created, cells: new Map() })
    return created
  }

  function register<C extends AnyCell>(cell: C): C {
    const owner = entities.get(cell.entity.id)
    if (!owner) {
      throw new NotFoundError(`Entity '${cell.entity.label}' does not belong to this graph`)
    }
    if (owner.cells.has(cell.name)) {
      throw new ValidationError(`Cell '${describeCell(cell.entity, cell.name)}' is already declared`)
    }
    owner.cells.set(cell.name, cell)
    cells.set(cell.key, cell)
    return cell
  }

  function createNode(owner: Entity, name: string, kind: GraphNode['kind']): GraphNode {
    return {
      key: cellKey(owner.id, name),
      kind,
      entityId: owner.id,
      name,
      stale: kind === 'derived',
      evaluating: false,
      dependencies: new Set(),
      dependents: new Set(),
    }
  }

  // ========== Declaration ==========

  function stored<T>(owner: Entity, name: string, initial: T, options: StoredCellOptions<T> = {}): StoredCell<T> {
    const equals = options.equals ?? Object.is
    const node = createNode(owner, name, 'stored')
    let value = initial

    return register<StoredCell<T>>({
      kind: 'stored',
      entity: owner,
      name,
      key: node.key,
      node,
      validators: options.validators ?? [],
      equals: (a, b) => equals(a, b),
      resolve: () => value,
      commit(next) {
        if (equals(value, next)) return false
        value = next
        return true
      },
    })
  }

  function derived<T>(owner: Entity, name: string, rule: Rule<T>, options: CellOptions<T> = {}): DerivedCell<T> {
    const equals = options.equals ?? Object.is
    const node = createNode(owner, name, 'derived')
    const ctx: RuleContext = {
      get: read,
      now: () => clock.now(),
      wakeAt: (instant) => clock.wakeAt(owner, name, instant),
    }
    let cached: { value: T } | null = null

    function resolve(): T {
      if (cached !== null && !node.stale) return cached.value
      const fresh = { value: evaluate(node, owner, () => rule(ctx)) }
      cached = fresh
      node.stale = false
      return fresh.value
    }

    return register<DerivedCell<T>>({
      kind: 'derived',
      entity: owner,
      name,
      key: node.key,
      node,
      equals: (a, b) => equals(a, b),
      resolve,
    })
  }

  // ========== Evaluation ==========

  function evaluate<T>(node: GraphNode, owner: Entity, run: () => T): T {
    const frame = enterFrame(node)
    for (const dep of node.dependencies) dep.dependents.delete(node)
    node.dependencies = new Set()
    // The rule registers again if it still has a future instant to wait for
    clock.cancel(owner, node.name)

    try {
      return run()
    } finally {
      stack.exit(frame)
      node.dependencies = frame.reads
      for (const dep of frame.reads) dep.dependents.add(node)
    }
  }

  function enterFrame(node: GraphNode) {
    try {
      return stack.enter(node)
    } catch (e) {
      if (debug && e instanceof CyclicDependencyError) logger.debug(e.message)
      throw e
    }
  }

  function read<T>(cell: Cell<T>): T {
    stack.record(cell.node)
    return cell.resolve()
  }

  // ========== Writes & Invalidation ==========

  function write<T>(cell: Cell<T>, value: T): void {
    if (cell.kind === 'derived') {
      throw new ImmutabilityError(`Cell '${describeCell(cell.entity, cell.name)}' is derived and cannot be written`)
    }
    const evaluating = stack.current()
    if (evaluating) {
      throw new ValidationError(
        `Cell '${describeCell(cell.entity, cell.name)}' written while '${evaluating.node.key}' was evaluating`
      )
    }
    const target: StoredCell<T> = cell
    enforce(target, value)
    batch(() => {
      if (target.commit(value)) markDependentsStale(target.node)
    })
  }

  function markDependentsStale(source: GraphNode): void {
    const pending = [...source.dependents]
    while (pending.length > 0) {
      const node = pending.pop()
      if (!node || node.stale) continue
      node.stale = true
      pending.push(...node.dependents)
    }
  }

  function invalidate(cell: AnyCell): void {
    batch(() => {
      if (cell.kind === 'derived') cell.node.stale = true
      markDependentsStale(cell.node)
    })
  }

  function onWake(wake: WakeUp): void {
    const cell = cells.get(cellKey(wake.entityId, wake.cellName))
    if (!cell) return
    if (debug) logger.debug(`Wake-up for '${describeCell(cell.entity, cell.name)}' at ${new Date(wake.instant).toISOString()}`)
    invalidate(cell)
  }

  // ========== Batching ==========

  function batch<R>(fn: () => R): R {
    batchDepth++
    try {
      return fn()
    } finally {
      batchDepth--
      if (batchDepth === 0) settle()
    }
  }

  function settle(): void {
    for (const listener of [...settleListeners]) listener()
  }

  function onSettle(listener: () => void): () => void {
    settleListeners.add(listener)
    return () => { settleListeners.delete(listener) }
  }

  // ========== Lookup & Introspection ==========

  function cell(owner: Entity, name: string): AnyCell {
    const found = entities.get(owner.id)?.cells.get(name)
    if (!found) throw new NotFoundError(`No cell '${describeCell(owner, name)}'`)
    return found
  }

  function has(owner: Entity, name: string): boolean {
    return entities.get(owner.id)?.cells.has(name) ?? false
  }

  function cellsOf(owner: Entity): AnyCell[] {
    return [...(entities.get(owner.id)?.cells.values() ?? [])]
  }

  function dependenciesOf(target: AnyCell): string[] {
    return [...target.node.dependencies].map(n => n.key)
  }

  function dependentsOf(target: AnyCell): string[] {
    return [...target.node.dependents].map(n => n.key)
  }

  function isStale(target: AnyCell): boolean {
    return target.node.stale
  }

  // ========== Lifecycle ==========

  function dispose(owner: Entity): void {
    const entry = entities.get(owner.id)
    if (!entry) return
    batch(() => {
      for (const c of entry.cells.values()) {
        markDependentsStale(c.node)
        for (const dep of c.node.dependencies) dep.dependents.delete(c.node)
        cells.delete(c.key)
      }
    })
    entities.delete(owner.id)
    clock.cancelAll(owner)
    for (const listener of [...disposeListeners]) listener(owner)
  }

  function onDispose(listener: (entity: Entity) => void): () => void {
    disposeListeners.add(listener)
    return () => { disposeListeners.delete(listener) }
  }

  function close(): void {
    unsubscribeClock()
    settleListeners.clear()
    disposeListeners.clear()
  }

  return {
    clock,
    logger,
    entity,
    stored,
    derived,
    read,
    write,
    batch,
    invalidate,
    cell,
    has,
    cellsOf,
    dependenciesOf,
    dependentsOf,
    isStale,
    onSettle,
    dispose,
    onDispose,
    close,
  }
}

export type CellGraph = ReturnType<typeof createCellGraph>
