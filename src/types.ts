/**
 * Shared Types
 *
 * Entity identity and the cell handle shapes used across the graph,
 * the constraint layer, the observer registry and the rule sets.
 */

import type { GraphNode } from './internal/types'

// ============================================================================
// Branded ID Types
// ============================================================================

declare const __entityId: unique symbol

export type EntityId = string & { readonly [__entityId]: true }

// ============================================================================
// Entities
// ============================================================================

export type Entity = {
  readonly id: EntityId
  readonly kind: string
  readonly label: string
}

// ============================================================================
// Cells
// ============================================================================

export type Validator<T> = {
  readonly name: string
  check(candidate: T): boolean
  error(candidate: T): Error
}

type CellBase<T> = {
  readonly entity: Entity
  readonly name: string
  /** `<entity id>.<name>`, unique within a graph */
  readonly key: string
  equals(a: T, b: T): boolean
  /** Bring the cell up to date and return its value, without dependency tracking */
  resolve(): T
  /** @internal */
  readonly node: GraphNode
}

export type StoredCell<T> = CellBase<T> & {
  readonly kind: 'stored'
  readonly validators: readonly Validator<T>[]
  /** @internal Replace the value; returns false when equal to the current one */
  commit(value: T): boolean
}

export type DerivedCell<T> = CellBase<T> & {
  readonly kind: 'derived'
}

export type Cell<T> = StoredCell<T> | DerivedCell<T>

export type CellValue<C> = C extends Cell<infer T> ? T : never

export type RuleContext = {
  /** Read a cell and record it as a dependency of the rule being evaluated */
  get<T>(cell: Cell<T>): T
  /** Current clock instant, epoch ms */
  now(): number
  /** Invalidate the cell under evaluation at `instant` (epoch ms) */
  wakeAt(instant: number): void
}

export type Rule<T> = (ctx: RuleContext) => T

export type CellOptions<T> = {
  equals?: (a: T, b: T) => boolean
}

export type StoredCellOptions<T> = CellOptions<T> & {
  validators?: readonly Validator<T>[]
}
