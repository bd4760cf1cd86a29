/**
 * Internal Types
 *
 * Graph bookkeeping shared between the cell graph and its internal helpers.
 * Cell handles keep their typed value in a closure; the graph only sees nodes.
 */

import type { EntityId } from '../types'

// ============================================================================
// Graph Nodes
// ============================================================================

export type GraphNode = {
  readonly key: string
  readonly kind: 'stored' | 'derived'
  readonly entityId: EntityId
  readonly name: string
  /** Derived only: cached value may not reflect current inputs */
  stale: boolean
  /** Derived only: set while the rule runs, used for cycle detection */
  evaluating: boolean
  /** Cells read by the last evaluation */
  dependencies: Set<GraphNode>
  /** Derived cells whose last evaluation read this one */
  readonly dependents: Set<GraphNode>
}

// ============================================================================
// Evaluation
// ============================================================================

export type EvaluationFrame = {
  readonly node: GraphNode
  readonly reads: Set<GraphNode>
}

// ============================================================================
// Logging
// ============================================================================

export type Logger = {
  debug(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}
