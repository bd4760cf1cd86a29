/**
 * Internal Helpers
 *
 * Small utilities shared across internal modules.
 */

import { randomUUID } from 'node:crypto'
import type { Entity, EntityId } from '../types'

// ============================================================================
// ID Generation
// ============================================================================

export function uuid(): string {
  return randomUUID()
}

export function newEntityId(): EntityId {
  return uuid() as EntityId
}

// ============================================================================
// Naming
// ============================================================================

export function cellKey(entityId: EntityId, name: string): string {
  return `${entityId}.${name}`
}

/** Human-readable cell name for error messages and logs */
export function describeCell(entity: Entity, name: string): string {
  return `${entity.label}.${name}`
}
