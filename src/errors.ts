/**
 * Consolidated error system for attrcell.
 *
 * All error classes extend CellError, which carries a typed error code.
 * Validation errors are thrown at the write call site before anything is committed.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const CellErrorCode = {
  // Cell graph
  IMMUTABLE: 'IMMUTABLE',
  CYCLIC_DEPENDENCY: 'CYCLIC_DEPENDENCY',
  NOT_FOUND: 'NOT_FOUND',

  // Constraint layer
  BAD_DURATION: 'BAD_DURATION',
  NAIVE_TIMESTAMP: 'NAIVE_TIMESTAMP',
  TRIAGE_RANGE: 'TRIAGE_RANGE',
  INVALID_TIMEZONE: 'INVALID_TIMEZONE',
  VALIDATION: 'VALIDATION',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',
} as const

export type CellErrorCode = (typeof CellErrorCode)[keyof typeof CellErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CellError extends Error {
  readonly code: CellErrorCode

  constructor(code: CellErrorCode, message: string) {
    super(message)
    this.name = 'CellError'
    this.code = code
  }
}

// ============================================================================
// Cell Graph Errors
// ============================================================================

export class ImmutabilityError extends CellError {
  constructor(message: string) {
    super(CellErrorCode.IMMUTABLE, message)
    this.name = 'ImmutabilityError'
  }
}

export class CyclicDependencyError extends CellError {
  /** Qualified cell names from the first repeated cell back to itself */
  readonly path: readonly string[]

  constructor(path: readonly string[]) {
    super(CellErrorCode.CYCLIC_DEPENDENCY, `Cyclic dependency: ${path.join(' -> ')}`)
    this.name = 'CyclicDependencyError'
    this.path = path
  }
}

export class NotFoundError extends CellError {
  constructor(message: string) {
    super(CellErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

// ============================================================================
// Constraint Errors
// ============================================================================

export class BadDurationError extends CellError {
  constructor(message: string) {
    super(CellErrorCode.BAD_DURATION, message)
    this.name = 'BadDurationError'
  }
}

export class NaiveTimestampError extends CellError {
  constructor(message: string) {
    super(CellErrorCode.NAIVE_TIMESTAMP, message)
    this.name = 'NaiveTimestampError'
  }
}

export class TriageRangeError extends CellError {
  constructor(message: string) {
    super(CellErrorCode.TRIAGE_RANGE, message)
    this.name = 'TriageRangeError'
  }
}

export class InvalidTimezoneError extends CellError {
  constructor(message: string) {
    super(CellErrorCode.INVALID_TIMEZONE, message)
    this.name = 'InvalidTimezoneError'
  }
}

export class ValidationError extends CellError {
  constructor(message: string) {
    super(CellErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends CellError {
  constructor(message: string) {
    super(CellErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}
