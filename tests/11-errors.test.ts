/**
 * Segment 11: Error System Tests
 *
 * Tests the consolidated error system in errors.ts:
 * CellError base class, error code map, and all error subclasses.
 */

import { describe, it, expect } from 'vitest'
import {
  CellError,
  CellErrorCode,
  ImmutabilityError,
  CyclicDependencyError,
  NotFoundError,
  BadDurationError,
  NaiveTimestampError,
  TriageRangeError,
  InvalidTimezoneError,
  ValidationError,
  ParseError,
} from '../src/errors'

describe('Segment 11: Error System', () => {
  // ========================================================================
  // CellError Base Class
  // ========================================================================

  describe('CellError base class', () => {
    it('constructor sets code and message', () => {
      const err = new CellError(CellErrorCode.NOT_FOUND, 'test message')
      expect(err.code).toBe('NOT_FOUND')
      expect(err.message).toBe('test message')
    })

    it('is instanceof Error', () => {
      const err = new CellError(CellErrorCode.VALIDATION, 'x')
      expect(err).toBeInstanceOf(Error)
      expect(err).toBeInstanceOf(CellError)
    })

    it('name property is CellError', () => {
      expect(new CellError(CellErrorCode.VALIDATION, 'x').name).toBe('CellError')
    })
  })

  // ========================================================================
  // CellErrorCode
  // ========================================================================

  describe('CellErrorCode', () => {
    it('has exactly 9 unique code values', () => {
      const values = Object.values(CellErrorCode)
      expect(values).toHaveLength(9)
      expect(new Set(values).size).toBe(9)
      expect(values[0]).toBe('IMMUTABLE')
    })

    it('code values match their key names', () => {
      for (const [key, value] of Object.entries(CellErrorCode)) {
        expect(value).toBe(key)
      }
    })
  })

  // ========================================================================
  // Error Subclasses (parametric)
  // ========================================================================

  const errorClasses = [
    { Class: ImmutabilityError, code: 'IMMUTABLE', name: 'ImmutabilityError' },
    { Class: NotFoundError, code: 'NOT_FOUND', name: 'NotFoundError' },
    { Class: BadDurationError, code: 'BAD_DURATION', name: 'BadDurationError' },
    { Class: NaiveTimestampError, code: 'NAIVE_TIMESTAMP', name: 'NaiveTimestampError' },
    { Class: TriageRangeError, code: 'TRIAGE_RANGE', name: 'TriageRangeError' },
    { Class: InvalidTimezoneError, code: 'INVALID_TIMEZONE', name: 'InvalidTimezoneError' },
    { Class: ValidationError, code: 'VALIDATION', name: 'ValidationError' },
    { Class: ParseError, code: 'PARSE_ERROR', name: 'ParseError' },
  ] as const

  describe('Error subclasses', () => {
    for (const { Class, code, name } of errorClasses) {
      describe(name, () => {
        it(`code is ${code}`, () => {
          expect(new Class('test').code).toBe(code)
        })

        it(`name is ${name}`, () => {
          expect(new Class('test').name).toBe(name)
        })

        it('instanceof chain: subclass -> CellError', () => {
          const err = new Class('test')
          expect(err).toBeInstanceOf(Class)
          expect(err).toBeInstanceOf(CellError)
          expect(err.message).toBe('test')
        })
      })
    }
  })

  // ========================================================================
  // CyclicDependencyError
  // ========================================================================

  describe('CyclicDependencyError', () => {
    it('keeps the path and spells it out in the message', () => {
      const err = new CyclicDependencyError(['a.x', 'a.y', 'a.x'])
      expect(err.code).toBe('CYCLIC_DEPENDENCY')
      expect(err.name).toBe('CyclicDependencyError')
      expect(err.path).toEqual(['a.x', 'a.y', 'a.x'])
      expect(err.message).toBe('Cyclic dependency: a.x -> a.y -> a.x')
      expect(err).toBeInstanceOf(CellError)
    })
  })
})
