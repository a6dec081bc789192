import { describe, it, expect } from 'vitest'
import {
  BuilderSequenceError,
  ConfigurationError,
  DedupError,
  InvalidParameterError,
  LogSinkError,
  MissingParameterError,
  describeError,
  isDedupError,
  requireInRange,
  requireNonEmptyArray,
  requireNonEmptyString,
  requireNonNull,
  requireOneOf,
} from '../../../src/utils/errors'

describe('errors', () => {
  it('carries a code and context', () => {
    const error = new ConfigurationError('bad strategy', 'strategy.type')

    expect(error).toBeInstanceOf(DedupError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('ConfigurationError')
    expect(error.code).toBe('CONFIGURATION_ERROR')
    expect(error.context).toEqual({ field: 'strategy.type' })
  })

  it('formats parameter errors', () => {
    expect(new MissingParameterError('strategy').message).toBe(
      "Missing required parameter: 'strategy'"
    )
    expect(new InvalidParameterError('fuzzy.titleThreshold', 2, 'too high').message).toBe(
      "Invalid parameter 'fuzzy.titleThreshold': too high"
    )
    expect(new BuilderSequenceError('build', 'no strategy').code).toBe(
      'BUILDER_SEQUENCE_ERROR'
    )
  })

  it('wraps log sink failures with their stage', () => {
    const original = new Error('disk full')
    const error = new LogSinkError('record', original, { runId: 'r' })

    expect(error.message).toBe('Log sink failed during record: disk full')
    expect(error.code).toBe('LOG_SINK_FAILURE')
    expect(error.stage).toBe('record')
    expect(error.originalError).toBe(original)
    expect(error.context).toEqual({ stage: 'record', runId: 'r' })
  })

  it('wraps logger failures', () => {
    const error = new LogSinkError('log', new Error('disk full'), { level: 'warn' })

    expect(error.message).toBe('Logger failed: disk full')
    expect(error.stage).toBe('log')
    expect(error.context).toEqual({ stage: 'log', level: 'warn' })
  })

  it('describes thrown values that are not errors', () => {
    expect(describeError('plain string')).toBe('plain string')
    expect(describeError(42)).toBe('42')
    expect(new LogSinkError('open', 'refused').message).toBe(
      'Log sink failed during open: refused'
    )
  })

  it('identifies library errors', () => {
    expect(isDedupError(new MissingParameterError('x'))).toBe(true)
    expect(isDedupError(new Error('x'))).toBe(false)
  })
})

describe('validators', () => {
  it('requireNonNull', () => {
    expect(requireNonNull(0, 'n')).toBe(0)
    expect(() => requireNonNull(null, 'n')).toThrow(MissingParameterError)
    expect(() => requireNonNull(undefined, 'n')).toThrow(MissingParameterError)
  })

  it('requireInRange', () => {
    expect(requireInRange(0, 0, 1, 't')).toBe(0)
    expect(requireInRange(1, 0, 1, 't')).toBe(1)
    expect(() => requireInRange(NaN, 0, 1, 't')).toThrow(
      "Invalid parameter 't': must be a number"
    )
    expect(() => requireInRange(1.5, 0, 1, 't')).toThrow(
      "Invalid parameter 't': must be between 0 and 1 (inclusive)"
    )
  })

  it('requireNonEmptyArray', () => {
    expect(requireNonEmptyArray(['a'], 'fields')).toEqual(['a'])
    expect(() => requireNonEmptyArray([], 'fields')).toThrow(
      "Invalid parameter 'fields': must not be empty"
    )
  })

  it('requireNonEmptyString', () => {
    expect(requireNonEmptyString('doi', 'field')).toBe('doi')
    expect(() => requireNonEmptyString('  ', 'field')).toThrow(InvalidParameterError)
  })

  it('requireOneOf', () => {
    expect(requireOneOf('skip', ['group', 'skip'], 'policy')).toBe('skip')
    expect(() => requireOneOf('drop', ['group', 'skip'], 'policy')).toThrow(
      "Invalid parameter 'policy': must be one of: group, skip"
    )
  })
})
