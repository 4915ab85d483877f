import { describe, expect, it } from '@jest/globals'
import { classifyException } from './classify-error'

describe('classifyException', () => {
  it.each([
    ['Protocol error: Target closed', 'browser'],
    ['WebSocket is not open: readyState 3', 'browser'],
    ['connect ECONNREFUSED 127.0.0.1:9222', 'browser'],
    ['Page crashed!', 'browser'],
  ])('classifies "%s" as a browser crash', (message, expected) => {
    expect(classifyException(new Error(message))).toBe(expected)
  })

  it('classifies timeouts as timing failures', () => {
    expect(classifyException(new Error('Waiting for selector timed out after 30000ms'))).toBe('timing')
  })

  it('uses the error name as well as the message', () => {
    const error = new Error('navigation took too long')
    error.name = 'TimeoutError'

    expect(classifyException(error)).toBe('timing')
  })

  it('falls back to session for anything else', () => {
    expect(classifyException(new Error('unexpected page state'))).toBe('session')
    expect(classifyException('boom')).toBe('session')
  })
})
