import { describe, expect, it, vi } from 'vitest'
import { Cache } from '../src/cache.js'
import { washerIdleStatus, washerSpinStatus } from './fixtures/status-responses.js'

vi.mock('../src/logger.js', () => ({
  default: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}))

describe('Cache', () => {
  it('should report a first value as changed', () => {
    const cache = new Cache()
    expect(cache.matchByValue('washer-1:status', washerSpinStatus)).toBe(false)
  })

  it('should detect when a status document has not changed', () => {
    const cache = new Cache()
    cache.matchByValue('washer-1:status', washerSpinStatus)

    expect(cache.matchByValue('washer-1:status', structuredClone(washerSpinStatus))).toBe(true)
  })

  it('should detect when a status document has changed', () => {
    const cache = new Cache()
    cache.matchByValue('washer-1:status', washerSpinStatus)

    expect(cache.matchByValue('washer-1:status', washerIdleStatus)).toBe(false)
    expect(cache.matchByValue('washer-1:status', washerIdleStatus)).toBe(true)
  })

  it('should keep keys independent', () => {
    const cache = new Cache<{ remaining: number }>()
    cache.matchByValue('washer-1:status', { remaining: 10 })

    expect(cache.matchByValue('dryer-1:status', { remaining: 10 })).toBe(false)
  })

  it('should evict the least recently used key', () => {
    const cache = new Cache<number>(1)
    cache.matchByValue('a', 1)
    cache.matchByValue('b', 1)

    expect(cache.matchByValue('a', 1)).toBe(false)
  })

  it('should generate status cache keys per device', () => {
    const cache = new Cache()
    expect(cache.cacheKey('washer-1')).toEqual({ status: 'washer-1:status' })
  })
})
