import { LRU } from 'tiny-lru'
import createLogger from './logger.js'

const logger = createLogger('cache')

const maxItems = 100
const defaultTtl = 1000 * 60 * 60 * 24 // 24 hours
const defaultResetTtl = true

type CacheKeys = {
  status: string
}

/**
 * JSON-serializing LRU used to remember the last raw status document per appliance
 */
export class Cache<T = unknown> {
  private readonly lru: LRU<string>

  constructor(max = maxItems, ttl = defaultTtl, resetTtl = defaultResetTtl) {
    this.lru = new LRU<string>(max, ttl, resetTtl)
  }

  cacheKey(key: string): CacheKeys {
    return {
      status: `${key}:status`,
    }
  }

  /**
   * True when the stored value serializes identically; otherwise stores the new value and returns false
   */
  matchByValue(key: string, value: T): boolean {
    const serialized = JSON.stringify(value)
    if (this.lru.get(key) === serialized) {
      logger.debug(`Key "${key}" value has not changed.`)
      return true
    }

    this.lru.set(key, serialized, false, true)
    return false
  }
}
