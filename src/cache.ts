/**
 * Looseleaf Cache
 * ===============
 *
 * Persists the flattened leaf storage of a model under a configurable policy
 * and restores it when a model with the same name is constructed again.
 *
 * Only primitives, explicit nulls and arrays of primitives are written. Nested
 * models are rebuilt from the next `map()` call and never restored from cache.
 *
 * Storage keys follow a fixed layout so other tooling can read the store:
 *
 *   looseleaf.cache.<modelName>            → { key: value, ... }
 *   looseleaf.cache.<modelName>.timestamp  → seconds since epoch
 *
 * Caching is best-effort. Backend failures are logged and dropped so that
 * `map()` and `get()` callers never see them.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'

import type { StoredValue } from './index'
import { isJsonObject, isJsonValue, type JsonValue } from './json'
import { silentLogger, type Logger } from './logger'

// =============================================================================
// CACHE POLICY
// =============================================================================

export type CachePolicy =
  | { readonly kind: 'untilNextWrite' }
  | { readonly kind: 'untilProcessExit' }
  | { readonly kind: 'ttl'; readonly seconds?: number }
  | { readonly kind: 'inMemoryOnly' }
  | { readonly kind: 'noCache' }

/**
 * Policy constructors.
 *
 * @example
 * createModelStore({ cachePolicy: CachePolicy.ttl(60) })
 */
export const CachePolicy: {
  readonly untilNextWrite: CachePolicy
  readonly untilProcessExit: CachePolicy
  readonly inMemoryOnly: CachePolicy
  readonly noCache: CachePolicy
  ttl(seconds?: number): CachePolicy
} = {
  untilNextWrite: { kind: 'untilNextWrite' },
  untilProcessExit: { kind: 'untilProcessExit' },
  inMemoryOnly: { kind: 'inMemoryOnly' },
  noCache: { kind: 'noCache' },
  ttl: (seconds) => (seconds === undefined ? { kind: 'ttl' } : { kind: 'ttl', seconds })
}

export const CACHE_KEY_PREFIX = 'looseleaf.cache.'
export const TIMESTAMP_SUFFIX = '.timestamp'

// =============================================================================
// CACHE ENTRY
// =============================================================================

export type CachedPrimitive = string | number | boolean

export type CachedValue = CachedPrimitive | null | CachedPrimitive[]

/**
 * The serializable subset of one model's storage.
 */
export type CacheEntry = { [key: string]: CachedValue }

function isCachedPrimitive(value: unknown): value is CachedPrimitive {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
}

function isCachedValue(value: unknown): value is CachedValue {
  if (value === null || isCachedPrimitive(value)) return true
  return Array.isArray(value) && value.every(isCachedPrimitive)
}

export function isCacheEntry(value: unknown): value is CacheEntry {
  return isJsonObject(value) && Object.values(value).every(isCachedValue)
}

function cachedPrimitive(value: StoredValue): CachedPrimitive[] {
  switch (value.kind) {
    case 'bool':
    case 'int':
    case 'float':
    case 'string':
      return [value.value]
    default:
      return []
  }
}

/**
 * Drops nested models, keeps primitives and nulls, and keeps only the
 * primitive elements of arrays.
 */
export function serializableSubset(storage: ReadonlyMap<string, StoredValue>): CacheEntry {
  const pairs: Array<[string, CachedValue]> = []
  for (const [key, value] of storage) {
    switch (value.kind) {
      case 'null':
        pairs.push([key, null])
        break
      case 'bool':
      case 'int':
      case 'float':
      case 'string':
        pairs.push([key, value.value])
        break
      case 'array':
        pairs.push([key, value.items.flatMap(cachedPrimitive)])
        break
      case 'model':
        break
    }
  }
  // fromEntries defines own properties, so a "__proto__" key stays data
  return Object.fromEntries(pairs)
}

// =============================================================================
// STORAGE BACKENDS
// =============================================================================

/**
 * A synchronous key-value store holding JSON-compatible values.
 */
export interface CacheStorage {
  getItem(key: string): JsonValue | undefined
  setItem(key: string, value: JsonValue): void
  removeItem(key: string): void
  keys(): string[]
}

/**
 * Process-local store. Values are kept in serialized form so reads never
 * hand out references into the store.
 */
export class MemoryCacheStorage implements CacheStorage {
  private readonly items = new Map<string, string>()

  getItem(key: string): JsonValue | undefined {
    const text = this.items.get(key)
    if (text === undefined) return undefined
    const parsed: unknown = JSON.parse(text)
    return isJsonValue(parsed) ? parsed : undefined
  }

  setItem(key: string, value: JsonValue): void {
    this.items.set(key, JSON.stringify(value))
  }

  removeItem(key: string): void {
    this.items.delete(key)
  }

  keys(): string[] {
    return [...this.items.keys()]
  }
}

/**
 * Store backed by a single JSON file. The file is read on first access and
 * rewritten after every change.
 */
export class FileCacheStorage implements CacheStorage {
  private items: Map<string, JsonValue> | undefined

  constructor(readonly filePath: string) {}

  getItem(key: string): JsonValue | undefined {
    return this.load().get(key)
  }

  setItem(key: string, value: JsonValue): void {
    this.load().set(key, value)
    this.flush()
  }

  removeItem(key: string): void {
    if (this.load().delete(key)) {
      this.flush()
    }
  }

  keys(): string[] {
    return [...this.load().keys()]
  }

  private load(): Map<string, JsonValue> {
    if (this.items) return this.items

    const items = new Map<string, JsonValue>()
    if (existsSync(this.filePath)) {
      const parsed: unknown = JSON.parse(readFileSync(this.filePath, 'utf8'))
      if (!isJsonObject(parsed) || !isJsonValue(parsed)) {
        throw new Error(`[Looseleaf] Cache file "${this.filePath}" does not hold a JSON object.`)
      }
      for (const [key, value] of Object.entries(parsed)) {
        items.set(key, value)
      }
    }
    this.items = items
    return items
  }

  private flush(): void {
    const items = this.load()
    mkdirSync(dirname(this.filePath), { recursive: true })
    writeFileSync(this.filePath, JSON.stringify(Object.fromEntries(items), null, 2))
  }
}

// =============================================================================
// CACHE MANAGER
// =============================================================================

export interface CacheManagerOptions {
  /** TTL used when the policy is `ttl()` without seconds. */
  defaultTTLSeconds?: number
  /** Clock in milliseconds. */
  now?: () => number
}

export class CacheManager {
  private readonly defaultTTLSeconds: number
  private readonly now: () => number

  constructor(
    readonly policy: CachePolicy,
    private readonly storage: CacheStorage,
    private readonly logger: Logger = silentLogger,
    options: CacheManagerOptions = {}
  ) {
    this.defaultTTLSeconds = options.defaultTTLSeconds ?? 3600
    this.now = options.now ?? (() => Date.now())
  }

  /**
   * `false` for the policies that never touch the store.
   */
  get persists(): boolean {
    return this.policy.kind !== 'noCache' && this.policy.kind !== 'inMemoryOnly'
  }

  persist(storage: ReadonlyMap<string, StoredValue>, modelName: string): void {
    if (!this.persists) return

    const cacheKey = CACHE_KEY_PREFIX + modelName
    try {
      const entry = serializableSubset(storage)
      this.storage.setItem(cacheKey, entry)
      this.storage.setItem(cacheKey + TIMESTAMP_SUFFIX, this.now() / 1000)
      this.logger.debug(`Cache persisted ${Object.keys(entry).length} key(s) for model "${modelName}".`)
    } catch (error) {
      this.logger.warn(`Cache persist failed for model "${modelName}".`, error)
    }
  }

  restore(modelName: string): CacheEntry | undefined {
    if (!this.persists) return undefined

    const cacheKey = CACHE_KEY_PREFIX + modelName
    try {
      if (this.policy.kind === 'ttl') {
        const ttl = this.policy.seconds ?? this.defaultTTLSeconds
        const written = this.storage.getItem(cacheKey + TIMESTAMP_SUFFIX)
        const elapsed = typeof written === 'number' ? this.now() / 1000 - written : Infinity
        if (elapsed > ttl) {
          this.logger.debug(`Cache TTL expired for model "${modelName}".`)
          this.clear(modelName)
          return undefined
        }
      }

      const stored = this.storage.getItem(cacheKey)
      if (stored === undefined) return undefined
      if (!isCacheEntry(stored)) {
        this.logger.warn(`Cache entry for model "${modelName}" has an unexpected shape; evicting.`)
        this.clear(modelName)
        return undefined
      }

      this.logger.debug(`Cache restored ${Object.keys(stored).length} key(s) for model "${modelName}".`)
      return stored
    } catch (error) {
      this.logger.warn(`Cache restore failed for model "${modelName}".`, error)
      return undefined
    }
  }

  clear(modelName: string): void {
    const cacheKey = CACHE_KEY_PREFIX + modelName
    try {
      this.storage.removeItem(cacheKey)
      this.storage.removeItem(cacheKey + TIMESTAMP_SUFFIX)
    } catch (error) {
      this.logger.warn(`Cache clear failed for model "${modelName}".`, error)
    }
  }

  /**
   * Removes every entry under the library prefix. Other keys in the store are
   * left alone.
   */
  clearAll(): void {
    try {
      for (const key of this.storage.keys()) {
        if (key.startsWith(CACHE_KEY_PREFIX)) {
          this.storage.removeItem(key)
        }
      }
      this.logger.info('Cache cleared all entries.')
    } catch (error) {
      this.logger.warn('Cache clear-all failed.', error)
    }
  }
}
