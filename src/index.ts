/**
 * Looseleaf: Crash-Safe Dynamic Models for Drifting JSON
 * ======================================================
 *
 * Read fields from server responses whose shape and field types change
 * between releases, without declaring a type per shape and without a read
 * ever throwing.
 *
 * - Keys are normalized to one casing style on the way in
 * - Nested objects become named child models, arrays keep their order
 * - Every read returns a `ModelValue` that coerces to the type you ask for
 * - Member chains of any depth end in an absent value instead of an error
 * - Leaf storage is cached under a configurable policy
 *
 * @example
 * const store = createModelStore({ logLevel: 'debug' })
 * store.models.login.map({ user_id: 42, profile: { display_name: 'Ada' } })
 *
 * store.models.login.get('userId').int                      // 42
 * store.models.login.at('profile.displayName').string       // 'Ada'
 * store.models.login.at('profile.missing.deeper').exists    // false
 *
 * @license MIT
 */

import {
  CacheManager,
  CachePolicy,
  MemoryCacheStorage,
  type CacheEntry,
  type CacheStorage
} from './cache'
import { isJsonObject, type JsonObject, type JsonValue } from './json'
import { createLogger, silentLogger, type LogLevel, type Logger } from './logger'

// =============================================================================
// CORE TYPES
// =============================================================================

/**
 * A value held in a model's storage. Closed set: every coercion is an
 * exhaustive switch over `kind`.
 */
type StoredValue =
  | { readonly kind: 'null' }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'int'; readonly value: number }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'model'; readonly value: ModelInstance }
  | { readonly kind: 'array'; readonly items: readonly StoredValue[] }

type StoredKind = StoredValue['kind']

/**
 * Values accepted by `ModelInstance.set`.
 */
type ModelInput = JsonValue | ModelInstance

/**
 * Reserved key used by the array form of `map`.
 */
const ITEMS_KEY = 'items'

const NULL_VALUE: StoredValue = { kind: 'null' }

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * How raw JSON keys are rewritten before they are stored.
 */
type KeyCodingStyle = 'camelCase' | 'none'

interface ModelConfiguration {
  readonly cachePolicy: CachePolicy
  /** TTL used by `CachePolicy.ttl()` when no seconds are given. */
  readonly defaultTTLSeconds: number
  readonly keyCodingStyle: KeyCodingStyle
  readonly logLevel: LogLevel
  readonly storage: CacheStorage
  /** Seconds before a request made through `createClient` is aborted. */
  readonly requestTimeout: number
  readonly commonHeaders: Readonly<Record<string, string>>
  /** Returns the bearer token attached to every request, if any. */
  readonly authTokenProvider?: () => string | null | undefined
}

type ModelOptions = Partial<ModelConfiguration>

function resolveConfiguration(options: ModelOptions = {}): ModelConfiguration {
  return Object.freeze({
    cachePolicy: options.cachePolicy ?? CachePolicy.untilNextWrite,
    defaultTTLSeconds: options.defaultTTLSeconds ?? 3600,
    keyCodingStyle: options.keyCodingStyle ?? 'camelCase',
    logLevel: options.logLevel ?? 'warning',
    storage: options.storage ?? new MemoryCacheStorage(),
    requestTimeout: options.requestTimeout ?? 30,
    commonHeaders: Object.freeze({ ...options.commonHeaders }),
    authTokenProvider: options.authTokenProvider
  })
}

// =============================================================================
// KEY NORMALIZATION
// =============================================================================

function lowercaseFirst(text: string): string {
  const first = text.codePointAt(0)
  if (first === undefined) return text
  const head = String.fromCodePoint(first)
  return head.toLowerCase() + text.slice(head.length)
}

function capitalizeFirst(text: string): string {
  const first = text.codePointAt(0)
  if (first === undefined) return text
  const head = String.fromCodePoint(first)
  return head.toUpperCase() + text.slice(head.length)
}

/**
 * Rewrites a raw key into the canonical casing.
 *
 *   user_id    → userId
 *   first-name → firstName
 *   UserEmail  → userEmail
 *   userId     → userId
 *
 * Keys mixing `_` and `-` are split on both, which keeps the function
 * idempotent.
 */
function normalizeKey(key: string, style: KeyCodingStyle = 'camelCase'): string {
  if (style === 'none' || key.length === 0) return key

  if (key.includes('_') || key.includes('-')) {
    const [first, ...rest] = key.split(/[_-]/).filter(segment => segment.length > 0)
    if (first === undefined) return key
    return lowercaseFirst(first) + rest.map(capitalizeFirst).join('')
  }

  return lowercaseFirst(key)
}

// =============================================================================
// VALUE COERCION
// =============================================================================

const INTEGER_TEXT = /^[+-]?\d+$/
const DECIMAL_TEXT = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/

const TRUE_WORDS = new Set(['true', 'yes', '1'])

function parseIntegerText(text: string): number {
  if (!INTEGER_TEXT.test(text)) return 0
  const parsed = Number(text)
  return Number.isSafeInteger(parsed) ? parsed : 0
}

function parseDecimalText(text: string): number {
  if (!DECIMAL_TEXT.test(text)) return 0
  const parsed = Number(text)
  return Number.isFinite(parsed) ? parsed : 0
}

/**
 * Best-effort conversions from a stored value to a requested type. None of
 * them throw: anything without a sensible conversion yields the type's zero
 * value.
 */
const coerce = {
  string(value: StoredValue | undefined): string {
    if (value === undefined) return ''
    switch (value.kind) {
      case 'string':
        return value.value
      case 'bool':
        return value.value ? 'true' : 'false'
      case 'int':
      case 'float':
        return String(value.value)
      case 'null':
      case 'model':
      case 'array':
        return ''
    }
  },

  int(value: StoredValue | undefined): number {
    if (value === undefined) return 0
    switch (value.kind) {
      case 'int':
        return value.value
      case 'float':
        // `|| 0` folds -0 into 0
        return Number.isFinite(value.value) ? Math.trunc(value.value) || 0 : 0
      case 'bool':
        return value.value ? 1 : 0
      case 'string':
        return parseIntegerText(value.value)
      case 'null':
      case 'model':
      case 'array':
        return 0
    }
  },

  float(value: StoredValue | undefined): number {
    if (value === undefined) return 0
    switch (value.kind) {
      case 'int':
      case 'float':
        return value.value
      case 'bool':
        return value.value ? 1 : 0
      case 'string':
        return parseDecimalText(value.value)
      case 'null':
      case 'model':
      case 'array':
        return 0
    }
  },

  bool(value: StoredValue | undefined): boolean {
    if (value === undefined) return false
    switch (value.kind) {
      case 'bool':
        return value.value
      case 'int':
      case 'float':
        return value.value !== 0 && !Number.isNaN(value.value)
      case 'string':
        // "false" / "no" / "0" and unrecognized words all land on false
        return TRUE_WORDS.has(value.value.toLowerCase())
      case 'null':
      case 'model':
      case 'array':
        return false
    }
  }
}

/**
 * Deep comparison of two stored values. Models compare by their contents,
 * not by identity or name.
 */
function storedValuesEqual(a: StoredValue | undefined, b: StoredValue | undefined): boolean {
  if (a === undefined || b === undefined) return a === b
  switch (a.kind) {
    case 'null':
      return b.kind === 'null'
    case 'bool':
      return b.kind === 'bool' && b.value === a.value
    case 'string':
      return b.kind === 'string' && b.value === a.value
    case 'int':
    case 'float':
      return (b.kind === 'int' || b.kind === 'float') && Object.is(a.value, b.value)
    case 'array':
      return (
        b.kind === 'array' &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => storedValuesEqual(item, b.items[i]))
      )
    case 'model': {
      if (b.kind !== 'model') return false
      const left = a.value.entries()
      const right = b.value.entries()
      return (
        left.size === right.size &&
        [...left].every(([key, value]) => storedValuesEqual(value, right.get(key)))
      )
    }
  }
}

/**
 * Converts a stored value back into plain JSON.
 */
function storedToJson(value: StoredValue): JsonValue {
  switch (value.kind) {
    case 'null':
      return null
    case 'bool':
    case 'int':
    case 'float':
    case 'string':
      return value.value
    case 'model':
      return value.value.toJSON()
    case 'array':
      return value.items.map(storedToJson)
  }
}

// =============================================================================
// JSON TREE NORMALIZATION
// =============================================================================

/**
 * Settings handed down from a parent model to the children it creates.
 * Children never receive a cache manager.
 */
interface ResolveOptions {
  readonly keyCodingStyle?: KeyCodingStyle
  readonly logger?: Logger
}

/**
 * Resolves one JSON value into its stored form. `name` is the name a child
 * model would get if `value` is an object.
 *
 * A model instance is copied into a new child named `name`, so every child
 * has exactly one parent and a model can never contain itself.
 */
function resolveValue(value: ModelInput, name: string, options: ResolveOptions = {}): StoredValue {
  if (value instanceof ModelInstance) {
    const copy = new ModelInstance(name, options)
    copy.map(value.toJSON())
    return { kind: 'model', value: copy }
  }
  if (value === null) {
    return NULL_VALUE
  }
  if (Array.isArray(value)) {
    return {
      kind: 'array',
      items: value.map((element, index) => resolveValue(element, `${name}[${index}]`, options))
    }
  }
  switch (typeof value) {
    case 'boolean':
      return { kind: 'bool', value }
    case 'number':
      return Number.isInteger(value) ? { kind: 'int', value } : { kind: 'float', value }
    case 'string':
      return { kind: 'string', value }
    default: {
      const child = new ModelInstance(name, options)
      child.map(value)
      return { kind: 'model', value: child }
    }
  }
}

/**
 * Builds the complete storage for one JSON object owned by `owner`.
 */
function buildStorage(
  json: JsonObject,
  owner: string,
  options: ResolveOptions = {}
): Map<string, StoredValue> {
  const storage = new Map<string, StoredValue>()
  for (const [rawKey, value] of Object.entries(json)) {
    const key = normalizeKey(rawKey, options.keyCodingStyle)
    storage.set(key, resolveValue(value, `${owner}.${key}`, options))
  }
  return storage
}

// =============================================================================
// PATHS
// =============================================================================

type PathSegment = { readonly member: string } | { readonly index: number }

const PATH_TOKEN = /\[(-?\d+)\]|[^.[\]]+/g

/**
 * Splits `order.items[0].name` into member and index segments.
 */
function parsePath(path: string): PathSegment[] {
  const segments: PathSegment[] = []
  for (const match of path.matchAll(PATH_TOKEN)) {
    const [token, index] = match
    segments.push(index === undefined ? { member: token } : { index: Number(index) })
  }
  return segments
}

// =============================================================================
// MODEL VALUE
// =============================================================================

/**
 * Read-only wrapper around one stored value, created fresh on every read.
 *
 * Conversions go through `coerce`; member and index access forward into
 * nested models and arrays and return an absent value at any dead end.
 */
class ModelValue {
  constructor(
    readonly raw: StoredValue | undefined,
    readonly key: string = '',
    readonly path: string = key
  ) {}

  /** `false` only when nothing is stored under this key or index. */
  get exists(): boolean {
    return this.raw !== undefined
  }

  /** `true` for an explicit null and for an absent value. */
  get isNull(): boolean {
    return this.raw === undefined || this.raw.kind === 'null'
  }

  get kind(): StoredKind | 'absent' {
    return this.raw === undefined ? 'absent' : this.raw.kind
  }

  get string(): string {
    return coerce.string(this.raw)
  }

  get int(): number {
    return coerce.int(this.raw)
  }

  get float(): number {
    return coerce.float(this.raw)
  }

  get double(): number {
    return coerce.float(this.raw)
  }

  get bool(): boolean {
    return coerce.bool(this.raw)
  }

  get stringOrNull(): string | null {
    return this.isNull ? null : this.string
  }

  get intOrNull(): number | null {
    return this.isNull ? null : this.int
  }

  get floatOrNull(): number | null {
    return this.isNull ? null : this.float
  }

  get doubleOrNull(): number | null {
    return this.floatOrNull
  }

  get boolOrNull(): boolean | null {
    return this.isNull ? null : this.bool
  }

  get isArray(): boolean {
    return this.raw?.kind === 'array'
  }

  /**
   * Every element wrapped as a value; empty when this is not an array.
   */
  array(): ModelValue[] {
    if (this.raw?.kind !== 'array') return []
    return this.raw.items.map(
      (item, i) => new ModelValue(item, `${this.key}[${i}]`, `${this.path}[${i}]`)
    )
  }

  index(i: number): ModelValue {
    const item = this.raw?.kind === 'array' && Number.isInteger(i) && i >= 0 ? this.raw.items[i] : undefined
    return new ModelValue(item, `${this.key}[${i}]`, `${this.path}[${i}]`)
  }

  get isModel(): boolean {
    return this.raw?.kind === 'model'
  }

  /**
   * The nested model, or a fresh detached empty one. The sentinel is never
   * registered or cached, so writing to it cannot touch the real tree.
   */
  asModel(): ModelInstance {
    if (this.raw?.kind === 'model') return this.raw.value
    return new ModelInstance(`${this.path}_empty`)
  }

  member(name: string): ModelValue {
    if (this.raw?.kind === 'model') return this.raw.value.get(name)
    return new ModelValue(undefined, name, `${this.path}.${name}`)
  }

  /**
   * Follows a dotted path with optional indexes, e.g. `items[0].price`.
   */
  at(path: string): ModelValue {
    return parsePath(path).reduce<ModelValue>(
      (value, segment) => ('index' in segment ? value.index(segment.index) : value.member(segment.member)),
      this
    )
  }

  /**
   * Property-style access: `value.fields.city` is `value.member('city')`.
   */
  get fields(): Readonly<Record<string, ModelValue>> {
    return this.raw?.kind === 'model' ? this.raw.value.fields : memberProxy(name => this.member(name))
  }

  /**
   * Loose equality on the string-coerced form, so `1`, `1.0` and `"1"` are
   * equal while `0` and `""` are not.
   */
  equals(other: ModelValue | string): boolean {
    return this.string === (typeof other === 'string' ? other : other.string)
  }

  structurallyEquals(other: ModelValue): boolean {
    return storedValuesEqual(this.raw, other.raw)
  }

  toJSON(): JsonValue | undefined {
    return this.raw === undefined ? undefined : storedToJson(this.raw)
  }

  toString(): string {
    return this.string
  }

  describe(): string {
    if (this.raw === undefined) return `ModelValue(absent) [${this.path}]`
    return `ModelValue(${this.raw.kind}) [${this.path}] → "${this.string}"`
  }
}

function memberProxy(lookup: (name: string) => ModelValue): Readonly<Record<string, ModelValue>> {
  const target: Record<string, ModelValue> = {}
  return new Proxy(target, {
    get: (_, property) => (typeof property === 'string' ? lookup(property) : undefined)
  })
}

// =============================================================================
// MODEL INSTANCE
// =============================================================================

type ModelListener = (model: ModelInstance) => void

interface ModelInstanceOptions extends ResolveOptions {
  /** Omitted for detached and nested models. */
  readonly cache?: CacheManager
}

/**
 * A named, mutable node holding one JSON object's fields.
 *
 * All methods are synchronous: `map()` builds the replacement storage off to
 * the side and swaps it in one assignment, so a read never sees a partially
 * mapped model.
 */
class ModelInstance {
  readonly name: string

  private storage = new Map<string, StoredValue>()
  private readonly cache: CacheManager | undefined
  private readonly keyCodingStyle: KeyCodingStyle
  private readonly logger: Logger
  private readonly listeners = new Set<ModelListener>()
  private notifying = false
  private notifyPending = false

  constructor(name: string, options: ModelInstanceOptions = {}) {
    this.name = name
    this.cache = options.cache
    this.keyCodingStyle = options.keyCodingStyle ?? 'camelCase'
    this.logger = options.logger ?? silentLogger
    this.restoreFromCache()
  }

  get(key: string): ModelValue {
    const canonical = normalizeKey(key, this.keyCodingStyle)
    return new ModelValue(this.storage.get(canonical), canonical, `${this.name}.${canonical}`)
  }

  set(key: string, value: ModelInput): void {
    const canonical = normalizeKey(key, this.keyCodingStyle)
    const next = new Map(this.storage)
    next.set(canonical, resolveValue(value, `${this.name}.${canonical}`, this.childOptions()))
    this.storage = next
    this.afterWrite()
  }

  /**
   * Replaces every key with the contents of `json`. An array of objects is
   * stored under `"items"` instead and leaves the other keys alone.
   */
  map(json: JsonObject | readonly JsonObject[]): void {
    if (isJsonObject(json)) {
      this.storage = buildStorage(json, this.name, this.childOptions())
      this.logger.debug(`[${this.name}] Mapped ${this.storage.size} key(s).`)
    } else {
      const next = new Map(this.storage)
      next.set(ITEMS_KEY, {
        kind: 'array',
        items: json.map((item, index) =>
          resolveValue(item, `${this.name}.${ITEMS_KEY}[${index}]`, this.childOptions())
        )
      })
      this.storage = next
      this.logger.debug(`[${this.name}] Mapped ${json.length} item(s).`)
    }
    this.afterWrite()
  }

  allKeys(): Set<string> {
    return new Set(this.storage.keys())
  }

  hasKey(key: string): boolean {
    return this.storage.has(normalizeKey(key, this.keyCodingStyle))
  }

  get size(): number {
    return this.storage.size
  }

  /**
   * A read-only view of the current storage.
   */
  entries(): ReadonlyMap<string, StoredValue> {
    return this.storage
  }

  clear(): void {
    this.storage = new Map()
    this.clearCache()
    this.logger.debug(`[${this.name}] Cleared all values.`)
    this.notify()
  }

  at(path: string): ModelValue {
    const [head, ...rest] = parsePath(path)
    if (head === undefined) return new ModelValue(undefined, '', this.name)
    const first =
      'member' in head
        ? this.get(head.member)
        : new ModelValue(undefined, `[${head.index}]`, `${this.name}[${head.index}]`)
    return rest.reduce<ModelValue>(
      (value, segment) => ('index' in segment ? value.index(segment.index) : value.member(segment.member)),
      first
    )
  }

  /**
   * Property-style access: `model.fields.userId` is `model.get('userId')`.
   */
  get fields(): Readonly<Record<string, ModelValue>> {
    const target: Record<string, ModelValue> = {}
    return new Proxy(target, {
      get: (_, property) => (typeof property === 'string' ? this.get(property) : undefined),
      has: (_, property) => typeof property === 'string' && this.hasKey(property),
      ownKeys: () => [...this.storage.keys()],
      getOwnPropertyDescriptor: (_, property) =>
        typeof property === 'string' && this.hasKey(property)
          ? { value: this.get(property), enumerable: true, configurable: true, writable: false }
          : undefined
    })
  }

  /**
   * Subscribe to writes on this model. Returns the unsubscribe function.
   */
  onChange(listener: ModelListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  toJSON(): JsonObject {
    const json: JsonObject = {}
    for (const [key, value] of this.storage) {
      Object.defineProperty(json, key, {
        value: storedToJson(value),
        enumerable: true,
        configurable: true,
        writable: true
      })
    }
    return json
  }

  /** Evicts this model's cache entry without touching its values. */
  clearCache(): void {
    this.cache?.clear(this.name)
  }

  private childOptions(): ResolveOptions {
    return { keyCodingStyle: this.keyCodingStyle, logger: this.logger }
  }

  private afterWrite(): void {
    this.cache?.persist(this.storage, this.name)
    this.notify()
  }

  /**
   * Runs listeners. A write made from inside a listener queues another round
   * instead of recursing.
   */
  private notify(): void {
    this.notifyPending = true
    if (this.notifying) return

    this.notifying = true
    try {
      while (this.notifyPending) {
        this.notifyPending = false
        for (const listener of [...this.listeners]) {
          try {
            listener(this)
          } catch (error) {
            this.logger.error(`[${this.name}] Change listener failed.`, error)
          }
        }
      }
    } finally {
      this.notifying = false
    }
  }

  private restoreFromCache(): void {
    const restored: CacheEntry | undefined = this.cache?.restore(this.name)
    if (!restored) return

    const storage = new Map<string, StoredValue>()
    for (const [key, value] of Object.entries(restored)) {
      const canonical = normalizeKey(key, this.keyCodingStyle)
      storage.set(canonical, resolveValue(value, `${this.name}.${canonical}`, this.childOptions()))
    }
    this.storage = storage
    this.logger.debug(`[${this.name}] Restored from cache.`)
  }
}

// =============================================================================
// MODEL REGISTRY
// =============================================================================

/**
 * Name → model map with creation on first access.
 *
 * Lookup and insertion happen in one synchronous call, so two callers asking
 * for the same unseen name always share one instance.
 */
class ModelRegistry {
  private readonly instances = new Map<string, ModelInstance>()

  constructor(
    private readonly factory: (name: string) => ModelInstance,
    private readonly cache?: CacheManager,
    private readonly logger: Logger = silentLogger
  ) {}

  instanceFor(name: string): ModelInstance {
    const existing = this.instances.get(name)
    if (existing) return existing

    const instance = this.factory(name)
    this.instances.set(name, instance)
    this.logger.debug(`Model instance created: ${name}`)
    return instance
  }

  has(name: string): boolean {
    return this.instances.has(name)
  }

  remove(name: string): void {
    this.cache?.clear(name)
    this.instances.delete(name)
    this.logger.debug(`Model instance removed: ${name}`)
  }

  removeAll(): void {
    for (const name of this.instances.keys()) {
      this.cache?.clear(name)
    }
    this.instances.clear()
    this.logger.info('All model instances removed.')
  }

  names(): Set<string> {
    return new Set(this.instances.keys())
  }
}

// =============================================================================
// MODEL STORE
// =============================================================================

/**
 * The context object owning configuration, logger, cache and registry.
 * Create one per process (or per test) and pass it where models are needed.
 */
interface ModelStore {
  readonly configuration: ModelConfiguration
  readonly logger: Logger
  readonly cache: CacheManager
  readonly registry: ModelRegistry
  /** `store.models.login` is `store.model('login')`. */
  readonly models: Readonly<Record<string, ModelInstance>>
  model(name: string): ModelInstance
  removeModel(name: string): void
  removeAllModels(): void
  modelNames(): Set<string>
  /** Removes every cache entry under the library prefix. */
  clearCache(): void
  /** Drops every model without touching the cache. */
  cleanup(): void
}

function createModelStore(options: ModelOptions = {}): ModelStore {
  const configuration = resolveConfiguration(options)
  const logger = createLogger(configuration.logLevel)

  // Session-lifetime entries never outlive the process that wrote them
  const backend =
    configuration.cachePolicy.kind === 'untilProcessExit' ? new MemoryCacheStorage() : configuration.storage

  const cache = new CacheManager(configuration.cachePolicy, backend, logger, {
    defaultTTLSeconds: configuration.defaultTTLSeconds
  })

  const factory = (name: string) =>
    new ModelInstance(name, { cache, keyCodingStyle: configuration.keyCodingStyle, logger })

  let registry = new ModelRegistry(factory, cache, logger)

  const modelsTarget: Record<string, ModelInstance> = {}
  const models = new Proxy(modelsTarget, {
    get: (_, property) => (typeof property === 'string' ? registry.instanceFor(property) : undefined),
    has: (_, property) => typeof property === 'string' && registry.has(property)
  })

  logger.info(`Store configured (cache policy: ${configuration.cachePolicy.kind}).`)

  return {
    configuration,
    logger,
    cache,
    get registry() {
      return registry
    },
    models,
    model: name => registry.instanceFor(name),
    removeModel: name => registry.remove(name),
    removeAllModels: () => registry.removeAll(),
    modelNames: () => registry.names(),
    clearCache: () => cache.clearAll(),
    cleanup: () => {
      registry = new ModelRegistry(factory, cache, logger)
    }
  }
}

// =============================================================================
// EXPORTS - PUBLIC API
// =============================================================================

export * from './cache'
export * from './json'
export * from './logger'

export {
  coerce,
  normalizeKey,
  resolveValue,
  buildStorage,
  parsePath,
  storedValuesEqual,
  storedToJson,
  resolveConfiguration,
  createModelStore,
  ModelValue,
  ModelInstance,
  ModelRegistry,
  ITEMS_KEY
}

export type {
  StoredValue,
  StoredKind,
  ModelInput,
  KeyCodingStyle,
  ModelConfiguration,
  ModelOptions,
  ResolveOptions,
  PathSegment,
  ModelListener,
  ModelInstanceOptions,
  ModelStore
}
