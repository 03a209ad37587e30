import { describe, it, expect, vi } from 'vitest'
import {
  CachePolicy,
  MemoryCacheStorage,
  ModelInstance,
  ModelRegistry,
  createLogger,
  createModelStore,
  resolveConfiguration
} from '../src/index'

describe('resolveConfiguration', () => {
  it('fills in the defaults', () => {
    const configuration = resolveConfiguration()

    expect(configuration.cachePolicy).toEqual({ kind: 'untilNextWrite' })
    expect(configuration.defaultTTLSeconds).toBe(3600)
    expect(configuration.keyCodingStyle).toBe('camelCase')
    expect(configuration.logLevel).toBe('warning')
    expect(configuration.requestTimeout).toBe(30)
    expect(configuration.commonHeaders).toEqual({})
    expect(configuration.storage).toBeInstanceOf(MemoryCacheStorage)
    expect(Object.isFrozen(configuration)).toBe(true)
  })

  it('copies common headers', () => {
    const headers = { 'X-App': 'tests' }
    const configuration = resolveConfiguration({ commonHeaders: headers })
    headers['X-App'] = 'changed'

    expect(configuration.commonHeaders).toEqual({ 'X-App': 'tests' })
  })
})

describe('ModelRegistry', () => {
  it('creates each model once', () => {
    const factory = vi.fn((name: string) => new ModelInstance(name))
    const registry = new ModelRegistry(factory)

    const first = registry.instanceFor('login')
    expect(registry.instanceFor('login')).toBe(first)
    expect(factory).toHaveBeenCalledTimes(1)
    expect(registry.has('login')).toBe(true)
    expect(registry.has('cart')).toBe(false)
  })

  it('removes one or all models', () => {
    const registry = new ModelRegistry(name => new ModelInstance(name))
    registry.instanceFor('a')
    registry.instanceFor('b')
    registry.instanceFor('c')

    registry.remove('b')
    expect(registry.names()).toEqual(new Set(['a', 'c']))

    registry.removeAll()
    expect(registry.names()).toEqual(new Set())
  })

  it('logs creation at debug level', () => {
    const sink = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() }
    const registry = new ModelRegistry(name => new ModelInstance(name), undefined, createLogger('debug', sink))

    registry.instanceFor('login')
    expect(sink.debug).toHaveBeenCalledWith('[Looseleaf] Model instance created: login')
  })
})

describe('createModelStore', () => {
  it('hands out one shared instance per name', () => {
    const store = createModelStore({ cachePolicy: CachePolicy.noCache })

    expect(store.model('login')).toBe(store.model('login'))
    expect(store.models.login).toBe(store.model('login'))
    expect('login' in store.models).toBe(true)
    expect('other' in store.models).toBe(false)
  })

  it('lists the models created so far', () => {
    const store = createModelStore({ cachePolicy: CachePolicy.noCache })
    store.model('login')
    store.model('cart')

    expect(store.modelNames()).toEqual(new Set(['login', 'cart']))
  })

  it('evicts the cache entry when a model is removed', () => {
    const storage = new MemoryCacheStorage()
    const store = createModelStore({ storage })
    const login = store.models.login
    login.map({ user_id: 1 })

    store.removeModel('login')

    expect(store.modelNames().has('login')).toBe(false)
    expect(storage.getItem('looseleaf.cache.login')).toBeUndefined()
    expect(store.models.login).not.toBe(login)
    expect(store.models.login.size).toBe(0)
  })

  it('removes every model and its cache entry', () => {
    const storage = new MemoryCacheStorage()
    const store = createModelStore({ storage })
    store.models.a.map({ x: 1 })
    store.models.b.map({ x: 2 })

    store.removeAllModels()

    expect(store.modelNames().size).toBe(0)
    expect(storage.keys()).toEqual([])
  })

  it('drops models but keeps the cache on cleanup', () => {
    const storage = new MemoryCacheStorage()
    const store = createModelStore({ storage })
    const before = store.models.a
    before.map({ x: 1 })

    store.cleanup()

    expect(store.modelNames().size).toBe(0)
    expect(store.models.a).not.toBe(before)
    expect(store.models.a.get('x').int).toBe(1)
  })

  it('passes the key coding style to its models', () => {
    const store = createModelStore({ cachePolicy: CachePolicy.noCache, keyCodingStyle: 'none' })
    store.models.raw.map({ user_id: 1, nested: { first_name: 'Ada' } })

    expect(store.models.raw.get('user_id').int).toBe(1)
    expect(store.models.raw.at('nested.first_name').string).toBe('Ada')
  })

  it('logs through the configured level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})

    const store = createModelStore({ cachePolicy: CachePolicy.noCache, logLevel: 'debug' })
    store.models.login.map({ a: 1, b: 2 })

    expect(info).toHaveBeenCalledWith('[Looseleaf] Store configured (cache policy: noCache).')
    expect(debug).toHaveBeenCalledWith('[Looseleaf] Model instance created: login')
    expect(debug).toHaveBeenCalledWith('[Looseleaf] [login] Mapped 2 key(s).')
  })

  it('stays quiet at the default level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})

    createModelStore().models.login.map({ a: 1 })

    expect(info).not.toHaveBeenCalled()
    expect(debug).not.toHaveBeenCalled()
  })
})
