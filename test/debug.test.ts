import { describe, it, expect, vi } from 'vitest'
import { CachePolicy, ModelInstance, createModelStore } from '../src/index'
import { describeModel, printAll, printModel, snapshot } from '../src/debug'

describe('debug helpers', () => {
  it('snapshots every key as a string', () => {
    const model = new ModelInstance('login')
    model.map({ user_id: 42, active: true, profile: { a: 1 }, tags: ['x'], none: null })

    expect(snapshot(model)).toEqual({ userId: '42', active: 'true', profile: '', tags: '', none: '' })
  })

  it('describes keys in sorted order with their kinds', () => {
    const model = new ModelInstance('login')
    model.map({ b: 1, a: 'x', c: { d: 1 } })

    const lines = describeModel(model).split('\n')
    expect(lines).toHaveLength(5)
    expect(lines[0]).toBe('┌─── Looseleaf Debug: login ───')
    expect(lines.slice(1, 4)).toEqual(['│  a: x  (String)', '│  b: 1  (Int)', '│  c:   (NestedModel)'])
    expect(lines[4]?.startsWith('└')).toBe(true)
  })

  it('marks empty models', () => {
    const lines = describeModel(new ModelInstance('empty')).split('\n')
    expect(lines[1]).toBe('│  (empty, no values mapped yet)')
  })

  it('prints to the given sink', () => {
    const sink = { log: vi.fn() }
    const model = new ModelInstance('login')
    printModel(model, sink)
    expect(sink.log).toHaveBeenCalledWith(describeModel(model))
  })

  it('prints every registered model', () => {
    const store = createModelStore({ cachePolicy: CachePolicy.noCache })
    store.model('a')
    store.model('b')
    const sink = { log: vi.fn() }

    printAll(store, sink)

    expect(sink.log).toHaveBeenCalledTimes(3)
    expect(sink.log).toHaveBeenNthCalledWith(1, '[Looseleaf] 2 model(s) registered: a, b')
  })
})
