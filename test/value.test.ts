import { describe, it, expect } from 'vitest'
import { ModelInstance, ModelValue } from '../src/index'

function sample(): ModelInstance {
  const login = new ModelInstance('login')
  login.map({
    name: 'Ada',
    count: 3,
    discount: null,
    tags: ['a', 'b'],
    profile: { city: 'Oslo' }
  })
  return login
}

describe('ModelValue', () => {
  describe('equality', () => {
    it('compares loosely through the string form', () => {
      const one = new ModelValue({ kind: 'int', value: 1 })

      expect(one.equals(new ModelValue({ kind: 'string', value: '1' }))).toBe(true)
      expect(one.equals('1')).toBe(true)
      expect(new ModelValue({ kind: 'int', value: 0 }).equals(new ModelValue({ kind: 'string', value: '' }))).toBe(false)
      expect(new ModelValue({ kind: 'null' }).equals(new ModelValue(undefined))).toBe(true)
    })

    it('compares structurally by kind and contents', () => {
      const one = new ModelValue({ kind: 'int', value: 1 })

      expect(one.structurallyEquals(new ModelValue({ kind: 'string', value: '1' }))).toBe(false)
      expect(one.structurallyEquals(new ModelValue({ kind: 'float', value: 1 }))).toBe(true)
      expect(new ModelValue({ kind: 'null' }).structurallyEquals(new ModelValue(undefined))).toBe(false)
    })

    it('compares nested models by contents, not by name', () => {
      const left = new ModelInstance('left')
      const right = new ModelInstance('right')
      left.map({ profile: { city: 'Oslo', tags: [1, 2] } })
      right.map({ profile: { city: 'Oslo', tags: [1, 2] } })

      expect(left.get('profile').structurallyEquals(right.get('profile'))).toBe(true)

      right.map({ profile: { city: 'Bergen', tags: [1, 2] } })
      expect(left.get('profile').structurallyEquals(right.get('profile'))).toBe(false)
    })
  })

  describe('asModel', () => {
    it('returns a detached sentinel for non-model values', () => {
      const login = sample()
      const sentinel = login.get('name').asModel()

      expect(sentinel.name).toBe('login.name_empty')
      expect(sentinel.size).toBe(0)

      sentinel.set('x', 1)
      expect(login.hasKey('x')).toBe(false)
      expect(login.get('name').string).toBe('Ada')
    })

    it('names the sentinel of an absent value after its path', () => {
      expect(sample().get('missing').asModel().name).toBe('login.missing_empty')
    })

    it('returns the nested model itself', () => {
      const login = sample()
      expect(login.get('profile').isModel).toBe(true)
      expect(login.get('profile').asModel()).toBe(login.get('profile').asModel())
    })
  })

  describe('arrays', () => {
    it('is empty for non-array values', () => {
      const login = sample()
      expect(login.get('name').isArray).toBe(false)
      expect(login.get('name').array()).toEqual([])
      expect(login.get('name').index(0).exists).toBe(false)
    })

    it('carries element paths', () => {
      const tags = sample().get('tags').array()
      expect(tags.map(tag => tag.string)).toEqual(['a', 'b'])
      expect(tags.map(tag => tag.path)).toEqual(['login.tags[0]', 'login.tags[1]'])
      expect(tags[1]?.key).toBe('tags[1]')
    })
  })

  describe('fields', () => {
    it('forwards into nested models', () => {
      expect(sample().get('profile').fields.city?.string).toBe('Oslo')
    })

    it('yields absent values on primitives', () => {
      expect(sample().get('name').fields.anything?.exists).toBe(false)
    })
  })

  describe('output', () => {
    it('describes present and absent values', () => {
      const login = sample()
      expect(login.get('count').describe()).toBe('ModelValue(int) [login.count] → "3"')
      expect(login.get('missing').describe()).toBe('ModelValue(absent) [login.missing]')
      expect(login.get('discount').describe()).toBe('ModelValue(null) [login.discount] → ""')
    })

    it('interpolates as the string form', () => {
      expect(`${sample().get('count')} items`).toBe('3 items')
    })

    it('serializes back to JSON', () => {
      const login = sample()
      expect(login.get('tags').toJSON()).toEqual(['a', 'b'])
      expect(login.get('profile').toJSON()).toEqual({ city: 'Oslo' })
      expect(login.get('missing').toJSON()).toBeUndefined()
      expect(JSON.stringify({ count: login.get('count') })).toBe('{"count":3}')
    })
  })
})
