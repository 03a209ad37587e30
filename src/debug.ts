/**
 * Development helpers for inspecting live models.
 */

import type { ModelInstance, ModelStore, StoredKind } from './index'

const KIND_LABELS: Record<StoredKind | 'absent', string> = {
  absent: 'absent',
  null: 'null',
  bool: 'Bool',
  int: 'Int',
  float: 'Float',
  string: 'String',
  model: 'NestedModel',
  array: 'Array'
}

/**
 * Key → string-coerced value. Handy for assertions.
 */
export function snapshot(model: ModelInstance): Record<string, string> {
  return Object.fromEntries([...model.allKeys()].map(key => [key, model.get(key).string]))
}

export function describeModel(model: ModelInstance): string {
  const lines = [`┌─── Looseleaf Debug: ${model.name} ───`]
  const keys = [...model.allKeys()].sort()
  if (keys.length === 0) {
    lines.push('│  (empty, no values mapped yet)')
  }
  for (const key of keys) {
    const value = model.get(key)
    lines.push(`│  ${key}: ${value.string}  (${KIND_LABELS[value.kind]})`)
  }
  lines.push('└──────────────────────────────────')
  return lines.join('\n')
}

export function printModel(model: ModelInstance, sink: Pick<Console, 'log'> = console): void {
  sink.log(describeModel(model))
}

export function printAll(store: ModelStore, sink: Pick<Console, 'log'> = console): void {
  const names = [...store.modelNames()]
  sink.log(`[Looseleaf] ${names.length} model(s) registered: ${names.join(', ')}`)
  for (const name of names) {
    printModel(store.model(name), sink)
  }
}
