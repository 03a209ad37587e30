// =============================================================================
// JSON VALUE TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null

/**
 * Any value a JSON decoder can produce.
 */
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject

export interface JsonObject {
  [key: string]: JsonValue
}

// =============================================================================
// GUARDS
// =============================================================================

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isJsonPrimitive(value: unknown): value is JsonPrimitive {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  )
}

/**
 * Array of objects, the other root shape a response body may take.
 */
export function isJsonObjectArray(value: unknown): value is JsonObject[] {
  return Array.isArray(value) && value.every(isJsonObject)
}

/**
 * Walks an arbitrary decoded value and confirms it only contains JSON shapes.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (isJsonPrimitive(value)) return true
  if (Array.isArray(value)) return value.every(isJsonValue)
  if (isJsonObject(value)) return Object.values(value).every(isJsonValue)
  return false
}
