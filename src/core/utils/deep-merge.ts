export type PlainObject = Record<string, unknown>

export function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Deep merge two objects immutably. Arrays and scalars from `source` replace
 * the value in `target`; `undefined` entries in `source` are skipped.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target }

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue

    const current = result[key]
    if (isPlainObject(value)) {
      result[key] = deepMerge(isPlainObject(current) ? current : {}, value)
    } else {
      result[key] = value
    }
  }

  return result
}

/**
 * Sets a nested value using dot notation, creating intermediate objects
 */
export function setNestedValue(obj: PlainObject, path: string, value: unknown): void {
  const keys = path.split('.')
  const finalKey = keys.pop()
  if (!finalKey) return

  let current = obj
  for (const key of keys) {
    const next = current[key]
    if (isPlainObject(next)) {
      current = next
    } else {
      const created: PlainObject = {}
      current[key] = created
      current = created
    }
  }
  current[finalKey] = value
}
