export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Record<string, unknown> ? DeepPartial<T[K]> : T[K]
}

/**
 * Copy of `base` with `overrides` laid over it. Plain objects merge key by
 * key; any other defined value replaces what was there.
 */
export function withOverrides<T extends object>(base: T, overrides?: DeepPartial<T>): T {
  if (overrides === undefined) return base

  return merge(base, overrides) as T
}

function merge(base: object, overrides: object): Record<string, unknown> {
  const merged: Record<string, unknown> = Object.fromEntries(Object.entries(base))

  for (const [key, value] of Object.entries(overrides)) {
    const next: unknown = value
    const current = merged[key]

    if (next === undefined) continue

    merged[key] = isPlainObject(current) && isPlainObject(next) ? merge(current, next) : next
  }

  return merged
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false

  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}
