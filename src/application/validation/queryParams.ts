import { ValidationError } from './ValidationError.ts'
import { NOT_AN_INTEGER } from './messages.ts'

export type QueryParams = Record<string, unknown>

/** Every string value given for `key`, in order (`?tags=a&tags=b` → ['a', 'b']). */
export function queryList(query: QueryParams, key: string): string[] {
  const value = query[key]
  if (typeof value === 'string') return [value]
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === 'string')
  return []
}

export function queryString(query: QueryParams, key: string): string | null {
  const values = queryList(query, key)
  return values.length > 0 ? values[values.length - 1] : null
}

export function queryBoolean(query: QueryParams, key: string): boolean {
  const value = queryString(query, key)
  return value !== null && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase())
}

/** Integer value of `key`, null when absent; anything else is a validation error. */
export function queryInteger(query: QueryParams, key: string): number | null {
  const value = queryString(query, key)
  if (value === null || value.trim() === '') return null
  if (!/^\s*-?\d+\s*$/.test(value)) throw ValidationError.of(key, NOT_AN_INTEGER)
  return Number(value)
}
