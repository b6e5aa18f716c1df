import { z } from 'zod'
import {
  BLANK,
  NOT_A_LIST,
  NOT_A_STRING,
  NOT_AN_INTEGER,
  REQUIRED,
  maxLength,
  maxValue,
  minValue,
} from './messages.ts'

// Multipart bodies deliver every field as a string; these preprocessors let
// the same schemas accept numbers and lists from either JSON or form data.

function coerceInteger(value: unknown): unknown {
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) return Number(value)
  return value
}

function parseJsonList(value: unknown): unknown {
  if (typeof value !== 'string') return value
  try {
    return JSON.parse(value)
  } catch {
    return value
  }
}

export function text(max?: number) {
  const base = z
    .string({ required_error: REQUIRED, invalid_type_error: NOT_A_STRING })
    .trim()
    .min(1, BLANK)
  return max === undefined ? base : base.max(max, maxLength(max))
}

interface IntegerOptions {
  min?: number
  max?: number
  minMessage?: string
  maxMessage?: string
}

export function integer({ min, max, minMessage, maxMessage }: IntegerOptions = {}) {
  let base = z.number({ required_error: REQUIRED, invalid_type_error: NOT_AN_INTEGER }).int(NOT_AN_INTEGER)
  if (min !== undefined) base = base.min(min, minMessage ?? minValue(min))
  if (max !== undefined) base = base.max(max, maxMessage ?? maxValue(max))
  return z.preprocess(coerceInteger, base)
}

export function list<T extends z.ZodTypeAny>(item: T) {
  return z.preprocess(
    parseJsonList,
    z.array(item, { required_error: REQUIRED, invalid_type_error: NOT_A_LIST }),
  )
}

export function hasDuplicates(values: readonly unknown[]): boolean {
  return new Set(values).size !== values.length
}
