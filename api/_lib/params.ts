import type { Request } from 'express'
import { notFound } from './errors.js'

/** Numeric `:id` route parameter; anything else is treated as a missing object. */
export function idParam(req: Request, name = 'id'): number {
  const raw = req.params[name]
  if (!raw || !/^\d+$/.test(raw)) throw notFound()
  return Number(raw)
}

export function bodyObject(req: Request): Record<string, unknown> {
  const body: unknown = req.body
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return {}
  return Object.fromEntries(Object.entries(body))
}
