import type { Request } from 'express'
import type { User } from '@domain/models/User.ts'
import { getUserByToken } from '@infrastructure/db/index.ts'
import { HttpError, NOT_AUTHENTICATED } from './errors.js'

const TOKEN_KEYWORD = 'Token'

export const INVALID_TOKEN = 'Invalid token.'
export const INVALID_TOKEN_HEADER = 'Invalid token header.'

/**
 * Resolve the `Authorization: Token <key>` header.
 * No header means an anonymous request; a bad one is always rejected.
 */
export async function authenticate(req: Request): Promise<User | null> {
  const header = req.headers.authorization
  if (!header) return null

  const [keyword, key, ...rest] = header.trim().split(/\s+/)
  if (keyword !== TOKEN_KEYWORD || !key || rest.length > 0) {
    throw new HttpError(401, INVALID_TOKEN_HEADER)
  }

  const user = await getUserByToken(key)
  if (!user) throw new HttpError(401, INVALID_TOKEN)
  return user
}

export async function requireUser(req: Request): Promise<User> {
  const user = await authenticate(req)
  if (!user) throw new HttpError(401, NOT_AUTHENTICATED)
  return user
}
