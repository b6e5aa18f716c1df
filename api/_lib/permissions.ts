import type { Request } from 'express'
import type { Recipe } from '@domain/models/Recipe.ts'
import type { User } from '@domain/models/User.ts'
import { authenticate } from './auth.js'
import { HttpError, METHOD_NOT_ALLOWED, PERMISSION_DENIED } from './errors.js'

const SAFE_METHODS = ['GET', 'HEAD', 'OPTIONS']

export function isSafeMethod(method: string): boolean {
  return SAFE_METHODS.includes(method)
}

/** Reads are open; writes are for staff, and everyone else is told the method is not allowed. */
export async function requireAdminOrReadOnly(req: Request): Promise<User | null> {
  const user = await authenticate(req)
  if (isSafeMethod(req.method)) return user
  if (!user?.isStaff) throw new HttpError(405, METHOD_NOT_ALLOWED)
  return user
}

export function canModifyRecipe(user: User, recipe: Recipe): boolean {
  return user.isStaff || recipe.authorId === user.id
}

export function assertCanModifyRecipe(user: User, recipe: Recipe): void {
  if (!canModifyRecipe(user, recipe)) throw new HttpError(403, PERMISSION_DENIED)
}
