import type { Request } from 'express'
import type { SubscribedAuthor } from '@domain/models/Subscription.ts'
import type { User } from '@domain/models/User.ts'
import { queryInteger } from '@application/validation/queryParams.ts'
import { ValidationError } from '@application/validation/ValidationError.ts'
import { minValue } from '@application/validation/messages.ts'
import { countRecipesByAuthor, listRecipesByAuthor, toProfile } from '@infrastructure/db/index.ts'

/** `?recipes_limit=` caps the recipe preview of each author; absent means all recipes. */
export function recipesLimit(req: Request): number | null {
  const limit = queryInteger(req.query, 'recipes_limit')
  if (limit === null) return null
  if (limit < 0) throw ValidationError.of('recipes_limit', minValue(0))
  return Math.min(limit, Number.MAX_SAFE_INTEGER)
}

export async function toSubscribedAuthor(author: User, limit: number | null): Promise<SubscribedAuthor> {
  return {
    ...toProfile(author, true),
    recipes: await listRecipesByAuthor(author.id, limit),
    recipesCount: await countRecipesByAuthor(author.id),
  }
}
