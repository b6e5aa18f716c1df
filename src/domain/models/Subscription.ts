import type { Recipe } from './Recipe.ts'
import type { UserProfile } from './User.ts'

/** A followed author together with a preview of their recipes. */
export interface SubscribedAuthor extends UserProfile {
  recipes: Recipe[]
  recipesCount: number
}
