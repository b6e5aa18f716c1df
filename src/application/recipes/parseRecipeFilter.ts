import type { RecipeFilter } from '@domain/models/Recipe.ts'
import {
  queryBoolean,
  queryInteger,
  queryList,
  queryString,
  type QueryParams,
} from '@application/validation/queryParams.ts'

export function parseRecipeFilter(query: QueryParams): RecipeFilter {
  const search = queryString(query, 'search')?.trim()
  return {
    authorId: queryInteger(query, 'author'),
    tagSlugs: [...new Set(queryList(query, 'tags').map((s) => s.trim()).filter(Boolean))],
    isFavorited: queryBoolean(query, 'is_favorited'),
    isInShoppingCart: queryBoolean(query, 'is_in_shopping_cart'),
    search: search ? search : null,
  }
}
