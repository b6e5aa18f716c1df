import type { Tag } from './Tag.ts'
import type { UserProfile } from './User.ts'

export interface Recipe {
  id: number
  authorId: number
  name: string
  image: string
  text: string
  cookingTime: number
  pubDate: string
}

/** Ingredient line of a recipe: the ingredient itself plus the amount used. */
export interface RecipeIngredient {
  id: number
  name: string
  measurementUnit: string
  amount: number
}

export interface RecipeDetails extends Recipe {
  author: UserProfile
  tags: Tag[]
  ingredients: RecipeIngredient[]
  isFavorited: boolean
  isInShoppingCart: boolean
}

export interface IngredientAmount {
  id: number
  amount: number
}

export interface RecipeInput {
  name: string
  image: string
  text: string
  cookingTime: number
  tags: number[]
  ingredients: IngredientAmount[]
}

export type RecipeUpdate = Partial<Omit<RecipeInput, 'tags' | 'ingredients'>> &
  Pick<RecipeInput, 'tags' | 'ingredients'>

export interface RecipeFilter {
  authorId: number | null
  tagSlugs: string[]
  isFavorited: boolean
  isInShoppingCart: boolean
  search: string | null
}
