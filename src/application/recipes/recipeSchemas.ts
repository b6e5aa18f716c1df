import { z } from 'zod'
import type { IngredientAmount } from '@domain/models/Recipe.ts'
import {
  MAX_AMOUNT,
  MAX_COOKING_TIME,
  MAX_RECIPE_NAME_LENGTH,
  MIN_AMOUNT,
  MIN_COOKING_TIME,
} from '@domain/constants/limits.ts'
import { hasDuplicates, integer, list, text } from '@application/validation/fields.ts'

export const NO_INGREDIENTS = 'Add at least one ingredient.'
export const DUPLICATE_INGREDIENTS = 'Ingredients must not repeat.'
export const NO_TAGS = 'Select at least one tag.'
export const DUPLICATE_TAGS = 'Tags must not repeat.'
export const COOKING_TIME_TOO_SHORT = `Cooking time must be at least ${MIN_COOKING_TIME} minute.`
export const AMOUNT_TOO_SMALL = `Ingredient amount must be at least ${MIN_AMOUNT}.`
export const AMOUNT_TOO_LARGE = `Ingredient amount must be at most ${MAX_AMOUNT}.`

const ingredientAmount = z.object({
  id: integer(),
  amount: integer({
    min: MIN_AMOUNT,
    max: MAX_AMOUNT,
    minMessage: AMOUNT_TOO_SMALL,
    maxMessage: AMOUNT_TOO_LARGE,
  }),
})

const ingredientList = list(ingredientAmount).superRefine((items, ctx) => {
  if (items.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: NO_INGREDIENTS })
  } else if (hasDuplicates(items.map((i) => i.id))) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: DUPLICATE_INGREDIENTS })
  }
})

const tagList = list(integer()).superRefine((ids, ctx) => {
  if (ids.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: NO_TAGS })
  } else if (hasDuplicates(ids)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: DUPLICATE_TAGS })
  }
})

const cookingTime = integer({
  min: MIN_COOKING_TIME,
  max: MAX_COOKING_TIME,
  minMessage: COOKING_TIME_TOO_SHORT,
})

export interface RecipeFields {
  name: string
  text: string
  cookingTime: number
  tags: number[]
  ingredients: IngredientAmount[]
}

export const recipeCreateSchema = z
  .object({
    name: text(MAX_RECIPE_NAME_LENGTH),
    text: text(),
    cooking_time: cookingTime,
    tags: tagList,
    ingredients: ingredientList,
  })
  .transform(
    (body): RecipeFields => ({
      name: body.name,
      text: body.text,
      cookingTime: body.cooking_time,
      tags: body.tags,
      ingredients: body.ingredients,
    }),
  )

/** PATCH still replaces the full tag and ingredient sets, so both stay required. */
export const recipeUpdateSchema = z
  .object({
    name: text(MAX_RECIPE_NAME_LENGTH).optional(),
    text: text().optional(),
    cooking_time: cookingTime.optional(),
    tags: tagList,
    ingredients: ingredientList,
  })
  .transform(
    (body): Partial<RecipeFields> & Pick<RecipeFields, 'tags' | 'ingredients'> => ({
      name: body.name,
      text: body.text,
      cookingTime: body.cooking_time,
      tags: body.tags,
      ingredients: body.ingredients,
    }),
  )
