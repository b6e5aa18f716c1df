import type { FieldErrors } from '@application/validation/ValidationError.ts'
import { ValidationError } from '@application/validation/ValidationError.ts'
import type { IngredientAmount } from '@domain/models/Recipe.ts'
import { getIngredientsByIds, getTagsByIds } from '@infrastructure/db/index.ts'

export function unknownTagMessage(id: number): string {
  return `Invalid pk "${id}" - object does not exist.`
}

export function unknownIngredientMessage(id: number): string {
  return `Ingredient with id ${id} does not exist.`
}

/** Every referenced tag and ingredient must exist before a recipe is written. */
export async function assertReferencesExist(
  tagIds: number[],
  lines: IngredientAmount[],
): Promise<void> {
  const errors: FieldErrors = {}

  const knownTags = new Set((await getTagsByIds(tagIds)).map((t) => t.id))
  const missingTags = tagIds.filter((id) => !knownTags.has(id))
  if (missingTags.length > 0) errors.tags = missingTags.map(unknownTagMessage)

  const ingredientIds = lines.map((line) => line.id)
  const knownIngredients = new Set((await getIngredientsByIds(ingredientIds)).map((i) => i.id))
  const missingIngredients = ingredientIds.filter((id) => !knownIngredients.has(id))
  if (missingIngredients.length > 0) errors.ingredients = missingIngredients.map(unknownIngredientMessage)

  if (Object.keys(errors).length > 0) throw new ValidationError(errors)
}
