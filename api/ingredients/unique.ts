import { NON_FIELD_ERRORS } from '@application/validation/parseInput.ts'
import { ValidationError } from '@application/validation/ValidationError.ts'
import { findIngredient } from '@infrastructure/db/index.ts'

export const INGREDIENT_TAKEN = 'An ingredient with this name and measurement unit already exists.'

export async function assertIngredientIsUnique(
  name: string,
  measurementUnit: string,
  excludeId: number | null = null,
): Promise<void> {
  if (await findIngredient(name, measurementUnit, excludeId)) {
    throw ValidationError.of(NON_FIELD_ERRORS, INGREDIENT_TAKEN)
  }
}
