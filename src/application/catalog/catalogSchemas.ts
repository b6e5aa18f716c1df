import { z } from 'zod'
import {
  MAX_INGREDIENT_NAME_LENGTH,
  MAX_MEASUREMENT_UNIT_LENGTH,
  MAX_TAG_NAME_LENGTH,
  MAX_TAG_SLUG_LENGTH,
} from '@domain/constants/limits.ts'
import { text } from '@application/validation/fields.ts'

export const INVALID_SLUG =
  'Enter a valid "slug" consisting of letters, numbers, underscores or hyphens.'

export const tagSchema = z.object({
  name: text(MAX_TAG_NAME_LENGTH),
  slug: text(MAX_TAG_SLUG_LENGTH).pipe(z.string().regex(/^[-a-zA-Z0-9_]+$/, INVALID_SLUG)),
})

export const tagPatchSchema = tagSchema.partial()

export const ingredientSchema = z
  .object({
    name: text(MAX_INGREDIENT_NAME_LENGTH),
    measurement_unit: text(MAX_MEASUREMENT_UNIT_LENGTH),
  })
  .transform((body) => ({ name: body.name, measurementUnit: body.measurement_unit }))

export const ingredientPatchSchema = z
  .object({
    name: text(MAX_INGREDIENT_NAME_LENGTH).optional(),
    measurement_unit: text(MAX_MEASUREMENT_UNIT_LENGTH).optional(),
  })
  .transform((body) => ({ name: body.name, measurementUnit: body.measurement_unit }))
