import type { Request, Response } from 'express'
import type { Ingredient } from '@domain/models/Ingredient.ts'
import { ingredientPatchSchema, ingredientSchema } from '@application/catalog/catalogSchemas.ts'
import { parseInput } from '@application/validation/parseInput.ts'
import { deleteIngredient, getIngredientById, updateIngredient } from '@infrastructure/db/index.ts'
import { methodNotAllowed, notFound, requestMethod } from '../_lib/errors.js'
import { idParam } from '../_lib/params.js'
import { requireAdminOrReadOnly } from '../_lib/permissions.js'
import { serializeIngredient } from '../_lib/serializers.js'
import { assertIngredientIsUnique } from './unique.js'

const ALLOWED = ['GET', 'PUT', 'PATCH', 'DELETE']

export default async function handler(req: Request, res: Response) {
  const method = requestMethod(req)
  if (!ALLOWED.includes(method)) return methodNotAllowed(res, ALLOWED)
  await requireAdminOrReadOnly(req)

  const ingredient = await getIngredientById(idParam(req))
  if (!ingredient) throw notFound()

  if (method === 'GET') return res.json(serializeIngredient(ingredient))

  if (method === 'DELETE') {
    await deleteIngredient(ingredient.id)
    return res.status(204).end()
  }

  const patch =
    method === 'PUT'
      ? parseInput(ingredientSchema, req.body)
      : parseInput(ingredientPatchSchema, req.body)
  await assertIngredientIsUnique(
    patch.name ?? ingredient.name,
    patch.measurementUnit ?? ingredient.measurementUnit,
    ingredient.id,
  )
  const changes: Partial<Omit<Ingredient, 'id'>> = {}
  if (patch.name !== undefined) changes.name = patch.name
  if (patch.measurementUnit !== undefined) changes.measurementUnit = patch.measurementUnit

  const updated = await updateIngredient(ingredient.id, changes)
  if (!updated) throw notFound()
  return res.json(serializeIngredient(updated))
}
