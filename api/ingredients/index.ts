import type { Request, Response } from 'express'
import { ingredientSchema } from '@application/catalog/catalogSchemas.ts'
import { parseInput } from '@application/validation/parseInput.ts'
import { queryString } from '@application/validation/queryParams.ts'
import { createIngredient, listIngredients } from '@infrastructure/db/index.ts'
import { methodNotAllowed, requestMethod } from '../_lib/errors.js'
import { requireAdminOrReadOnly } from '../_lib/permissions.js'
import { serializeIngredient } from '../_lib/serializers.js'
import { assertIngredientIsUnique } from './unique.js'

export default async function handler(req: Request, res: Response) {
  const method = requestMethod(req)
  if (method !== 'GET' && method !== 'POST') return methodNotAllowed(res, ['GET', 'POST'])
  await requireAdminOrReadOnly(req)

  if (method === 'GET') {
    const prefix = queryString(req.query, 'name')?.trim() || null
    const ingredients = await listIngredients(prefix)
    return res.json(ingredients.map(serializeIngredient))
  }

  const input = parseInput(ingredientSchema, req.body)
  await assertIngredientIsUnique(input.name, input.measurementUnit)
  return res.status(201).json(serializeIngredient(await createIngredient(input)))
}
