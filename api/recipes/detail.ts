import type { Request, Response } from 'express'
import { recipeUpdateSchema } from '@application/recipes/recipeSchemas.ts'
import { parseInput } from '@application/validation/parseInput.ts'
import {
  deleteRecipe,
  getRecipeById,
  getRecipeDetails,
  updateRecipe,
} from '@infrastructure/db/index.ts'
import { deleteImage, saveImage } from '@infrastructure/storage/mediaStorage.ts'
import { authenticate, requireUser } from '../_lib/auth.js'
import { methodNotAllowed, notFound, requestMethod } from '../_lib/errors.js'
import { readImage } from '../_lib/images.js'
import { idParam } from '../_lib/params.js'
import { assertCanModifyRecipe } from '../_lib/permissions.js'
import { assertReferencesExist } from '../_lib/recipePayload.js'
import { serializeRecipe } from '../_lib/serializers.js'

async function retrieve(req: Request, res: Response) {
  const viewer = await authenticate(req)
  const details = await getRecipeDetails(idParam(req), viewer?.id ?? null)
  if (!details) throw notFound()
  return res.json(serializeRecipe(details))
}

async function update(req: Request, res: Response) {
  const user = await requireUser(req)
  const recipe = await getRecipeById(idParam(req))
  if (!recipe) throw notFound()
  assertCanModifyRecipe(user, recipe)

  const fields = parseInput(recipeUpdateSchema, req.body)
  await assertReferencesExist(fields.tags, fields.ingredients)

  const image = readImage(req, 'image')
  const stored = image ? await saveImage('recipes/images', image) : undefined
  try {
    await updateRecipe(recipe.id, { ...fields, image: stored })
  } catch (err) {
    if (stored) await deleteImage(stored)
    throw err
  }
  if (stored) await deleteImage(recipe.image)

  const details = await getRecipeDetails(recipe.id, user.id)
  if (!details) throw notFound()
  return res.json(serializeRecipe(details))
}

async function destroy(req: Request, res: Response) {
  const user = await requireUser(req)
  const recipe = await getRecipeById(idParam(req))
  if (!recipe) throw notFound()
  assertCanModifyRecipe(user, recipe)

  await deleteRecipe(recipe.id)
  await deleteImage(recipe.image)
  return res.status(204).end()
}

export default async function handler(req: Request, res: Response) {
  switch (requestMethod(req)) {
    case 'GET':
      return retrieve(req, res)
    case 'PATCH':
      return update(req, res)
    case 'DELETE':
      return destroy(req, res)
    default:
      return methodNotAllowed(res, ['GET', 'PATCH', 'DELETE'])
  }
}
