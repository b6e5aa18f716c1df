import type { Request, Response } from 'express'
import type { Recipe } from '@domain/models/Recipe.ts'
import { parseRecipeFilter } from '@application/recipes/parseRecipeFilter.ts'
import { recipeCreateSchema } from '@application/recipes/recipeSchemas.ts'
import { parseInput } from '@application/validation/parseInput.ts'
import { ValidationError } from '@application/validation/ValidationError.ts'
import { REQUIRED } from '@application/validation/messages.ts'
import { createRecipe, getRecipeDetails, listRecipes } from '@infrastructure/db/index.ts'
import { deleteImage, saveImage } from '@infrastructure/storage/mediaStorage.ts'
import { authenticate, requireUser } from '../_lib/auth.js'
import { methodNotAllowed, notFound, requestMethod } from '../_lib/errors.js'
import { readImage } from '../_lib/images.js'
import { paginate, parsePageRequest } from '../_lib/pagination.js'
import { assertReferencesExist } from '../_lib/recipePayload.js'
import { serializeRecipe } from '../_lib/serializers.js'

async function list(req: Request, res: Response) {
  const viewer = await authenticate(req)
  const filter = parseRecipeFilter(req.query)
  const pageRequest = parsePageRequest(req.query)
  const page = await listRecipes(filter, pageRequest, viewer?.id ?? null)
  return res.json(paginate(req, pageRequest, page, serializeRecipe))
}

async function create(req: Request, res: Response) {
  const user = await requireUser(req)
  const fields = parseInput(recipeCreateSchema, req.body)
  await assertReferencesExist(fields.tags, fields.ingredients)

  const image = readImage(req, 'image')
  if (!image) throw ValidationError.of('image', REQUIRED)

  const stored = await saveImage('recipes/images', image)
  let recipe: Recipe
  try {
    recipe = await createRecipe(user.id, { ...fields, image: stored })
  } catch (err) {
    await deleteImage(stored)
    throw err
  }

  const details = await getRecipeDetails(recipe.id, user.id)
  if (!details) throw notFound()
  return res.status(201).json(serializeRecipe(details))
}

export default async function handler(req: Request, res: Response) {
  const method = requestMethod(req)
  if (method === 'GET') return list(req, res)
  if (method === 'POST') return create(req, res)
  return methodNotAllowed(res, ['GET', 'POST'])
}
