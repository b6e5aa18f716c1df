import type { Request, Response } from 'express'
import { ValidationError } from '@application/validation/ValidationError.ts'
import { getRecipeById } from '@infrastructure/db/index.ts'
import { requireUser } from './auth.js'
import { methodNotAllowed, notFound } from './errors.js'
import { idParam } from './params.js'
import { serializeShortRecipe } from './serializers.js'

export interface RecipeList {
  add: (userId: number, recipeId: number) => Promise<boolean>
  remove: (userId: number, recipeId: number) => Promise<boolean>
  alreadyAdded: string
  notAdded: string
}

/**
 * POST adds the recipe to the user's list, DELETE removes it.
 * Adding twice or removing something absent is a 400.
 */
export async function handleRecipeListAction(req: Request, res: Response, list: RecipeList) {
  if (req.method !== 'POST' && req.method !== 'DELETE') {
    return methodNotAllowed(res, ['POST', 'DELETE'])
  }

  const user = await requireUser(req)
  const recipe = await getRecipeById(idParam(req))
  if (!recipe) throw notFound()

  if (req.method === 'POST') {
    if (!(await list.add(user.id, recipe.id))) throw ValidationError.of('recipe', list.alreadyAdded)
    return res.status(201).json(serializeShortRecipe(recipe))
  }

  if (!(await list.remove(user.id, recipe.id))) throw ValidationError.of('recipe', list.notAdded)
  return res.status(204).end()
}
