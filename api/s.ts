import type { Request, Response } from 'express'
import { recipePagePath } from '@application/share/shortLink.ts'
import { getRecipeById } from '@infrastructure/db/index.ts'
import { methodNotAllowed, notFound, requestMethod } from './_lib/errors.js'
import { idParam } from './_lib/params.js'

/** Resolves `/s/<id>` short links to the recipe page. */
export default async function handler(req: Request, res: Response) {
  if (requestMethod(req) !== 'GET') return methodNotAllowed(res, ['GET'])

  const recipe = await getRecipeById(idParam(req))
  if (!recipe) throw notFound()
  res.setHeader('Cache-Control', 'public, max-age=3600')
  return res.redirect(302, recipePagePath(recipe.id))
}
