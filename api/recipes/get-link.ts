import type { Request, Response } from 'express'
import { buildShortLink } from '@application/share/shortLink.ts'
import { config } from '@infrastructure/config.ts'
import { getRecipeById } from '@infrastructure/db/index.ts'
import { methodNotAllowed, notFound, requestMethod } from '../_lib/errors.js'
import { idParam } from '../_lib/params.js'

export default async function handler(req: Request, res: Response) {
  if (requestMethod(req) !== 'GET') return methodNotAllowed(res, ['GET'])

  const recipe = await getRecipeById(idParam(req))
  if (!recipe) throw notFound()
  return res.json({ 'short-link': buildShortLink(config.publicUrl, recipe.id) })
}
