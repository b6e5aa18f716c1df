import type { Request, Response } from 'express'
import { addFavorite, removeFavorite } from '@infrastructure/db/index.ts'
import { handleRecipeListAction } from '../_lib/recipeLists.js'

export const ALREADY_FAVORITED = 'The recipe is already in favorites.'
export const NOT_FAVORITED = 'The recipe is not in favorites.'

export default function handler(req: Request, res: Response) {
  return handleRecipeListAction(req, res, {
    add: addFavorite,
    remove: removeFavorite,
    alreadyAdded: ALREADY_FAVORITED,
    notAdded: NOT_FAVORITED,
  })
}
