import type { Request, Response } from 'express'
import { addToShoppingCart, removeFromShoppingCart } from '@infrastructure/db/index.ts'
import { handleRecipeListAction } from '../_lib/recipeLists.js'

export const ALREADY_IN_CART = 'The recipe is already in the shopping cart.'
export const NOT_IN_CART = 'The recipe is not in the shopping cart.'

export default function handler(req: Request, res: Response) {
  return handleRecipeListAction(req, res, {
    add: addToShoppingCart,
    remove: removeFromShoppingCart,
    alreadyAdded: ALREADY_IN_CART,
    notAdded: NOT_IN_CART,
  })
}
