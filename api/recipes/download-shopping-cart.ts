import type { Request, Response } from 'express'
import { formatShoppingList, SHOPPING_LIST_FILENAME } from '@application/shopping/formatShoppingList.ts'
import { getShoppingCartTotals } from '@infrastructure/db/index.ts'
import { requireUser } from '../_lib/auth.js'
import { HttpError, methodNotAllowed, requestMethod } from '../_lib/errors.js'

export const EMPTY_SHOPPING_CART = 'Your shopping cart is empty.'

export default async function handler(req: Request, res: Response) {
  if (requestMethod(req) !== 'GET') return methodNotAllowed(res, ['GET'])

  const user = await requireUser(req)
  const text = formatShoppingList(await getShoppingCartTotals(user.id))
  if (text === null) throw new HttpError(400, EMPTY_SHOPPING_CART)

  res.setHeader('Content-Type', 'text/plain; charset=utf-8')
  res.setHeader('Content-Disposition', `attachment; filename="${SHOPPING_LIST_FILENAME}"`)
  return res.status(200).send(text)
}
