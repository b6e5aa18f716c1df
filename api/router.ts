import { Router, type RequestHandler } from 'express'
import { type Handler, withErrors } from './_lib/errors.js'
import { upload } from './_lib/images.js'
import tokenLogin from './auth/token-login.js'
import tokenLogout from './auth/token-logout.js'
import ingredientDetail from './ingredients/detail.js'
import ingredients from './ingredients/index.js'
import recipeDetail from './recipes/detail.js'
import downloadShoppingCart from './recipes/download-shopping-cart.js'
import favorite from './recipes/favorite.js'
import getLink from './recipes/get-link.js'
import recipes from './recipes/index.js'
import shoppingCart from './recipes/shopping-cart.js'
import tagDetail from './tags/detail.js'
import tags from './tags/index.js'
import avatar from './users/avatar.js'
import userDetail from './users/detail.js'
import users from './users/index.js'
import me from './users/me.js'
import setPassword from './users/set-password.js'
import subscribe from './users/subscribe.js'
import subscriptions from './users/subscriptions.js'

const ID = ':id(\\d+)'

/** Every REST endpoint, mounted under `/api`. Trailing slashes are optional. */
export function createApiRouter(): Router {
  const router = Router()
  const route = (path: string, handler: Handler, ...middleware: RequestHandler[]) => {
    router.all(path, ...middleware, withErrors(handler))
  }

  route('/auth/token/login/', tokenLogin)
  route('/auth/token/logout/', tokenLogout)

  route('/users/', users)
  route('/users/me/', me)
  route('/users/me/avatar/', avatar, upload.single('avatar'))
  route('/users/set_password/', setPassword)
  route('/users/subscriptions/', subscriptions)
  route(`/users/${ID}/`, userDetail)
  route(`/users/${ID}/subscribe/`, subscribe)

  route('/tags/', tags)
  route(`/tags/${ID}/`, tagDetail)

  route('/ingredients/', ingredients)
  route(`/ingredients/${ID}/`, ingredientDetail)

  route('/recipes/', recipes, upload.single('image'))
  route('/recipes/download_shopping_cart/', downloadShoppingCart)
  route(`/recipes/${ID}/`, recipeDetail, upload.single('image'))
  route(`/recipes/${ID}/favorite/`, favorite)
  route(`/recipes/${ID}/shopping_cart/`, shoppingCart)
  route(`/recipes/${ID}/get-link/`, getLink)

  return router
}
