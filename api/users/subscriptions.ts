import type { Request, Response } from 'express'
import { listFollowedAuthors } from '@infrastructure/db/index.ts'
import { requireUser } from '../_lib/auth.js'
import { methodNotAllowed, requestMethod } from '../_lib/errors.js'
import { paginate, parsePageRequest } from '../_lib/pagination.js'
import { serializeSubscribedAuthor } from '../_lib/serializers.js'
import { recipesLimit, toSubscribedAuthor } from '../_lib/subscribedAuthors.js'

export default async function handler(req: Request, res: Response) {
  if (requestMethod(req) !== 'GET') return methodNotAllowed(res, ['GET'])

  const user = await requireUser(req)
  const pageRequest = parsePageRequest(req.query)
  const limit = recipesLimit(req)

  const page = await listFollowedAuthors(user.id, pageRequest)
  const authors = await Promise.all(page.items.map((author) => toSubscribedAuthor(author, limit)))

  return res.json(
    paginate(req, pageRequest, { count: page.count, items: authors }, serializeSubscribedAuthor),
  )
}
