import type { Request, Response } from 'express'
import { ValidationError } from '@application/validation/ValidationError.ts'
import { getUserById, subscribe, unsubscribe } from '@infrastructure/db/index.ts'
import { requireUser } from '../_lib/auth.js'
import { methodNotAllowed, notFound } from '../_lib/errors.js'
import { idParam } from '../_lib/params.js'
import { serializeSubscribedAuthor } from '../_lib/serializers.js'
import { recipesLimit, toSubscribedAuthor } from '../_lib/subscribedAuthors.js'

export const SELF_SUBSCRIPTION = 'You cannot subscribe to yourself.'
export const ALREADY_SUBSCRIBED = 'You are already subscribed to this user.'
export const NOT_SUBSCRIBED = 'You are not subscribed to this user.'

export default async function handler(req: Request, res: Response) {
  if (req.method !== 'POST' && req.method !== 'DELETE') {
    return methodNotAllowed(res, ['POST', 'DELETE'])
  }

  const user = await requireUser(req)
  const author = await getUserById(idParam(req))
  if (!author) throw notFound()

  if (req.method === 'DELETE') {
    if (!(await unsubscribe(user.id, author.id))) throw ValidationError.of('subscribe', NOT_SUBSCRIBED)
    return res.status(204).end()
  }

  if (author.id === user.id) throw ValidationError.of('subscribe', SELF_SUBSCRIPTION)
  const limit = recipesLimit(req)
  if (!(await subscribe(user.id, author.id))) throw ValidationError.of('subscribe', ALREADY_SUBSCRIBED)

  return res.status(201).json(serializeSubscribedAuthor(await toSubscribedAuthor(author, limit)))
}
