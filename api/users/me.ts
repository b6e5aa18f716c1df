import type { Request, Response } from 'express'
import { toProfile } from '@infrastructure/db/index.ts'
import { requireUser } from '../_lib/auth.js'
import { methodNotAllowed, requestMethod } from '../_lib/errors.js'
import { serializeUser } from '../_lib/serializers.js'

export default async function handler(req: Request, res: Response) {
  if (requestMethod(req) !== 'GET') return methodNotAllowed(res, ['GET'])

  const user = await requireUser(req)
  return res.json(serializeUser(toProfile(user, false)))
}
