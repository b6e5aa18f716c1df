import type { Request, Response } from 'express'
import { getProfile } from '@infrastructure/db/index.ts'
import { authenticate } from '../_lib/auth.js'
import { methodNotAllowed, notFound, requestMethod } from '../_lib/errors.js'
import { idParam } from '../_lib/params.js'
import { serializeUser } from '../_lib/serializers.js'

export default async function handler(req: Request, res: Response) {
  if (requestMethod(req) !== 'GET') return methodNotAllowed(res, ['GET'])

  const viewer = await authenticate(req)
  const profile = await getProfile(idParam(req), viewer?.id ?? null)
  if (!profile) throw notFound()
  return res.json(serializeUser(profile))
}
