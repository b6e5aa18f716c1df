import type { Request, Response } from 'express'
import { deleteToken } from '@infrastructure/db/index.ts'
import { requireUser } from '../_lib/auth.js'
import { methodNotAllowed } from '../_lib/errors.js'

export default async function handler(req: Request, res: Response) {
  if (req.method !== 'POST') return methodNotAllowed(res, ['POST'])

  const user = await requireUser(req)
  await deleteToken(user.id)
  return res.status(204).end()
}
