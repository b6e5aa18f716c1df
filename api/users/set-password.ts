import type { Request, Response } from 'express'
import { passwordProblems, setPasswordSchema } from '@application/users/userSchemas.ts'
import { parseInput } from '@application/validation/parseInput.ts'
import { ValidationError } from '@application/validation/ValidationError.ts'
import { updatePassword } from '@infrastructure/db/index.ts'
import { hashPassword, verifyPassword } from '@infrastructure/security/passwords.ts'
import { requireUser } from '../_lib/auth.js'
import { methodNotAllowed } from '../_lib/errors.js'

export const WRONG_CURRENT_PASSWORD = 'Invalid password.'

export default async function handler(req: Request, res: Response) {
  if (req.method !== 'POST') return methodNotAllowed(res, ['POST'])

  const user = await requireUser(req)
  const body = parseInput(setPasswordSchema, req.body)

  if (!(await verifyPassword(body.current_password, user.password))) {
    throw ValidationError.of('current_password', WRONG_CURRENT_PASSWORD)
  }
  const problems = passwordProblems(body.new_password, user.username)
  if (problems.length > 0) throw new ValidationError({ new_password: problems })

  await updatePassword(user.id, await hashPassword(body.new_password))
  return res.status(204).end()
}
