import type { Request, Response } from 'express'
import { loginSchema } from '@application/users/userSchemas.ts'
import { NON_FIELD_ERRORS, parseInput } from '@application/validation/parseInput.ts'
import { ValidationError } from '@application/validation/ValidationError.ts'
import { getOrCreateToken, getUserByEmail } from '@infrastructure/db/index.ts'
import { verifyPassword } from '@infrastructure/security/passwords.ts'
import { methodNotAllowed } from '../_lib/errors.js'

export const INVALID_CREDENTIALS = 'Unable to log in with provided credentials.'

export default async function handler(req: Request, res: Response) {
  if (req.method !== 'POST') return methodNotAllowed(res, ['POST'])

  const { email, password } = parseInput(loginSchema, req.body)
  const user = await getUserByEmail(email)
  if (!user || !(await verifyPassword(password, user.password))) {
    throw ValidationError.of(NON_FIELD_ERRORS, INVALID_CREDENTIALS)
  }

  const token = await getOrCreateToken(user.id)
  return res.status(200).json({ auth_token: token })
}
