import type { Request, Response } from 'express'
import type { User } from '@domain/models/User.ts'
import { registrationSchema } from '@application/users/userSchemas.ts'
import { parseInput } from '@application/validation/parseInput.ts'
import { ValidationError, type FieldErrors } from '@application/validation/ValidationError.ts'
import {
  createUser,
  getFollowedIds,
  getUserByEmail,
  getUserByUsername,
  listUsers,
  toProfile,
  uniqueViolationColumn,
} from '@infrastructure/db/index.ts'
import { hashPassword } from '@infrastructure/security/passwords.ts'
import { authenticate } from '../_lib/auth.js'
import { methodNotAllowed, requestMethod } from '../_lib/errors.js'
import { paginate, parsePageRequest } from '../_lib/pagination.js'
import { serializeCreatedUser, serializeUser } from '../_lib/serializers.js'

export const EMAIL_TAKEN = 'A user with that email already exists.'
export const USERNAME_TAKEN = 'A user with that username already exists.'

async function list(req: Request, res: Response) {
  const viewer = await authenticate(req)
  const pageRequest = parsePageRequest(req.query)
  const page = await listUsers(pageRequest)
  const followed = await getFollowedIds(
    viewer?.id ?? null,
    page.items.map((u) => u.id),
  )
  return res.json(paginate(req, pageRequest, page, (u) => serializeUser(toProfile(u, followed.has(u.id)))))
}

async function assertAvailable(email: string, username: string): Promise<void> {
  const errors: FieldErrors = {}
  if (await getUserByEmail(email)) errors.email = [EMAIL_TAKEN]
  if (await getUserByUsername(username)) errors.username = [USERNAME_TAKEN]
  if (Object.keys(errors).length > 0) throw new ValidationError(errors)
}

async function register(req: Request, res: Response) {
  const input = parseInput(registrationSchema, req.body)
  await assertAvailable(input.email, input.username)

  const password = await hashPassword(input.password)
  let user: User
  try {
    user = await createUser({ ...input, password })
  } catch (err) {
    // Another registration took the email or username while the password was hashing
    if (uniqueViolationColumn(err) !== null) await assertAvailable(input.email, input.username)
    throw err
  }
  return res.status(201).json(serializeCreatedUser(user))
}

export default async function handler(req: Request, res: Response) {
  const method = requestMethod(req)
  if (method === 'GET') return list(req, res)
  if (method === 'POST') return register(req, res)
  return methodNotAllowed(res, ['GET', 'POST'])
}
