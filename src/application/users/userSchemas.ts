import { z } from 'zod'
import {
  MAX_EMAIL_LENGTH,
  MAX_PERSON_NAME_LENGTH,
  MAX_USERNAME_LENGTH,
  MIN_PASSWORD_LENGTH,
} from '@domain/constants/limits.ts'
import { text } from '@application/validation/fields.ts'
import { REQUIRED, NOT_A_STRING } from '@application/validation/messages.ts'

export const INVALID_EMAIL = 'Enter a valid email address.'
export const INVALID_USERNAME =
  'Enter a valid username. This value may contain only letters, numbers, and @/./+/-/_ characters.'
export const PASSWORD_TOO_SHORT = `This password is too short. It must contain at least ${MIN_PASSWORD_LENGTH} characters.`
export const PASSWORD_NUMERIC = 'This password is entirely numeric.'
export const PASSWORD_LIKE_USERNAME = 'The password is too similar to the username.'

const USERNAME_PATTERN = /^[\w.@+-]+$/

const password = z.string({ required_error: REQUIRED, invalid_type_error: NOT_A_STRING }).min(1, REQUIRED)

/** Problems with a proposed password; empty when it is acceptable. */
export function passwordProblems(candidate: string, username?: string): string[] {
  const problems: string[] = []
  if (candidate.length < MIN_PASSWORD_LENGTH) problems.push(PASSWORD_TOO_SHORT)
  if (/^\d+$/.test(candidate)) problems.push(PASSWORD_NUMERIC)
  if (username && candidate.toLowerCase() === username.toLowerCase()) {
    problems.push(PASSWORD_LIKE_USERNAME)
  }
  return problems
}

export const registrationSchema = z
  .object({
    email: text(MAX_EMAIL_LENGTH).pipe(z.string().email(INVALID_EMAIL)),
    username: text(MAX_USERNAME_LENGTH).pipe(z.string().regex(USERNAME_PATTERN, INVALID_USERNAME)),
    first_name: text(MAX_PERSON_NAME_LENGTH),
    last_name: text(MAX_PERSON_NAME_LENGTH),
    password,
  })
  .superRefine((body, ctx) => {
    for (const message of passwordProblems(body.password, body.username)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['password'], message })
    }
  })
  .transform((body) => ({
    email: body.email.toLowerCase(),
    username: body.username,
    firstName: body.first_name,
    lastName: body.last_name,
    password: body.password,
  }))

export const loginSchema = z.object({
  email: text(MAX_EMAIL_LENGTH).transform((e) => e.toLowerCase()),
  password,
})

export const setPasswordSchema = z.object({
  new_password: password,
  current_password: password,
})
