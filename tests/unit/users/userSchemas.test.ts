import { describe, it, expect } from 'vitest'
import {
  INVALID_EMAIL,
  INVALID_USERNAME,
  PASSWORD_LIKE_USERNAME,
  PASSWORD_NUMERIC,
  PASSWORD_TOO_SHORT,
  passwordProblems,
  registrationSchema,
} from '@application/users/userSchemas.ts'
import { parseInput } from '@application/validation/parseInput.ts'
import { ValidationError } from '@application/validation/ValidationError.ts'

describe('passwordProblems', () => {
  it('accepts a reasonable password', () => {
    expect(passwordProblems('kitchen-table-9', 'cook')).toEqual([])
  })

  it('reports every problem it finds', () => {
    expect(passwordProblems('1234')).toEqual([PASSWORD_TOO_SHORT, PASSWORD_NUMERIC])
    expect(passwordProblems('ChefAnna', 'chefanna')).toEqual([PASSWORD_LIKE_USERNAME])
  })
})

describe('registrationSchema', () => {
  const body = {
    email: 'Cook@Example.com',
    username: 'cook',
    first_name: 'Ann',
    last_name: 'Cook',
    password: 'kitchen-table-9',
  }

  it('lowercases the email and renames fields', () => {
    expect(parseInput(registrationSchema, body)).toEqual({
      email: 'cook@example.com',
      username: 'cook',
      firstName: 'Ann',
      lastName: 'Cook',
      password: 'kitchen-table-9',
    })
  })

  it('rejects a malformed email and username', () => {
    try {
      parseInput(registrationSchema, { ...body, email: 'not-an-email', username: 'bad name' })
      expect.unreachable()
    } catch (err) {
      expect(err instanceof ValidationError && err.fields).toEqual({
        email: [INVALID_EMAIL],
        username: [INVALID_USERNAME],
      })
    }
  })
})
