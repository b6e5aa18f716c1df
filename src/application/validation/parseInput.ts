import type { ZodError, ZodType, ZodTypeDef } from 'zod'
import { ValidationError, type FieldErrors } from './ValidationError.ts'

export const NON_FIELD_ERRORS = 'non_field_errors'

export function zodFieldErrors(error: ZodError): FieldErrors {
  const fields: FieldErrors = {}
  for (const issue of error.issues) {
    const [head] = issue.path
    const key = head === undefined ? NON_FIELD_ERRORS : String(head)
    const messages = fields[key] ?? []
    if (!messages.includes(issue.message)) messages.push(issue.message)
    fields[key] = messages
  }
  return fields
}

/** Parses `input` against `schema`, throwing a ValidationError on failure. */
export function parseInput<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  input: unknown,
): Output {
  const result = schema.safeParse(input ?? {})
  if (!result.success) throw new ValidationError(zodFieldErrors(result.error))
  return result.data
}
