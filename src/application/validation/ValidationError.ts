export type FieldErrors = Record<string, string[]>

/** Input rejected for reasons the client can fix, keyed by field name. */
export class ValidationError extends Error {
  readonly fields: FieldErrors

  constructor(fields: FieldErrors) {
    super(Object.entries(fields).map(([field, messages]) => `${field}: ${messages.join(' ')}`).join('; '))
    this.name = 'ValidationError'
    this.fields = fields
  }

  static of(field: string, message: string): ValidationError {
    return new ValidationError({ [field]: [message] })
  }
}
