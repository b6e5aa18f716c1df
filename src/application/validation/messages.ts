export const REQUIRED = 'This field is required.'
export const NOT_A_STRING = 'Not a valid string.'
export const NOT_AN_INTEGER = 'A valid integer is required.'
export const NOT_A_LIST = 'Expected a list of items.'
export const BLANK = 'This field may not be blank.'

export function maxLength(limit: number): string {
  return `Ensure this field has no more than ${limit} characters.`
}

export function minValue(limit: number): string {
  return `Ensure this value is greater than or equal to ${limit}.`
}

export function maxValue(limit: number): string {
  return `Ensure this value is less than or equal to ${limit}.`
}
