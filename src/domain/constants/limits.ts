export const MAX_USERNAME_LENGTH = 150
export const MAX_EMAIL_LENGTH = 254
export const MAX_PERSON_NAME_LENGTH = 150
export const MIN_PASSWORD_LENGTH = 8

export const MAX_TAG_NAME_LENGTH = 32
export const MAX_TAG_SLUG_LENGTH = 32

export const MAX_INGREDIENT_NAME_LENGTH = 128
export const MAX_MEASUREMENT_UNIT_LENGTH = 64

export const MAX_RECIPE_NAME_LENGTH = 256
export const MIN_COOKING_TIME = 1
export const MAX_COOKING_TIME = 32_000
export const MIN_AMOUNT = 1
export const MAX_AMOUNT = 32_000

export const DEFAULT_PAGE_SIZE = 6
export const MAX_PAGE_SIZE = 100

/** Upper bound for a decoded image, in bytes. */
export const MAX_IMAGE_BYTES = 5 * 1024 * 1024
