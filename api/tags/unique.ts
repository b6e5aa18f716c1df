import type { Tag } from '@domain/models/Tag.ts'
import { ValidationError, type FieldErrors } from '@application/validation/ValidationError.ts'
import { findConflictingTags } from '@infrastructure/db/index.ts'

export const TAG_NAME_TAKEN = 'A tag with this name already exists.'
export const TAG_SLUG_TAKEN = 'A tag with this slug already exists.'

export async function assertTagIsUnique(
  fields: Partial<Omit<Tag, 'id'>>,
  excludeId: number | null = null,
): Promise<void> {
  const conflicts = await findConflictingTags(fields.name, fields.slug, excludeId)
  const errors: FieldErrors = {}
  if (fields.name !== undefined && conflicts.some((t) => t.name === fields.name)) {
    errors.name = [TAG_NAME_TAKEN]
  }
  if (fields.slug !== undefined && conflicts.some((t) => t.slug === fields.slug)) {
    errors.slug = [TAG_SLUG_TAKEN]
  }
  if (Object.keys(errors).length > 0) throw new ValidationError(errors)
}
