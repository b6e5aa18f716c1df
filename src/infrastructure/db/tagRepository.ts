import { and, asc, eq, inArray, ne, or } from 'drizzle-orm'
import type { Tag } from '@domain/models/Tag.ts'
import { db } from './database.ts'
import { tags } from './schema.ts'

export async function listTags(): Promise<Tag[]> {
  return db.select().from(tags).orderBy(asc(tags.name)).all()
}

export async function getTagById(id: number): Promise<Tag | undefined> {
  return db.select().from(tags).where(eq(tags.id, id)).get()
}

export async function getTagsByIds(ids: number[]): Promise<Tag[]> {
  if (ids.length === 0) return []
  return db.select().from(tags).where(inArray(tags.id, ids)).all()
}

/** Tags other than `excludeId` that already use `name` or `slug`. */
export async function findConflictingTags(
  name: string | undefined,
  slug: string | undefined,
  excludeId: number | null = null,
): Promise<Tag[]> {
  const clash = or(
    name !== undefined ? eq(tags.name, name) : undefined,
    slug !== undefined ? eq(tags.slug, slug) : undefined,
  )
  if (!clash) return []
  return db
    .select()
    .from(tags)
    .where(excludeId === null ? clash : and(clash, ne(tags.id, excludeId)))
    .all()
}

export async function createTag(input: Omit<Tag, 'id'>): Promise<Tag> {
  return db.insert(tags).values(input).returning().get()
}

export async function updateTag(id: number, patch: Partial<Omit<Tag, 'id'>>): Promise<Tag | undefined> {
  if (Object.keys(patch).length === 0) return getTagById(id)
  return db.update(tags).set(patch).where(eq(tags.id, id)).returning().get()
}

export async function deleteTag(id: number): Promise<boolean> {
  return db.delete(tags).where(eq(tags.id, id)).run().changes > 0
}

export async function createTagsIfMissing(rows: Omit<Tag, 'id'>[]): Promise<number> {
  if (rows.length === 0) return 0
  return db.insert(tags).values(rows).onConflictDoNothing().run().changes
}
