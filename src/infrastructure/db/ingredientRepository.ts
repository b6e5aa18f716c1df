import { and, asc, eq, inArray, ne, sql } from 'drizzle-orm'
import type { Ingredient } from '@domain/models/Ingredient.ts'
import { db } from './database.ts'
import { ingredients } from './schema.ts'

/**
 * All ingredients ordered by name, optionally narrowed to names starting
 * with `namePrefix` (case-insensitive).
 */
export async function listIngredients(namePrefix: string | null = null): Promise<Ingredient[]> {
  const query = db.select().from(ingredients)
  if (!namePrefix) {
    return query.orderBy(asc(ingredients.name), asc(ingredients.measurementUnit)).all()
  }

  const prefix = namePrefix.toLowerCase()
  return query
    .where(sql`substr(casefold(${ingredients.name}), 1, ${prefix.length}) = ${prefix}`)
    .orderBy(asc(ingredients.name), asc(ingredients.measurementUnit))
    .all()
}

export async function getIngredientById(id: number): Promise<Ingredient | undefined> {
  return db.select().from(ingredients).where(eq(ingredients.id, id)).get()
}

export async function getIngredientsByIds(ids: number[]): Promise<Ingredient[]> {
  if (ids.length === 0) return []
  return db.select().from(ingredients).where(inArray(ingredients.id, ids)).all()
}

export async function findIngredient(
  name: string,
  measurementUnit: string,
  excludeId: number | null = null,
): Promise<Ingredient | undefined> {
  const same = and(eq(ingredients.name, name), eq(ingredients.measurementUnit, measurementUnit))
  return db
    .select()
    .from(ingredients)
    .where(excludeId === null ? same : and(same, ne(ingredients.id, excludeId)))
    .get()
}

export async function createIngredient(input: Omit<Ingredient, 'id'>): Promise<Ingredient> {
  return db.insert(ingredients).values(input).returning().get()
}

/** Inserts the rows whose (name, unit) pair is new; returns how many were added. */
export async function createIngredientsIfMissing(rows: Omit<Ingredient, 'id'>[]): Promise<number> {
  if (rows.length === 0) return 0
  return db.insert(ingredients).values(rows).onConflictDoNothing().run().changes
}

export async function updateIngredient(
  id: number,
  patch: Partial<Omit<Ingredient, 'id'>>,
): Promise<Ingredient | undefined> {
  if (Object.keys(patch).length === 0) return getIngredientById(id)
  return db.update(ingredients).set(patch).where(eq(ingredients.id, id)).returning().get()
}

export async function deleteIngredient(id: number): Promise<boolean> {
  return db.delete(ingredients).where(eq(ingredients.id, id)).run().changes > 0
}
