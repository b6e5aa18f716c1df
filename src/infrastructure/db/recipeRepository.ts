import { and, asc, count, desc, eq, inArray, or, sql, type SQL } from 'drizzle-orm'
import type {
  Recipe,
  RecipeDetails,
  RecipeFilter,
  RecipeIngredient,
  RecipeInput,
  RecipeUpdate,
} from '@domain/models/Recipe.ts'
import type { Page, PageRequest } from '@domain/models/Page.ts'
import type { Tag } from '@domain/models/Tag.ts'
import { db } from './database.ts'
import {
  favorites,
  ingredients,
  recipeIngredients,
  recipes,
  recipeTags,
  shoppingCart,
  tags,
  users,
} from './schema.ts'
import { getProfiles } from './userRepository.ts'

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`)
}

function recipeIdsWithTagSlug(match: SQL) {
  return db
    .select({ id: recipeTags.recipeId })
    .from(recipeTags)
    .innerJoin(tags, eq(tags.id, recipeTags.tagId))
    .where(match)
}

function buildConditions(filter: RecipeFilter, viewerId: number | null): SQL | undefined {
  const conditions: SQL[] = []

  if (filter.authorId !== null) {
    conditions.push(eq(recipes.authorId, filter.authorId))
  }

  // Any of the requested tags is enough
  if (filter.tagSlugs.length > 0) {
    conditions.push(inArray(recipes.id, recipeIdsWithTagSlug(inArray(tags.slug, filter.tagSlugs))))
  }

  if (filter.isFavorited && viewerId !== null) {
    conditions.push(
      inArray(
        recipes.id,
        db.select({ id: favorites.recipeId }).from(favorites).where(eq(favorites.userId, viewerId)),
      ),
    )
  }

  if (filter.isInShoppingCart && viewerId !== null) {
    conditions.push(
      inArray(
        recipes.id,
        db
          .select({ id: shoppingCart.recipeId })
          .from(shoppingCart)
          .where(eq(shoppingCart.userId, viewerId)),
      ),
    )
  }

  if (filter.search) {
    const pattern = `%${escapeLike(filter.search.toLowerCase())}%`
    const match = or(
      inArray(
        recipes.authorId,
        db
          .select({ id: users.id })
          .from(users)
          .where(sql`casefold(${users.username}) LIKE ${pattern} ESCAPE '\\'`),
      ),
      inArray(recipes.id, recipeIdsWithTagSlug(sql`casefold(${tags.slug}) LIKE ${pattern} ESCAPE '\\'`)),
    )
    if (match) conditions.push(match)
  }

  return and(...conditions)
}

async function withDetails(rows: Recipe[], viewerId: number | null): Promise<RecipeDetails[]> {
  if (rows.length === 0) return []
  const ids = rows.map((r) => r.id)

  const tagRows = db
    .select({ recipeId: recipeTags.recipeId, id: tags.id, name: tags.name, slug: tags.slug })
    .from(recipeTags)
    .innerJoin(tags, eq(tags.id, recipeTags.tagId))
    .where(inArray(recipeTags.recipeId, ids))
    .orderBy(asc(tags.name))
    .all()

  const ingredientRows = db
    .select({
      recipeId: recipeIngredients.recipeId,
      id: ingredients.id,
      name: ingredients.name,
      measurementUnit: ingredients.measurementUnit,
      amount: recipeIngredients.amount,
    })
    .from(recipeIngredients)
    .innerJoin(ingredients, eq(ingredients.id, recipeIngredients.ingredientId))
    .where(inArray(recipeIngredients.recipeId, ids))
    .orderBy(asc(recipeIngredients.id))
    .all()

  const favorited = new Set<number>()
  const inCart = new Set<number>()
  if (viewerId !== null) {
    db.select({ id: favorites.recipeId })
      .from(favorites)
      .where(and(eq(favorites.userId, viewerId), inArray(favorites.recipeId, ids)))
      .all()
      .forEach((r) => favorited.add(r.id))
    db.select({ id: shoppingCart.recipeId })
      .from(shoppingCart)
      .where(and(eq(shoppingCart.userId, viewerId), inArray(shoppingCart.recipeId, ids)))
      .all()
      .forEach((r) => inCart.add(r.id))
  }

  const tagsByRecipe = new Map<number, Tag[]>()
  for (const { recipeId, ...tag } of tagRows) {
    tagsByRecipe.set(recipeId, [...(tagsByRecipe.get(recipeId) ?? []), tag])
  }
  const ingredientsByRecipe = new Map<number, RecipeIngredient[]>()
  for (const { recipeId, ...line } of ingredientRows) {
    ingredientsByRecipe.set(recipeId, [...(ingredientsByRecipe.get(recipeId) ?? []), line])
  }

  const authors = await getProfiles(
    rows.map((r) => r.authorId),
    viewerId,
  )

  return rows.map((recipe) => {
    const author = authors.get(recipe.authorId)
    if (!author) throw new Error(`Author ${recipe.authorId} of recipe ${recipe.id} is missing`)
    return {
      ...recipe,
      author,
      tags: tagsByRecipe.get(recipe.id) ?? [],
      ingredients: ingredientsByRecipe.get(recipe.id) ?? [],
      isFavorited: favorited.has(recipe.id),
      isInShoppingCart: inCart.has(recipe.id),
    }
  })
}

export async function getRecipeById(id: number): Promise<Recipe | undefined> {
  return db.select().from(recipes).where(eq(recipes.id, id)).get()
}

export async function getRecipeDetails(
  id: number,
  viewerId: number | null,
): Promise<RecipeDetails | undefined> {
  const recipe = await getRecipeById(id)
  if (!recipe) return undefined
  const [details] = await withDetails([recipe], viewerId)
  return details
}

export async function listRecipes(
  filter: RecipeFilter,
  { page, limit }: PageRequest,
  viewerId: number | null,
): Promise<Page<RecipeDetails>> {
  const where = buildConditions(filter, viewerId)
  const total = db.select({ value: count() }).from(recipes).where(where).get()
  const rows = db
    .select()
    .from(recipes)
    .where(where)
    .orderBy(desc(recipes.pubDate), desc(recipes.id))
    .limit(limit)
    .offset((page - 1) * limit)
    .all()

  return { count: total?.value ?? 0, items: await withDetails(rows, viewerId) }
}

/** Newest recipes of an author; `limit` null means all of them. */
export async function listRecipesByAuthor(authorId: number, limit: number | null): Promise<Recipe[]> {
  const query = db
    .select()
    .from(recipes)
    .where(eq(recipes.authorId, authorId))
    .orderBy(desc(recipes.pubDate), desc(recipes.id))
  return limit === null ? query.all() : query.limit(limit).all()
}

export async function countRecipesByAuthor(authorId: number): Promise<number> {
  const total = db
    .select({ value: count() })
    .from(recipes)
    .where(eq(recipes.authorId, authorId))
    .get()
  return total?.value ?? 0
}

export async function createRecipe(authorId: number, input: RecipeInput): Promise<Recipe> {
  return db.transaction((tx) => {
    const recipe = tx
      .insert(recipes)
      .values({
        authorId,
        name: input.name,
        image: input.image,
        text: input.text,
        cookingTime: input.cookingTime,
        pubDate: new Date().toISOString(),
      })
      .returning()
      .get()

    tx.insert(recipeTags)
      .values(input.tags.map((tagId) => ({ recipeId: recipe.id, tagId })))
      .run()
    tx.insert(recipeIngredients)
      .values(input.ingredients.map(({ id, amount }) => ({ recipeId: recipe.id, ingredientId: id, amount })))
      .run()

    return recipe
  })
}

/** Overwrites the given fields and replaces the tag and ingredient sets. */
export async function updateRecipe(id: number, update: RecipeUpdate): Promise<Recipe | undefined> {
  return db.transaction((tx) => {
    const patch: Partial<typeof recipes.$inferInsert> = {}
    if (update.name !== undefined) patch.name = update.name
    if (update.image !== undefined) patch.image = update.image
    if (update.text !== undefined) patch.text = update.text
    if (update.cookingTime !== undefined) patch.cookingTime = update.cookingTime
    if (Object.keys(patch).length > 0) {
      tx.update(recipes).set(patch).where(eq(recipes.id, id)).run()
    }

    tx.delete(recipeTags).where(eq(recipeTags.recipeId, id)).run()
    tx.insert(recipeTags)
      .values(update.tags.map((tagId) => ({ recipeId: id, tagId })))
      .run()

    tx.delete(recipeIngredients).where(eq(recipeIngredients.recipeId, id)).run()
    tx.insert(recipeIngredients)
      .values(update.ingredients.map(({ id: ingredientId, amount }) => ({ recipeId: id, ingredientId, amount })))
      .run()

    return tx.select().from(recipes).where(eq(recipes.id, id)).get()
  })
}

export async function deleteRecipe(id: number): Promise<boolean> {
  return db.delete(recipes).where(eq(recipes.id, id)).run().changes > 0
}
