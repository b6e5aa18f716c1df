import { and, eq } from 'drizzle-orm'
import { db } from './database.ts'
import { favorites, shoppingCart } from './schema.ts'

// Favorites and the shopping cart are both (user, recipe) sets.
// Adds return false on a duplicate, removes return false when absent.

export async function addFavorite(userId: number, recipeId: number): Promise<boolean> {
  const inserted = db
    .insert(favorites)
    .values({ userId, recipeId })
    .onConflictDoNothing()
    .returning()
    .all()
  return inserted.length > 0
}

export async function removeFavorite(userId: number, recipeId: number): Promise<boolean> {
  const result = db
    .delete(favorites)
    .where(and(eq(favorites.userId, userId), eq(favorites.recipeId, recipeId)))
    .run()
  return result.changes > 0
}

export async function addToShoppingCart(userId: number, recipeId: number): Promise<boolean> {
  const inserted = db
    .insert(shoppingCart)
    .values({ userId, recipeId })
    .onConflictDoNothing()
    .returning()
    .all()
  return inserted.length > 0
}

export async function removeFromShoppingCart(userId: number, recipeId: number): Promise<boolean> {
  const result = db
    .delete(shoppingCart)
    .where(and(eq(shoppingCart.userId, userId), eq(shoppingCart.recipeId, recipeId)))
    .run()
  return result.changes > 0
}
