import { asc, eq, sql } from 'drizzle-orm'
import type { ShoppingListItem } from '@domain/models/ShoppingListItem.ts'
import { db } from './database.ts'
import { ingredients, recipeIngredients, shoppingCart } from './schema.ts'

/**
 * Ingredient totals over every recipe in the user's cart, one row per
 * (name, unit) pair, ordered by name.
 */
export async function getShoppingCartTotals(userId: number): Promise<ShoppingListItem[]> {
  return db
    .select({
      name: ingredients.name,
      measurementUnit: ingredients.measurementUnit,
      totalAmount: sql<number>`sum(${recipeIngredients.amount})`.mapWith(Number),
    })
    .from(recipeIngredients)
    .innerJoin(shoppingCart, eq(shoppingCart.recipeId, recipeIngredients.recipeId))
    .innerJoin(ingredients, eq(ingredients.id, recipeIngredients.ingredientId))
    .where(eq(shoppingCart.userId, userId))
    .groupBy(ingredients.name, ingredients.measurementUnit)
    .orderBy(asc(ingredients.name), asc(ingredients.measurementUnit))
    .all()
}
