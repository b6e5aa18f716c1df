import type { Ingredient } from '@domain/models/Ingredient.ts'
import type { Recipe, RecipeDetails } from '@domain/models/Recipe.ts'
import type { SubscribedAuthor } from '@domain/models/Subscription.ts'
import type { Tag } from '@domain/models/Tag.ts'
import type { User, UserProfile } from '@domain/models/User.ts'
import { mediaUrl } from '@infrastructure/storage/mediaStorage.ts'

// Wire representations use snake_case field names and absolute media URLs.

export function serializeUser(profile: UserProfile) {
  return {
    email: profile.email,
    id: profile.id,
    username: profile.username,
    first_name: profile.firstName,
    last_name: profile.lastName,
    is_subscribed: profile.isSubscribed,
    avatar: mediaUrl(profile.avatar),
  }
}

export function serializeCreatedUser(user: User) {
  return {
    email: user.email,
    id: user.id,
    username: user.username,
    first_name: user.firstName,
    last_name: user.lastName,
  }
}

export function serializeTag(tag: Tag) {
  return { id: tag.id, name: tag.name, slug: tag.slug }
}

export function serializeIngredient(ingredient: Ingredient) {
  return {
    id: ingredient.id,
    name: ingredient.name,
    measurement_unit: ingredient.measurementUnit,
  }
}

export function serializeRecipe(recipe: RecipeDetails) {
  return {
    id: recipe.id,
    tags: recipe.tags.map(serializeTag),
    author: serializeUser(recipe.author),
    ingredients: recipe.ingredients.map((line) => ({
      id: line.id,
      name: line.name,
      measurement_unit: line.measurementUnit,
      amount: line.amount,
    })),
    is_favorited: recipe.isFavorited,
    is_in_shopping_cart: recipe.isInShoppingCart,
    name: recipe.name,
    image: mediaUrl(recipe.image),
    text: recipe.text,
    cooking_time: recipe.cookingTime,
  }
}

export function serializeShortRecipe(recipe: Recipe) {
  return {
    id: recipe.id,
    name: recipe.name,
    image: mediaUrl(recipe.image),
    cooking_time: recipe.cookingTime,
  }
}

export function serializeSubscribedAuthor(author: SubscribedAuthor) {
  return {
    ...serializeUser(author),
    recipes: author.recipes.map(serializeShortRecipe),
    recipes_count: author.recipesCount,
  }
}
