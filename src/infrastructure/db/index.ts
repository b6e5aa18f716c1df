export { db, sqlite } from './database.ts'
export {
  toProfile,
  createUser,
  getUserById,
  getUserByEmail,
  getUserByUsername,
  listUsers,
  getProfile,
  getProfiles,
  getFollowedIds,
  updateAvatar,
  updatePassword,
} from './userRepository.ts'
export { getOrCreateToken, deleteToken, getUserByToken } from './tokenRepository.ts'
export {
  listTags,
  getTagById,
  getTagsByIds,
  findConflictingTags,
  createTag,
  createTagsIfMissing,
  updateTag,
  deleteTag,
} from './tagRepository.ts'
export {
  listIngredients,
  getIngredientById,
  getIngredientsByIds,
  findIngredient,
  createIngredient,
  createIngredientsIfMissing,
  updateIngredient,
  deleteIngredient,
} from './ingredientRepository.ts'
export {
  getRecipeById,
  getRecipeDetails,
  listRecipes,
  listRecipesByAuthor,
  countRecipesByAuthor,
  createRecipe,
  updateRecipe,
  deleteRecipe,
} from './recipeRepository.ts'
export {
  addFavorite,
  removeFavorite,
  addToShoppingCart,
  removeFromShoppingCart,
} from './recipeListRepository.ts'
export { subscribe, unsubscribe, listFollowedAuthors } from './subscriptionRepository.ts'
export { getShoppingCartTotals } from './shoppingListRepository.ts'
export { uniqueViolationColumn } from './errors.ts'
