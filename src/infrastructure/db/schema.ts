import { integer, sqliteTable, text, uniqueIndex, index } from 'drizzle-orm/sqlite-core'

export const users = sqliteTable('users', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  email: text('email').notNull().unique(),
  username: text('username').notNull().unique(),
  firstName: text('first_name').notNull(),
  lastName: text('last_name').notNull(),
  password: text('password').notNull(),
  avatar: text('avatar'),
  isStaff: integer('is_staff', { mode: 'boolean' }).notNull().default(false),
  dateJoined: text('date_joined').notNull(),
})

export const authTokens = sqliteTable('auth_tokens', {
  key: text('key').primaryKey(),
  userId: integer('user_id')
    .notNull()
    .unique()
    .references(() => users.id, { onDelete: 'cascade' }),
  created: text('created').notNull(),
})

export const tags = sqliteTable('tags', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
  slug: text('slug').notNull().unique(),
})

export const ingredients = sqliteTable(
  'ingredients',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    name: text('name').notNull(),
    measurementUnit: text('measurement_unit').notNull(),
  },
  (t) => ({
    nameUnitUnique: uniqueIndex('ingredients_name_unit_unique').on(t.name, t.measurementUnit),
  }),
)

export const recipes = sqliteTable(
  'recipes',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    authorId: integer('author_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    image: text('image').notNull(),
    text: text('text').notNull(),
    cookingTime: integer('cooking_time').notNull(),
    pubDate: text('pub_date').notNull(),
  },
  (t) => ({
    pubDateIdx: index('recipes_pub_date_idx').on(t.pubDate),
  }),
)

export const recipeTags = sqliteTable(
  'recipe_tags',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    recipeId: integer('recipe_id')
      .notNull()
      .references(() => recipes.id, { onDelete: 'cascade' }),
    tagId: integer('tag_id')
      .notNull()
      .references(() => tags.id, { onDelete: 'cascade' }),
  },
  (t) => ({
    recipeTagUnique: uniqueIndex('recipe_tags_recipe_tag_unique').on(t.recipeId, t.tagId),
  }),
)

export const recipeIngredients = sqliteTable(
  'recipe_ingredients',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    recipeId: integer('recipe_id')
      .notNull()
      .references(() => recipes.id, { onDelete: 'cascade' }),
    ingredientId: integer('ingredient_id')
      .notNull()
      .references(() => ingredients.id, { onDelete: 'cascade' }),
    amount: integer('amount').notNull(),
  },
  (t) => ({
    recipeIngredientUnique: uniqueIndex('recipe_ingredients_recipe_ingredient_unique').on(
      t.recipeId,
      t.ingredientId,
    ),
  }),
)

export const favorites = sqliteTable(
  'favorites',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    userId: integer('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    recipeId: integer('recipe_id')
      .notNull()
      .references(() => recipes.id, { onDelete: 'cascade' }),
  },
  (t) => ({
    userRecipeUnique: uniqueIndex('favorites_user_recipe_unique').on(t.userId, t.recipeId),
  }),
)

export const shoppingCart = sqliteTable(
  'shopping_cart',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    userId: integer('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    recipeId: integer('recipe_id')
      .notNull()
      .references(() => recipes.id, { onDelete: 'cascade' }),
  },
  (t) => ({
    userRecipeUnique: uniqueIndex('shopping_cart_user_recipe_unique').on(t.userId, t.recipeId),
  }),
)

export const subscriptions = sqliteTable(
  'subscriptions',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    subscriberId: integer('subscriber_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    authorId: integer('author_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
  },
  (t) => ({
    subscriberAuthorUnique: uniqueIndex('subscriptions_subscriber_author_unique').on(
      t.subscriberId,
      t.authorId,
    ),
  }),
)
