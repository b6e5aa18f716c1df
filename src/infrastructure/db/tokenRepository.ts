import { eq } from 'drizzle-orm'
import type { User } from '@domain/models/User.ts'
import { generateTokenKey } from '@infrastructure/security/passwords.ts'
import { db } from './database.ts'
import { authTokens, users } from './schema.ts'

/** Returns the user's existing token, issuing one on first login. */
export async function getOrCreateToken(userId: number): Promise<string> {
  const existing = db.select().from(authTokens).where(eq(authTokens.userId, userId)).get()
  if (existing) return existing.key

  const created = db
    .insert(authTokens)
    .values({ key: generateTokenKey(), userId, created: new Date().toISOString() })
    .returning()
    .get()
  return created.key
}

export async function deleteToken(userId: number): Promise<void> {
  db.delete(authTokens).where(eq(authTokens.userId, userId)).run()
}

export async function getUserByToken(key: string): Promise<User | undefined> {
  const row = db
    .select({ user: users })
    .from(authTokens)
    .innerJoin(users, eq(users.id, authTokens.userId))
    .where(eq(authTokens.key, key))
    .get()
  return row?.user
}
