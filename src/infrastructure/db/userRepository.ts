import { and, asc, count, eq, inArray } from 'drizzle-orm'
import type { NewUser, User, UserProfile } from '@domain/models/User.ts'
import type { Page, PageRequest } from '@domain/models/Page.ts'
import { db } from './database.ts'
import { subscriptions, users } from './schema.ts'

export function toProfile(user: User, isSubscribed: boolean): UserProfile {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    firstName: user.firstName,
    lastName: user.lastName,
    avatar: user.avatar,
    isSubscribed,
  }
}

export async function createUser(input: NewUser): Promise<User> {
  return db
    .insert(users)
    .values({
      ...input,
      isStaff: input.isStaff ?? false,
      dateJoined: new Date().toISOString(),
    })
    .returning()
    .get()
}

export async function getUserById(id: number): Promise<User | undefined> {
  return db.select().from(users).where(eq(users.id, id)).get()
}

export async function getUserByEmail(email: string): Promise<User | undefined> {
  return db.select().from(users).where(eq(users.email, email)).get()
}

export async function getUserByUsername(username: string): Promise<User | undefined> {
  return db.select().from(users).where(eq(users.username, username)).get()
}

export async function listUsers({ page, limit }: PageRequest): Promise<Page<User>> {
  const total = db.select({ value: count() }).from(users).get()
  const items = db
    .select()
    .from(users)
    .orderBy(asc(users.username))
    .limit(limit)
    .offset((page - 1) * limit)
    .all()
  return { count: total?.value ?? 0, items }
}

/** IDs among `authorIds` that `viewerId` follows. */
export async function getFollowedIds(
  viewerId: number | null,
  authorIds: number[],
): Promise<Set<number>> {
  if (viewerId === null || authorIds.length === 0) return new Set()
  const rows = db
    .select({ authorId: subscriptions.authorId })
    .from(subscriptions)
    .where(and(eq(subscriptions.subscriberId, viewerId), inArray(subscriptions.authorId, authorIds)))
    .all()
  return new Set(rows.map((r) => r.authorId))
}

export async function getProfiles(
  userIds: number[],
  viewerId: number | null,
): Promise<Map<number, UserProfile>> {
  const ids = [...new Set(userIds)]
  if (ids.length === 0) return new Map()

  const rows = db.select().from(users).where(inArray(users.id, ids)).all()
  const followed = await getFollowedIds(viewerId, ids)
  return new Map(rows.map((u) => [u.id, toProfile(u, followed.has(u.id))]))
}

export async function getProfile(
  userId: number,
  viewerId: number | null,
): Promise<UserProfile | undefined> {
  const profiles = await getProfiles([userId], viewerId)
  return profiles.get(userId)
}

export async function updateAvatar(userId: number, avatar: string | null): Promise<void> {
  db.update(users).set({ avatar }).where(eq(users.id, userId)).run()
}

export async function updatePassword(userId: number, password: string): Promise<void> {
  db.update(users).set({ password }).where(eq(users.id, userId)).run()
}
