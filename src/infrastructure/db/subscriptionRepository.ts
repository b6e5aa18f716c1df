import { and, asc, count, eq } from 'drizzle-orm'
import type { Page, PageRequest } from '@domain/models/Page.ts'
import type { User } from '@domain/models/User.ts'
import { db } from './database.ts'
import { subscriptions, users } from './schema.ts'

/** Returns false when the subscription already existed. */
export async function subscribe(subscriberId: number, authorId: number): Promise<boolean> {
  const inserted = db
    .insert(subscriptions)
    .values({ subscriberId, authorId })
    .onConflictDoNothing()
    .returning()
    .all()
  return inserted.length > 0
}

/** Returns false when there was nothing to remove. */
export async function unsubscribe(subscriberId: number, authorId: number): Promise<boolean> {
  const result = db
    .delete(subscriptions)
    .where(and(eq(subscriptions.subscriberId, subscriberId), eq(subscriptions.authorId, authorId)))
    .run()
  return result.changes > 0
}

export async function listFollowedAuthors(
  subscriberId: number,
  { page, limit }: PageRequest,
): Promise<Page<User>> {
  const mine = eq(subscriptions.subscriberId, subscriberId)
  const total = db.select({ value: count() }).from(subscriptions).where(mine).get()
  const rows = db
    .select({ user: users })
    .from(subscriptions)
    .innerJoin(users, eq(users.id, subscriptions.authorId))
    .where(mine)
    .orderBy(asc(users.username))
    .limit(limit)
    .offset((page - 1) * limit)
    .all()
  return { count: total?.value ?? 0, items: rows.map((r) => r.user) }
}
