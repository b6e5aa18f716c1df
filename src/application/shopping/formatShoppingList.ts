import type { ShoppingListItem } from '@domain/models/ShoppingListItem.ts'

export const SHOPPING_LIST_FILENAME = 'shopping_list.txt'

export function formatShoppingListLine(item: ShoppingListItem): string {
  return `${item.name} - ${item.totalAmount} ${item.measurementUnit}`
}

/**
 * Render aggregated cart totals as a plain-text list, one line per item.
 * Returns null for an empty cart so callers never serve an empty file.
 */
export function formatShoppingList(items: ShoppingListItem[]): string | null {
  if (items.length === 0) return null
  return items.map(formatShoppingListLine).join('\n')
}
