import { describe, it, expect } from 'vitest'
import {
  formatShoppingList,
  formatShoppingListLine,
} from '@application/shopping/formatShoppingList.ts'

describe('formatShoppingListLine', () => {
  it('renders name, total and unit', () => {
    expect(formatShoppingListLine({ name: 'sugar', measurementUnit: 'g', totalAmount: 200 })).toBe(
      'sugar - 200 g',
    )
  })
})

describe('formatShoppingList', () => {
  it('returns null for an empty cart', () => {
    expect(formatShoppingList([])).toBeNull()
  })

  it('puts one item per line in the given order', () => {
    const text = formatShoppingList([
      { name: 'egg', measurementUnit: 'pcs', totalAmount: 3 },
      { name: 'milk', measurementUnit: 'ml', totalAmount: 250 },
    ])

    expect(text).toBe('egg - 3 pcs\nmilk - 250 ml')
  })
})
