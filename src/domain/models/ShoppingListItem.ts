export interface ShoppingListItem {
  name: string
  measurementUnit: string
  totalAmount: number
}
