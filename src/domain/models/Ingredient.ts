export interface Ingredient {
  id: number
  name: string
  measurementUnit: string
}
