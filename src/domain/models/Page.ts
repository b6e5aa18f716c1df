export interface PageRequest {
  page: number
  limit: number
}

export interface Page<T> {
  count: number
  items: T[]
}
