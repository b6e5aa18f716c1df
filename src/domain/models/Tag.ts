export interface Tag {
  id: number
  name: string
  slug: string
}
