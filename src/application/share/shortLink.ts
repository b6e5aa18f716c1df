export const SHORT_LINK_PREFIX = '/s'

export function buildShortLink(publicUrl: string, recipeId: number): string {
  return `${publicUrl.replace(/\/+$/, '')}${SHORT_LINK_PREFIX}/${recipeId}`
}

/** Client-side route a short link resolves to. */
export function recipePagePath(recipeId: number): string {
  return `/recipes/${recipeId}`
}
