import type { Request } from 'express'
import type { Page, PageRequest } from '@domain/models/Page.ts'
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '@domain/constants/limits.ts'
import { queryString, type QueryParams } from '@application/validation/queryParams.ts'
import { config } from '@infrastructure/config.ts'
import { HttpError } from './errors.js'

export const INVALID_PAGE = 'Invalid page.'

export interface Paginated<T> {
  count: number
  next: string | null
  previous: string | null
  results: T[]
}

/**
 * `?page=` is 1-based and must be a positive integer. `?limit=` falls back
 * to the default page size when invalid and is capped at MAX_PAGE_SIZE.
 */
export function parsePageRequest(query: QueryParams): PageRequest {
  let page = 1
  const pageValue = queryString(query, 'page')
  if (pageValue !== null) {
    page = Number(pageValue)
    if (!/^\d+$/.test(pageValue) || !Number.isSafeInteger(page) || page < 1) {
      throw new HttpError(404, INVALID_PAGE)
    }
  }

  let limit = DEFAULT_PAGE_SIZE
  const limitValue = queryString(query, 'limit')
  if (limitValue !== null && /^\d+$/.test(limitValue) && Number(limitValue) > 0) {
    limit = Math.min(Number(limitValue), MAX_PAGE_SIZE)
  }

  // SQLite rejects an OFFSET it cannot hold as a 64-bit integer
  if ((page - 1) * limit > Number.MAX_SAFE_INTEGER) throw new HttpError(404, INVALID_PAGE)

  return { page, limit }
}

function pageUrl(req: Request, page: number): string {
  const url = new URL(req.originalUrl, config.publicUrl)
  if (page === 1) {
    url.searchParams.delete('page')
  } else {
    url.searchParams.set('page', String(page))
  }
  return url.toString()
}

export function paginate<T, R>(
  req: Request,
  request: PageRequest,
  page: Page<T>,
  serialize: (item: T) => R,
): Paginated<R> {
  if (request.page > 1 && (request.page - 1) * request.limit >= page.count) {
    throw new HttpError(404, INVALID_PAGE)
  }

  return {
    count: page.count,
    next: request.page * request.limit < page.count ? pageUrl(req, request.page + 1) : null,
    previous: request.page > 1 ? pageUrl(req, request.page - 1) : null,
    results: page.items.map(serialize),
  }
}
