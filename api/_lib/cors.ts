import type { RequestHandler } from 'express'

/**
 * CORS for token-authenticated clients. Listed origins are echoed back;
 * `*` in the list opens the API to any origin (tokens travel in a header,
 * not a cookie, so credentials are never allowed).
 */
export function corsHeaders(allowedOrigins: string[]): RequestHandler {
  return (req, res, next) => {
    const origin = req.headers.origin ?? ''
    if (allowedOrigins.includes('*')) {
      res.setHeader('Access-Control-Allow-Origin', '*')
    } else if (allowedOrigins.includes(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin)
      res.setHeader('Vary', 'Origin')
    }
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PUT, PATCH, DELETE, OPTIONS')
    res.setHeader('Access-Control-Allow-Headers', 'Authorization, Content-Type')
    res.setHeader('Access-Control-Expose-Headers', 'Content-Disposition')

    if (req.method === 'OPTIONS') {
      res.status(204).end()
      return
    }
    next()
  }
}
