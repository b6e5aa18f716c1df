import type { ErrorRequestHandler, Request, RequestHandler, Response } from 'express'
import multer from 'multer'
import { ValidationError } from '@application/validation/ValidationError.ts'
import { NON_FIELD_ERRORS } from '@application/validation/parseInput.ts'
import { IMAGE_TOO_LARGE } from '@application/images/parseImage.ts'
import { logger } from '@infrastructure/logger.ts'

export const NOT_FOUND = 'Not found.'
export const PERMISSION_DENIED = 'You do not have permission to perform this action.'
export const NOT_AUTHENTICATED = 'Authentication credentials were not provided.'
export const METHOD_NOT_ALLOWED = 'Method not allowed'

/** An error that maps directly onto an HTTP status and `{ error }` body. */
export class HttpError extends Error {
  readonly status: number

  constructor(status: number, message: string) {
    super(message)
    this.name = 'HttpError'
    this.status = status
  }
}

export function notFound(): HttpError {
  return new HttpError(404, NOT_FOUND)
}

export type Handler = (req: Request, res: Response) => unknown

/** HEAD is answered like GET; Node drops the body. */
export function requestMethod(req: Request): string {
  return req.method === 'HEAD' ? 'GET' : req.method
}

export function methodNotAllowed(res: Response, allowed: string[]): Response {
  res.setHeader('Allow', allowed.join(', '))
  return res.status(405).json({ error: METHOD_NOT_ALLOWED })
}

// body-parser and friends attach an HTTP status to the errors they raise
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null
  const { status } = err
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null
}

export function sendError(err: unknown, req: Request, res: Response): void {
  if (err instanceof ValidationError) {
    res.status(400).json(err.fields)
    return
  }
  if (err instanceof HttpError) {
    res.status(err.status).json({ error: err.message })
    return
  }
  if (err instanceof multer.MulterError) {
    const message = err.code === 'LIMIT_FILE_SIZE' ? IMAGE_TOO_LARGE : err.message
    res.status(400).json({ [err.field ?? NON_FIELD_ERRORS]: [message] })
    return
  }

  const status = clientErrorStatus(err)
  if (status !== null) {
    res.status(status).json({ error: status === 413 ? 'Request body too large' : 'Malformed request body' })
    return
  }

  logger.error({ err, reqId: req.id, method: req.method, url: req.originalUrl }, 'Unhandled error')
  res.status(500).json({ error: 'Internal server error' })
}

/** Forward sync throws and async rejections from `handler` to the error middleware. */
export function withErrors(handler: Handler): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch((err: unknown) => next(err))
  }
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err)
    return
  }
  sendError(err, req, res)
}
