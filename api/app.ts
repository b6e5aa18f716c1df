import express, { type Express } from 'express'
import pinoHttp from 'pino-http'
import { config } from '@infrastructure/config.ts'
import { logger } from '@infrastructure/logger.ts'
import { MEDIA_URL_PATH } from '@infrastructure/storage/mediaStorage.ts'
import { corsHeaders } from './_lib/cors.js'
import { errorHandler, NOT_FOUND, withErrors } from './_lib/errors.js'
import { createApiRouter } from './router.js'
import shortLink from './s.js'

export function createApp(): Express {
  const app = express()
  app.disable('x-powered-by')

  app.use(pinoHttp({ logger }))
  app.use(corsHeaders(config.corsOrigins))
  app.use(express.json({ limit: '10mb' }))

  app.use(MEDIA_URL_PATH, express.static(config.mediaRoot))
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' })
  })
  app.use('/api', createApiRouter())
  app.all('/s/:id(\\d+)', withErrors(shortLink))

  app.use((_req, res) => {
    res.status(404).json({ error: NOT_FOUND })
  })
  app.use(errorHandler)
  return app
}
