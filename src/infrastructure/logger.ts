import pino from 'pino'
import { config } from './config.ts'

export const logger = pino({
  name: 'recipebox-api',
  level: config.logLevel,
  redact: ['req.headers.authorization', 'req.headers.cookie'],
})
