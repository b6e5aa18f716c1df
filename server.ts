import { createApp } from './api/app.js'
import { config } from '@infrastructure/config.ts'
import { logger } from '@infrastructure/logger.ts'

const server = createApp().listen(config.port, () => {
  logger.info({ port: config.port, publicUrl: config.publicUrl }, 'recipebox-api listening')
})

function shutdown(signal: string) {
  logger.info({ signal }, 'Shutting down')
  server.close((err) => {
    if (err) {
      logger.error({ err }, 'Error while closing the server')
      process.exit(1)
    }
    process.exit(0)
  })
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
