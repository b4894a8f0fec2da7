import { env } from './config/env'
import { buildApp } from './app'
import { logger } from './logger'
import { closeDb, getDb } from './db/sqlite'
import { startCronScheduler, stopCronScheduler } from './scheduler/cron'

async function main() {
  // Touch DB early to surface migration issues fast
  getDb()

  const app = buildApp()
  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT }, 'Contact API listening')
    startCronScheduler()
  })

  const shutdown = (reason: string) => {
    logger.info({ reason }, 'Shutting down contact API')
    stopCronScheduler()
    server.close((error) => {
      if (error) {
        logger.error({ error }, 'Error while closing HTTP server')
      }
      closeDb()
      process.exit(error ? 1 : 0)
    })
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('SIGINT', () => shutdown('SIGINT'))
}

main().catch((error) => {
  logger.error({ error }, 'Failed to start contact API')
  process.exit(1)
})
