import type { Request, Response } from 'express'
import { getDb } from '../db/sqlite'
import { logger } from '../logger'

const SERVICE_NAME = 'contact-sentinel-api'

export function healthHandler(_req: Request, res: Response): void {
  res.json({
    status: 'ok',
    service: SERVICE_NAME,
    timestamp: new Date().toISOString()
  })
}

/** Ready once the database answers a trivial query. */
export function readinessHandler(_req: Request, res: Response): void {
  const body = {
    status: 'ok',
    service: SERVICE_NAME,
    timestamp: new Date().toISOString()
  }

  try {
    getDb().prepare('SELECT 1').get()
  } catch (error) {
    logger.error({ error }, 'Readiness check failed')
    res.status(503).json({ ...body, status: 'unavailable' })
    return
  }

  res.json(body)
}
