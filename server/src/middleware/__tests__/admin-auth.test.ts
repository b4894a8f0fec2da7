import express from 'express'
import request from 'supertest'
import { describe, expect, it } from 'vitest'
import { ApiErrorCode } from '@shared/types'
import { buildAdminAuth } from '../admin-auth'
import { apiErrorHandler } from '../api-error'

const buildTestApp = (token: string | undefined) => {
  const app = express()
  app.get('/admin', buildAdminAuth(token), (_req, res) => {
    res.json({ ok: true })
  })
  app.use(apiErrorHandler)
  return app
}

describe('buildAdminAuth', () => {
  it('passes a matching bearer token', async () => {
    const res = await request(buildTestApp('test-admin-token')).get('/admin').set('Authorization', 'Bearer test-admin-token')

    expect(res.status).toBe(200)
    expect(res.body).toEqual({ ok: true })
  })

  it('rejects a missing header', async () => {
    const res = await request(buildTestApp('test-admin-token')).get('/admin')

    expect(res.status).toBe(401)
    expect(res.body.error.code).toBe(ApiErrorCode.UNAUTHORIZED)
  })

  it('rejects tokens of a different length or value', async () => {
    const app = buildTestApp('test-admin-token')

    const shorter = await request(app).get('/admin').set('Authorization', 'Bearer test')
    const sameLength = await request(app).get('/admin').set('Authorization', 'Bearer test-admin-tokex')

    expect(shorter.body.error.code).toBe(ApiErrorCode.INVALID_TOKEN)
    expect(sameLength.status).toBe(401)
    expect(sameLength.body.error.code).toBe(ApiErrorCode.INVALID_TOKEN)
  })

  it('stays closed when no token is configured', async () => {
    const res = await request(buildTestApp(undefined)).get('/admin').set('Authorization', 'Bearer anything')

    expect(res.status).toBe(503)
    expect(res.body.error.code).toBe(ApiErrorCode.SERVICE_UNAVAILABLE)
  })
})
