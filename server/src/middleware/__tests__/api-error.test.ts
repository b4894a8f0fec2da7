import express from 'express'
import request from 'supertest'
import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { apiErrorHandler, ApiHttpError } from '../api-error'
import { ApiErrorCode } from '@shared/types'

const buildTestApp = () => {
  const app = express()
  app.use(express.json())

  app.get('/bad-request', () => {
    throw new ApiHttpError(ApiErrorCode.INVALID_REQUEST, 'Invalid payload', {
      details: { field: 'email' }
    })
  })

  app.get('/rate-limited', () => {
    throw new ApiHttpError(ApiErrorCode.RATE_LIMIT_EXCEEDED)
  })

  app.post('/validated', (req) => {
    z.object({ email: z.string().email() }).parse(req.body)
  })

  app.post('/echo', (_req, res) => {
    res.json({ ok: true })
  })

  app.get('/unexpected', () => {
    throw new Error('Unexpected boom')
  })

  app.use(apiErrorHandler)
  return app
}

describe('apiErrorHandler middleware', () => {
  it('returns standardized response for ApiHttpError', async () => {
    const res = await request(buildTestApp()).get('/bad-request')

    expect(res.status).toBe(400)
    expect(res.body).toEqual({
      success: false,
      error: {
        code: ApiErrorCode.INVALID_REQUEST,
        message: 'Invalid payload',
        details: { field: 'email', path: '/bad-request' },
        stack: expect.any(String)
      }
    })
  })

  it('falls back to the code definition for status and message', async () => {
    const res = await request(buildTestApp()).get('/rate-limited')

    expect(res.status).toBe(429)
    expect(res.body.error).toMatchObject({ code: ApiErrorCode.RATE_LIMIT_EXCEEDED, message: 'Rate limit exceeded' })
  })

  it('maps zod errors to VALIDATION_FAILED', async () => {
    const res = await request(buildTestApp()).post('/validated').send({ email: 'nope' })

    expect(res.status).toBe(422)
    expect(res.body.error.code).toBe(ApiErrorCode.VALIDATION_FAILED)
    expect(res.body.error.details.issues.fieldErrors).toEqual({ email: ['Invalid email'] })
  })

  it('reports malformed JSON as an invalid request', async () => {
    const res = await request(buildTestApp())
      .post('/echo')
      .set('Content-Type', 'application/json')
      .send('{"name": ')

    expect(res.status).toBe(400)
    expect(res.body.error.code).toBe(ApiErrorCode.INVALID_REQUEST)
  })

  it('normalizes unknown errors to INTERNAL_ERROR', async () => {
    const res = await request(buildTestApp()).get('/unexpected')

    expect(res.status).toBe(500)
    expect(res.body.error.code).toBe(ApiErrorCode.INTERNAL_ERROR)
    expect(res.body.success).toBe(false)
    expect(res.body.error.message).toBe('Unexpected boom')
  })
})
