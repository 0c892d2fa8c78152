import { describe, expect, it } from 'vitest'
import { AUTH_HEADERS, build } from '../../helpers/app.js'
import { expectErrorResponse } from '../../helpers/assertions.js'

describe('API access control', () => {
  it('should reject a request without a bearer token', async (t) => {
    const app = await build(t)

    const res = await app.inject({ method: 'GET', url: '/api/status' })

    expectErrorResponse(
      res.statusCode,
      res.payload,
      401,
      'Missing bearer token',
    )
  })

  it('should reject a wrong token', async (t) => {
    const app = await build(t)

    const res = await app.inject({
      method: 'GET',
      url: '/api/status',
      headers: { authorization: 'Bearer not-the-secret' },
    })

    expectErrorResponse(res.statusCode, res.payload, 401, 'Invalid token')
  })

  it('should answer 503 while no token is configured', async (t) => {
    const app = await build(t, { apiToken: '' })

    const res = await app.inject({
      method: 'GET',
      url: '/api/status',
      headers: AUTH_HEADERS,
    })

    expectErrorResponse(
      res.statusCode,
      res.payload,
      503,
      'Service token not configured',
    )
  })

  it('should reject addresses outside the allow-list', async (t) => {
    const app = await build(t, { allowedIps: '10.9.9.9' })

    const res = await app.inject({
      method: 'GET',
      url: '/api/status',
      headers: AUTH_HEADERS,
    })

    expectErrorResponse(res.statusCode, res.payload, 403, 'Forbidden')
  })

  it('should admit an allowed address with a valid token', async (t) => {
    const app = await build(t, { allowedIps: '127.0.0.0/8' })

    const res = await app.inject({
      method: 'GET',
      url: '/api/status',
      headers: AUTH_HEADERS,
    })

    expect(res.statusCode).toBe(200)
  })
})
