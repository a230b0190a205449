import { describe, it, expect } from 'vitest'
import { Hono } from 'hono'
import { z } from 'zod'
import { parseBody, isResponse } from '../lib/validate.js'

describe('Validation Helper', () => {
  const schema = z.object({
    center: z.tuple([z.number(), z.number(), z.number()]),
    radius: z.number().positive(),
    label: z.string().default('sphere'),
  })

  function buildApp() {
    const app = new Hono()
    app.post('/test', async (c) => {
      const result = await parseBody(c, schema)
      if (isResponse(result)) return result
      return c.json({ parsed: result })
    })
    return app
  }

  function send(body: string) {
    return buildApp().request('/test', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    })
  }

  describe('parseBody', () => {
    it('parses a valid body and applies defaults', async () => {
      const res = await send(JSON.stringify({ center: [0, 1, 2], radius: 0.5 }))
      expect(res.status).toBe(200)
      const body = await res.json()
      expect(body.parsed).toEqual({ center: [0, 1, 2], radius: 0.5, label: 'sphere' })
    })

    it('returns 400 for invalid JSON', async () => {
      const res = await send('not json')
      expect(res.status).toBe(400)
      const body = await res.json()
      expect(body.error).toBe('Invalid JSON body.')
    })

    it('returns 400 with field errors and issue paths for schema violations', async () => {
      const res = await send(JSON.stringify({ center: [0, 'a', 2], radius: -1 }))
      expect(res.status).toBe(400)
      const body = await res.json()
      expect(body.error).toBe('Validation failed.')
      expect(body.fields.center).toBeDefined()
      expect(body.fields.radius).toBeDefined()
      expect(body.issues.map((i: { path: string }) => i.path)).toEqual(['center.1', 'radius'])
    })

    it('rejects a body of the wrong shape', async () => {
      const res = await send(JSON.stringify([1, 2, 3]))
      expect(res.status).toBe(400)
      const body = await res.json()
      expect(body.form).toHaveLength(1)
    })
  })

  describe('isResponse', () => {
    it('returns true for Response instances', () => {
      expect(isResponse(new Response())).toBe(true)
    })

    it('returns false for plain objects', () => {
      expect(isResponse({ center: [0, 0, 0] })).toBe(false)
      expect(isResponse(null)).toBe(false)
      expect(isResponse(42)).toBe(false)
    })
  })
})
