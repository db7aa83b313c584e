import type { FastifyInstance } from 'fastify'
import { vi } from 'vitest'
import { buildApp } from '../src/app.js'
import type { CorsLogger } from '../src/cors/policy.js'
import { loadEnv } from '../src/env.js'

export const ALLOWED = ['http://localhost:3000', 'https://example.com']

export async function buildTestApp(env: Record<string, string | undefined> = {}): Promise<FastifyInstance> {
  const app = buildApp(
    loadEnv({
      LOG_LEVEL: 'silent',
      CHATBOX_CORS_ALLOWED_ORIGINS: ALLOWED.join(','),
      ...env,
    }),
  )
  await app.ready()
  return app
}

export function corsHeadersOf(headers: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(headers).filter(([k]) => k.startsWith('access-control-')))
}

export function fakeLogger() {
  return { info: vi.fn(), warn: vi.fn() } satisfies CorsLogger
}
