import type { FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

export const SECURITY_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  'X-Content-Type-Options': 'nosniff',
  'X-Frame-Options': 'DENY',
  'Referrer-Policy': 'strict-origin-when-cross-origin',
  'X-XSS-Protection': '1; mode=block',
})

export const securityHeadersPlugin: FastifyPluginAsync = fp(
  async (app) => {
    app.addHook('onRequest', async (_req, reply) => {
      reply.headers(SECURITY_HEADERS)
    })
  },
  { name: 'chatbox-security-headers' },
)
