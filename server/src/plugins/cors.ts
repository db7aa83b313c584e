import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'
import type { CorsPolicy } from '../cors/policy.js'

declare module 'fastify' {
  interface FastifyInstance {
    corsPolicy: CorsPolicy
  }
}

/**
 * Runs the CORS policy before route dispatch. Preflights are answered from the
 * hook; every other request only gets headers attached and continues.
 */
export const corsPlugin: FastifyPluginAsync<{ policy: CorsPolicy }> = fp(
  async (app: FastifyInstance, opts: { policy: CorsPolicy }) => {
    const { policy } = opts
    app.decorate('corsPolicy', policy)

    app.addHook('onRequest', async (req, reply) => {
      const outcome = policy.evaluate({ method: req.method, url: req.url, headers: req.headers })
      switch (outcome.kind) {
        case 'pass':
          return
        case 'preflight':
          req.log.debug({ origin: req.headers.origin, allowed: outcome.decision.allowed }, 'CORS preflight')
          return reply.code(outcome.response.status).headers(outcome.response.headers).send()
        case 'annotate':
          if (!outcome.decision.allowed) {
            req.log.debug({ origin: req.headers.origin }, 'CORS origin not allowed')
          }
          reply.headers(outcome.headers)
      }
    })

    // Preflights to paths without an OPTIONS route still need a route for the hook to run on.
    app.options('*', { schema: { hide: true } }, async (_req, reply) => reply.callNotFound())
  },
  { name: 'chatbox-cors' },
)
