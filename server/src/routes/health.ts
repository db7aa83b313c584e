import type { FastifyPluginAsync } from 'fastify'
import { describeOriginList } from '../cors/originList.js'
import type { InMemoryRateLimiter } from '../lib/rateLimit.js'
import { publicRateLimit } from './publicRateLimit.js'

export const healthRoutes: FastifyPluginAsync<{ limiter: InMemoryRateLimiter }> = async (app, opts) => {
  app.addHook('onRequest', publicRateLimit(app, opts.limiter))

  app.get('/healthz', async () => ({ status: 'ok' }))

  app.get('/readyz', async () => ({
    status: 'ready',
    cors: describeOriginList(app.corsPolicy.origins),
  }))

  // Plain OPTIONS (no Access-Control-Request-Method) is an application request.
  app.options('/healthz', async (_req, reply) => reply.code(204).header('allow', 'GET, OPTIONS').send())
}
