import type { FastifyPluginAsync } from 'fastify'
import proxyaddr from 'proxy-addr'
import type { InMemoryRateLimiter } from '../lib/rateLimit.js'
import { publicRateLimit } from './publicRateLimit.js'

export const metricsRoutes: FastifyPluginAsync<{ limiter: InMemoryRateLimiter; allowedNetworks: string[] }> = async (
  app,
  opts,
) => {
  const inAllowedNetwork = opts.allowedNetworks.length > 0 ? proxyaddr.compile(opts.allowedNetworks) : null

  app.addHook('onRequest', async (req) => {
    if (inAllowedNetwork && !inAllowedNetwork(req.ip, 0)) {
      req.log.warn({ ip: req.ip }, 'Metrics access denied from unauthorized network')
      throw app.httpErrors.forbidden('Forbidden.')
    }
  })
  app.addHook('onRequest', publicRateLimit(app, opts.limiter))

  app.get('/metrics/prometheus', { schema: { hide: true } }, async (_req, reply) => {
    return reply.type('text/plain; version=0.0.4; charset=utf-8').send(app.metrics.expose())
  })
}
