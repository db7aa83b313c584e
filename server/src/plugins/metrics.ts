import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'
import type { MetricsRegistry } from '../lib/metrics.js'

declare module 'fastify' {
  interface FastifyInstance {
    metrics: MetricsRegistry
  }
}

/** Observes every response, preflights and rejected requests included. */
export const metricsPlugin: FastifyPluginAsync<{ registry: MetricsRegistry }> = fp(
  async (app: FastifyInstance, opts: { registry: MetricsRegistry }) => {
    app.decorate('metrics', opts.registry)

    app.addHook('onResponse', async (req, reply) => {
      opts.registry.httpRequestDuration.observe(
        { endpoint: req.routeOptions.url ?? 'unmatched', method: req.method },
        reply.elapsedTime / 1000,
      )
    })
  },
  { name: 'chatbox-metrics' },
)
