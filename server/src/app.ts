import Fastify from 'fastify'
import sensible from '@fastify/sensible'
import swagger from '@fastify/swagger'
import swaggerUi from '@fastify/swagger-ui'
import { loadEnv, type Env } from './env.js'
import { CorsPolicy } from './cors/policy.js'
import { MetricsRegistry } from './lib/metrics.js'
import { InMemoryRateLimiter } from './lib/rateLimit.js'
import { corsPlugin } from './plugins/cors.js'
import { metricsPlugin } from './plugins/metrics.js'
import { securityHeadersPlugin } from './plugins/securityHeaders.js'
import { healthRoutes } from './routes/health.js'
import { metricsRoutes } from './routes/metrics.js'

export function buildApp(env: Env = loadEnv()) {
  const app = Fastify({
    logger: { level: env.LOG_LEVEL },
    // req.ip follows X-Forwarded-For only when the peer is one of these.
    trustProxy: env.CHATBOX_TRUSTED_PROXIES,
  })

  app.register(sensible)
  app.register(metricsPlugin, { registry: new MetricsRegistry() })
  app.register(securityHeadersPlugin)

  const policy = new CorsPolicy(
    {
      allowedOrigins: env.CHATBOX_CORS_ALLOWED_ORIGINS,
      allowCredentials: env.CHATBOX_CORS_ALLOW_CREDENTIALS,
      validateOrigins: env.CHATBOX_CORS_VALIDATE_ORIGINS,
    },
    app.log,
  )
  app.register(corsPlugin, { policy })

  const prefix = env.CHATBOX_PATH_PREFIX === '/' ? '' : env.CHATBOX_PATH_PREFIX
  app.log.info({ prefix: prefix || '/' }, 'Using HTTP path prefix')

  app.register(swagger, {
    openapi: {
      info: {
        title: 'Chatbox API',
        version: '1.0.0',
      },
    },
  })
  app.register(swaggerUi, { routePrefix: `${prefix}/docs` })

  const publicLimiter = new InMemoryRateLimiter({ windowMs: 60_000, maxHits: env.CHATBOX_PUBLIC_RATE_LIMIT })
  app.addHook('onClose', async () => publicLimiter.dispose())

  app.register(healthRoutes, { prefix, limiter: publicLimiter })
  app.register(metricsRoutes, {
    prefix,
    limiter: publicLimiter,
    allowedNetworks: env.CHATBOX_METRICS_ALLOWED_NETWORKS,
  })

  return app
}
