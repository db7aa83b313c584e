import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify'
import type { InMemoryRateLimiter } from '../lib/rateLimit.js'

/** Per-client throttle for unauthenticated endpoints. `req.ip` only follows trusted proxies. */
export function publicRateLimit(app: FastifyInstance, limiter: InMemoryRateLimiter) {
  return async (req: FastifyRequest, reply: FastifyReply): Promise<void> => {
    if (req.method === 'OPTIONS') return
    const limit = limiter.hit(req.ip)
    if (!limit.allowed) {
      req.log.warn({ ip: req.ip }, 'Public endpoint rate limit exceeded')
      reply.header('retry-after', String(limit.retryAfterSeconds))
      throw app.httpErrors.tooManyRequests('Too many requests.')
    }
  }
}
