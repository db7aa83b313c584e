import type { FastifyBaseLogger } from 'fastify'
import { describeOriginList, parseOriginList, type OriginList } from './originList.js'
import { matchOrigin, type CorsDecision } from './originMatcher.js'
import {
  buildPreflightSpec,
  headerValue,
  isPreflightRequest,
  respondToPreflight,
  type CorsRequest,
  type CorsResponse,
  type PreflightSpec,
} from './preflight.js'

export type CorsPolicyConfig = {
  /** Comma-separated allow-list; empty disables CORS. */
  allowedOrigins: string
  allowCredentials: boolean
  validateOrigins: boolean
}

export type CorsLogger = Pick<FastifyBaseLogger, 'info' | 'warn'>

export type Handler = (req: CorsRequest) => Promise<CorsResponse>

export type CorsOutcome =
  | { kind: 'pass' }
  | { kind: 'preflight'; decision: CorsDecision; response: CorsResponse }
  | { kind: 'annotate'; decision: CorsDecision; headers: Record<string, string> }

const EXPOSED_HEADERS = ['Content-Length']

/**
 * Cross-origin admission for every route.
 *
 * Holds only immutable data, so one instance serves all concurrent requests.
 * A denied origin is never rejected here: the response goes out without CORS
 * headers and the browser withholds it from the calling script.
 */
export class CorsPolicy {
  readonly origins: OriginList
  readonly preflight: PreflightSpec

  constructor(config: CorsPolicyConfig, log: CorsLogger) {
    this.origins = parseOriginList(config.allowedOrigins, {
      validate: config.validateOrigins,
      onMalformed: (err) => log.warn({ entry: err.entry }, err.message),
    })
    this.preflight = buildPreflightSpec(config.allowCredentials)

    if (this.origins.kind === 'disabled') {
      log.warn('No CORS origins configured, cross-origin requests will not be granted')
    } else {
      log.info(
        {
          allowedOrigins: this.origins.kind === 'list' ? [...this.origins.origins] : ['*'],
          allowCredentials: this.preflight.allowCredentials,
        },
        `CORS policy configured (${describeOriginList(this.origins)})`,
      )
    }
    Object.freeze(this)
  }

  decide(origin: string | undefined): CorsDecision {
    return matchOrigin(origin, this.origins, this.preflight.allowCredentials)
  }

  evaluate(req: CorsRequest): CorsOutcome {
    const origin = headerValue(req.headers, 'origin')
    if (!origin) return { kind: 'pass' }

    const decision = this.decide(origin)
    if (isPreflightRequest(req)) {
      return { kind: 'preflight', decision, response: respondToPreflight(decision, this.preflight) }
    }
    const headers = actualResponseHeaders(decision)
    if (this.variesByOrigin(decision)) headers.Vary = 'Origin'
    return { kind: 'annotate', decision, headers }
  }

  /**
   * Whether the annotation depends on the caller's Origin: always for an
   * allow-list (denials included), and for allow-all when the origin is reflected.
   */
  variesByOrigin(decision: CorsDecision): boolean {
    if (this.origins.kind === 'list') return true
    return decision.allowed && decision.allowOrigin !== '*'
  }

  async handle(req: CorsRequest, next: Handler): Promise<CorsResponse> {
    const outcome = this.evaluate(req)
    switch (outcome.kind) {
      case 'pass':
        return next(req)
      case 'preflight':
        return outcome.response
      case 'annotate': {
        const res = await next(req)
        return { ...res, headers: { ...res.headers, ...outcome.headers } }
      }
    }
  }

  wrap(next: Handler): Handler {
    return (req) => this.handle(req, next)
  }
}

export function actualResponseHeaders(decision: CorsDecision): Record<string, string> {
  if (!decision.allowed || !decision.allowOrigin) return {}

  const headers: Record<string, string> = {
    'Access-Control-Allow-Origin': decision.allowOrigin,
    'Access-Control-Expose-Headers': EXPOSED_HEADERS.join(', '),
  }
  if (decision.allowCredentials) headers['Access-Control-Allow-Credentials'] = 'true'
  return headers
}
