import type { CorsDecision } from './originMatcher.js'

export type HeaderValue = string | string[] | undefined
export type RequestHeaders = Record<string, HeaderValue>

export type CorsRequest = {
  method: string
  url: string
  /** Lower-cased header names, as Node delivers them. */
  headers: RequestHeaders
}

export type CorsResponse = {
  status: number
  headers: Record<string, string>
  body?: unknown
}

export type PreflightSpec = {
  readonly allowedMethods: readonly string[]
  readonly allowedHeaders: readonly string[]
  readonly allowCredentials: boolean
  readonly maxAgeSeconds: number
}

export const DEFAULT_ALLOWED_METHODS = Object.freeze(['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'])
export const DEFAULT_ALLOWED_HEADERS = Object.freeze(['Origin', 'Content-Type', 'Accept', 'Authorization'])
export const DEFAULT_MAX_AGE_SECONDS = 12 * 60 * 60

export function buildPreflightSpec(allowCredentials: boolean): PreflightSpec {
  return Object.freeze({
    allowedMethods: DEFAULT_ALLOWED_METHODS,
    allowedHeaders: DEFAULT_ALLOWED_HEADERS,
    allowCredentials,
    maxAgeSeconds: DEFAULT_MAX_AGE_SECONDS,
  })
}

export function headerValue(headers: RequestHeaders, name: string): string {
  const v = headers[name.toLowerCase()]
  return String((Array.isArray(v) ? v[0] : v) ?? '').trim()
}

export function isPreflightRequest(req: Pick<CorsRequest, 'method' | 'headers'>): boolean {
  if (req.method.toUpperCase() !== 'OPTIONS') return false
  return headerValue(req.headers, 'access-control-request-method') !== ''
}

export function respondToPreflight(decision: CorsDecision, spec: PreflightSpec): CorsResponse {
  if (!decision.allowed || !decision.allowOrigin) return { status: 204, headers: {} }

  const headers: Record<string, string> = {
    'Access-Control-Allow-Origin': decision.allowOrigin,
    'Access-Control-Allow-Methods': spec.allowedMethods.join(', '),
    'Access-Control-Allow-Headers': spec.allowedHeaders.join(', '),
  }
  if (decision.allowCredentials && spec.allowCredentials) headers['Access-Control-Allow-Credentials'] = 'true'
  headers['Access-Control-Max-Age'] = String(spec.maxAgeSeconds)
  return { status: 204, headers }
}
