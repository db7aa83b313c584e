import { WILDCARD, type OriginList } from './originList.js'

export type CorsDecision = {
  allowed: boolean
  /** Value for Access-Control-Allow-Origin; set only when allowed. */
  allowOrigin?: string
  allowCredentials: boolean
}

const DENIED: CorsDecision = Object.freeze({ allowed: false, allowCredentials: false })

export function matchOrigin(origin: string | undefined, list: OriginList, allowCredentials: boolean): CorsDecision {
  if (!origin) return DENIED

  switch (list.kind) {
    case 'disabled':
      return DENIED
    case 'all':
      // Browsers reject `*` on credentialed requests, so reflect the caller instead.
      return { allowed: true, allowOrigin: allowCredentials ? origin : WILDCARD, allowCredentials }
    case 'list':
      // exact, case-sensitive match only
      if (!list.origins.has(origin)) return DENIED
      return { allowed: true, allowOrigin: origin, allowCredentials }
  }
}
