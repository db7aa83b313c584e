import { MalformedOriginError } from '../errors.js'

export type OriginList =
  | { readonly kind: 'disabled' }
  | { readonly kind: 'all' }
  | { readonly kind: 'list'; readonly origins: ReadonlySet<string> }

export type ParseOriginListOptions = {
  /** Reject entries that are not serialized http(s) origins. Defaults to true. */
  validate?: boolean
  /** Called once per skipped entry. */
  onMalformed?: (err: MalformedOriginError) => void
}

export const WILDCARD = '*'

const DISABLED: OriginList = Object.freeze({ kind: 'disabled' })
const ALLOW_ALL: OriginList = Object.freeze({ kind: 'all' })

export function splitOrigins(raw: string | undefined | null): string[] {
  return String(raw ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
}

/**
 * Returns the reason an entry is not a usable origin, or null when it is.
 * The entry must already be in serialized form: `new URL(entry).origin === entry`.
 */
export function originSyntaxError(entry: string): string | null {
  let url: URL
  try {
    url = new URL(entry)
  } catch {
    return 'not an absolute URL'
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return `unsupported scheme ${url.protocol}`
  // Catches trailing slashes, paths, default ports and upper-case hosts.
  if (url.origin !== entry) return `expected "${url.origin}"`
  return null
}

export function parseOriginList(raw: string | undefined | null, opts: ParseOriginListOptions = {}): OriginList {
  const validate = opts.validate ?? true
  const entries = splitOrigins(raw)
  if (entries.length === 0) return DISABLED
  if (entries.includes(WILDCARD)) return ALLOW_ALL

  const origins = new Set<string>()
  for (const entry of entries) {
    if (validate) {
      const reason = originSyntaxError(entry)
      if (reason) {
        opts.onMalformed?.(new MalformedOriginError(entry, reason))
        continue
      }
    }
    origins.add(entry)
  }

  if (origins.size === 0) return DISABLED
  return Object.freeze({ kind: 'list', origins })
}

export function describeOriginList(list: OriginList): string {
  switch (list.kind) {
    case 'disabled':
      return 'disabled'
    case 'all':
      return 'all'
    case 'list':
      return `${list.origins.size} origin(s)`
  }
}
