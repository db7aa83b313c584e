/**
 * Startup could not obtain a usable configuration (missing/invalid env, placeholder values).
 * Fatal: the process must not fall back to a permissive CORS policy.
 */
export class ConfigurationUnavailableError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid environment:\n${issues.join('\n')}`)
    this.name = 'ConfigurationUnavailableError'
    this.issues = issues
  }
}

/** A single allow-list entry that is not a serialized `scheme://host[:port]` origin. */
export class MalformedOriginError extends Error {
  readonly entry: string

  constructor(entry: string, reason: string) {
    super(`Malformed CORS origin "${entry}": ${reason}`)
    this.name = 'MalformedOriginError'
    this.entry = entry
  }
}
