import { describe, expect, it } from 'vitest'
import { containsPlaceholder, loadEnv } from '../src/env.js'
import { ConfigurationUnavailableError } from '../src/errors.js'

function issuesOf(input: Record<string, string>): string[] {
  try {
    loadEnv(input)
  } catch (err) {
    if (err instanceof ConfigurationUnavailableError) return err.issues
    throw err
  }
  return []
}

describe('loadEnv', () => {
  it('applies defaults with CORS disabled', () => {
    expect(loadEnv({})).toEqual({
      CHATBOX_CORS_ALLOWED_ORIGINS: '',
      CHATBOX_CORS_ALLOW_CREDENTIALS: true,
      CHATBOX_CORS_VALIDATE_ORIGINS: true,
      CHATBOX_PATH_PREFIX: '/chatbox',
      CHATBOX_PUBLIC_RATE_LIMIT: 60,
      CHATBOX_TRUSTED_PROXIES: ['10.0.0.0/8', '172.16.0.0/12', '192.168.0.0/16'],
      CHATBOX_METRICS_ALLOWED_NETWORKS: ['10.0.0.0/8', '172.16.0.0/12', '192.168.0.0/16', '127.0.0.0/8'],
      PORT: 8080,
      HOST: '0.0.0.0',
      LOG_LEVEL: 'info',
    })
  })

  it('parses boolean flags and numbers', () => {
    const env = loadEnv({
      CHATBOX_CORS_ALLOW_CREDENTIALS: 'false',
      CHATBOX_CORS_VALIDATE_ORIGINS: '0',
      CHATBOX_PUBLIC_RATE_LIMIT: '10',
      PORT: '9000',
    })
    expect(env.CHATBOX_CORS_ALLOW_CREDENTIALS).toBe(false)
    expect(env.CHATBOX_CORS_VALIDATE_ORIGINS).toBe(false)
    expect(env.CHATBOX_PUBLIC_RATE_LIMIT).toBe(10)
    expect(env.PORT).toBe(9000)
  })

  it('rejects placeholder origins instead of defaulting', () => {
    expect(() => loadEnv({ CHATBOX_CORS_ALLOWED_ORIGINS: 'https://your-app.example' })).toThrow(
      ConfigurationUnavailableError,
    )
    expect(issuesOf({ CHATBOX_CORS_ALLOWED_ORIGINS: 'REPLACE_WITH_ORIGINS' })).toEqual([
      'CHATBOX_CORS_ALLOWED_ORIGINS: contains a placeholder value, set actual origins before deploying',
    ])
  })

  it('validates the path prefix', () => {
    expect(issuesOf({ CHATBOX_PATH_PREFIX: 'chatbox' })).toEqual(["CHATBOX_PATH_PREFIX: must start with '/'"])
    expect(issuesOf({ CHATBOX_PATH_PREFIX: '/chatbox/' })).toEqual(["CHATBOX_PATH_PREFIX: must not end with '/'"])
    expect(loadEnv({ CHATBOX_PATH_PREFIX: '/' }).CHATBOX_PATH_PREFIX).toBe('/')
  })

  it('parses and validates network lists', () => {
    expect(loadEnv({ CHATBOX_TRUSTED_PROXIES: ' 127.0.0.1 ,, 10.0.0.0/8' }).CHATBOX_TRUSTED_PROXIES).toEqual([
      '127.0.0.1',
      '10.0.0.0/8',
    ])
    expect(loadEnv({ CHATBOX_METRICS_ALLOWED_NETWORKS: '' }).CHATBOX_METRICS_ALLOWED_NETWORKS).toEqual([])
    expect(issuesOf({ CHATBOX_TRUSTED_PROXIES: '10.0.0.0/8,not-an-ip' })).toEqual([
      'CHATBOX_TRUSTED_PROXIES: invalid network "not-an-ip"',
    ])
  })

  it('rejects unknown boolean spellings', () => {
    expect(issuesOf({ CHATBOX_CORS_ALLOW_CREDENTIALS: 'yes' })).toHaveLength(1)
  })
})

describe('containsPlaceholder', () => {
  it('matches markers case-insensitively', () => {
    expect(containsPlaceholder('https://change-me.example')).toBe(true)
    expect(containsPlaceholder('placeholder')).toBe(true)
    expect(containsPlaceholder('https://example.com,http://localhost:3000')).toBe(false)
  })
})
