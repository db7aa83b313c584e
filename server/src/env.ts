import proxyaddr from 'proxy-addr'
import { z } from 'zod'
import { ConfigurationUnavailableError } from './errors.js'

const PLACEHOLDER_MARKERS = ['REPLACE_WITH', 'PLACEHOLDER', 'CHANGE-ME', 'CHANGE_ME', 'YOUR-']

export function containsPlaceholder(value: string): boolean {
  const upper = value.toUpperCase()
  return PLACEHOLDER_MARKERS.some((m) => upper.includes(m))
}

const BooleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1')

// Comma-separated IPs/CIDRs (or proxy-addr names such as `loopback`), checked by compiling them.
const NetworkList = z
  .string()
  .transform((v) => v.split(',').map((s) => s.trim()).filter(Boolean))
  .superRefine((nets, ctx) => {
    for (const net of nets) {
      try {
        proxyaddr.compile(net)
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid network "${net}"` })
      }
    }
  })

const PRIVATE_NETWORKS = '10.0.0.0/8,172.16.0.0/12,192.168.0.0/16'

const EnvSchema = z.object({
  // chatbox.cors_allowed_origins: comma-separated origins, empty disables CORS.
  CHATBOX_CORS_ALLOWED_ORIGINS: z
    .string()
    .default('')
    .refine((v) => !containsPlaceholder(v), {
      message: 'contains a placeholder value, set actual origins before deploying',
    }),
  CHATBOX_CORS_ALLOW_CREDENTIALS: BooleanFlag.default('true'),
  // Skip (and log) entries that are not serialized http(s) origins.
  CHATBOX_CORS_VALIDATE_ORIGINS: BooleanFlag.default('true'),
  CHATBOX_PATH_PREFIX: z
    .string()
    .min(1)
    .regex(/^\//, "must start with '/'")
    .refine((v) => v === '/' || !v.endsWith('/'), { message: "must not end with '/'" })
    .default('/chatbox'),
  // Per-IP requests per minute on health and metrics endpoints.
  CHATBOX_PUBLIC_RATE_LIMIT: z.coerce.number().int().positive().default(60),
  // X-Forwarded-For is honored only from these peers.
  CHATBOX_TRUSTED_PROXIES: NetworkList.default(PRIVATE_NETWORKS),
  // Empty allows every client (development).
  CHATBOX_METRICS_ALLOWED_NETWORKS: NetworkList.default(`${PRIVATE_NETWORKS},127.0.0.0/8`),
  PORT: z.coerce.number().int().positive().default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
})

export type Env = z.infer<typeof EnvSchema>

export function loadEnv(input: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(input)
  if (!parsed.success) {
    throw new ConfigurationUnavailableError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`))
  }
  return parsed.data
}
