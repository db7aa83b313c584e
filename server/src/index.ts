import 'dotenv/config'
import { pino } from 'pino'
import { buildApp } from './app.js'
import { loadEnv } from './env.js'
import { ConfigurationUnavailableError } from './errors.js'

// Configuration is not loaded yet, so startup failures go through a default-level logger.
const bootLog = pino({ name: 'chatbox' })

async function main() {
  const env = loadEnv()
  const app = buildApp(env)
  try {
    await app.listen({ port: env.PORT, host: env.HOST })
  } catch (err) {
    app.log.error(err)
    process.exitCode = 1
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationUnavailableError) {
    bootLog.fatal({ issues: err.issues }, 'Invalid configuration, refusing to start')
  } else {
    bootLog.fatal({ err }, 'Startup failed')
  }
  process.exitCode = 1
})
