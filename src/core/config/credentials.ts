import type { Credentials } from '../types'
import { ConfigLoadError } from './errors'

/**
 * Reads the target site's login from `SWEEP_EMAIL` / `SWEEP_PASSWORD`
 */
export function resolveCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  const email = env.SWEEP_EMAIL?.trim()
  const password = env.SWEEP_PASSWORD

  if (!email || !password) {
    throw new ConfigLoadError('SWEEP_EMAIL and SWEEP_PASSWORD must be set (environment or .env file)')
  }
  return { email, password }
}
