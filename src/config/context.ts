// Startup context: config + credentials, built once and passed explicitly
import type { AppContext, Credentials, DigestConfig } from './types.ts'
import { loadConfig, type LoadConfigOptions } from './config.ts'
import { ConfigurationError } from '../core/errors.ts'

export const GITHUB_TOKEN_ENV_VAR = 'GITHUB_TOKEN'

type Env = Record<string, string | undefined>

/**
 * Read both credentials from the environment. Either one missing is fatal.
 */
export function readCredentials(config: DigestConfig, env: Env = process.env): Credentials {
  const githubToken = env[GITHUB_TOKEN_ENV_VAR]?.trim()
  const modelApiKey = env[config.apiKeyEnvVar]?.trim()

  const missing: string[] = []
  if (!githubToken) missing.push(GITHUB_TOKEN_ENV_VAR)
  if (!modelApiKey) missing.push(config.apiKeyEnvVar)

  if (!githubToken || !modelApiKey) {
    throw new ConfigurationError(
      `Missing required environment variable${missing.length > 1 ? 's' : ''}: ${missing.join(', ')}`,
    )
  }

  return { githubToken, modelApiKey }
}

export function createAppContext(
  config: DigestConfig,
  configPath: string,
  env: Env = process.env,
): AppContext {
  const credentials = readCredentials(config, env)
  return Object.freeze({
    config: Object.freeze({ ...config }),
    credentials: Object.freeze(credentials),
    configPath,
  })
}

export type BootstrapResult = {
  context: AppContext
  /** Set when a starter config file was written */
  notice?: string
}

/**
 * Load config and credentials. Throws ConfigurationError before any UI or
 * server work starts.
 */
export function bootstrapContext(
  options: LoadConfigOptions = {},
  env: Env = process.env,
): BootstrapResult {
  const result = loadConfig(options)

  switch (result.status) {
    case 'error':
      throw new ConfigurationError(result.error)
    case 'created':
      return {
        context: createAppContext(result.config, result.configPath, env),
        notice: result.message,
      }
    case 'loaded':
      return { context: createAppContext(result.config, result.configPath, env) }
  }
}
