// Configuration management for commit-digest
import { existsSync, readFileSync, writeFileSync } from 'fs'
import { parse as parseYaml } from 'yaml'
import {
  type DigestConfig,
  type RepositoryConfig,
  DEFAULT_CONFIG,
  DigestSettingsSchema,
  RepositoryConfigSchema,
  getDefaultApiKeyEnvVar,
  getDefaultModel,
} from './types.ts'
import { getConfigPath } from './paths.ts'
import { parseRepoUrl } from '../github/client.ts'
import { ConfigurationError } from '../core/errors.ts'

export type ConfigLoadResult =
  | { status: 'loaded'; config: DigestConfig; configPath: string }
  | { status: 'created'; config: DigestConfig; configPath: string; message: string }
  | { status: 'error'; error: string; configPath: string }

export type LoadConfigOptions = {
  /** Value of --config, if given */
  path?: string
  cwd?: string
}

const STARTER_CONFIG = `# commit-digest configuration
provider: openai
model: gpt-4o-mini
transcriptsDir: transcripts
commitLimit: 20

repositories: {}
  # widgets:
  #   owner: acme
  #   name: widgets
  #   defaultBranch: main
`

/**
 * Format zod issues as "path: message" fragments.
 */
function describeIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

/**
 * Parse YAML text into a config. Only top-level problems are fatal;
 * a broken repository entry lands in `invalidRepositories`.
 */
export function parseConfig(content: string): DigestConfig {
  let raw: unknown
  try {
    raw = parseYaml(content) ?? {}
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigurationError(`Config is not valid YAML: ${message}`, { cause: err })
  }

  const parsed = DigestSettingsSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config: ${describeIssues(parsed.error.issues)}`)
  }

  const settings = parsed.data
  const repositories: Record<string, RepositoryConfig> = {}
  const invalidRepositories: Record<string, string> = {}

  for (const [name, entry] of Object.entries(settings.repositories)) {
    if (typeof entry === 'string') {
      const info = parseRepoUrl(entry)
      if (info) {
        repositories[name] = { owner: info.owner, name: info.repo, defaultBranch: 'main' }
      } else {
        invalidRepositories[name] = `"${entry}" is not a GitHub repository reference`
      }
      continue
    }

    const result = RepositoryConfigSchema.safeParse(entry)
    if (result.success) {
      repositories[name] = result.data
    } else {
      invalidRepositories[name] = describeIssues(result.error.issues)
    }
  }

  return {
    provider: settings.provider,
    model: settings.model ?? getDefaultModel(settings.provider),
    apiKeyEnvVar: settings.apiKeyEnvVar ?? getDefaultApiKeyEnvVar(settings.provider),
    maxInputChars: settings.maxInputChars,
    transcriptsDir: settings.transcriptsDir,
    commitLimit: settings.commitLimit,
    releaseKeyword: settings.releaseKeyword,
    server: settings.server,
    repositories,
    invalidRepositories,
  }
}

/**
 * Load config from --config or ./commit-digest.yaml.
 * When the default file doesn't exist, write a starter file.
 */
export function loadConfig(options: LoadConfigOptions = {}): ConfigLoadResult {
  const configPath = getConfigPath(options.path, options.cwd)

  try {
    if (existsSync(configPath)) {
      const content = readFileSync(configPath, 'utf-8')
      return { status: 'loaded', config: parseConfig(content), configPath }
    }

    if (options.path) {
      return { status: 'error', error: `Config file not found: ${configPath}`, configPath }
    }

    writeFileSync(configPath, STARTER_CONFIG, 'utf-8')

    const message =
      `Created config at ${configPath}\n` +
      `Add the repositories you want to summarize under "repositories".`

    return { status: 'created', config: { ...DEFAULT_CONFIG }, configPath, message }
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err)
    return { status: 'error', error: `Failed to load config: ${error}`, configPath }
  }
}

/**
 * Look up a repository by the name it was configured under.
 * Missing or malformed entries fail this selection only.
 */
export function resolveRepository(config: DigestConfig, name: string): RepositoryConfig {
  const trimmed = name.trim()
  if (Object.hasOwn(config.repositories, trimmed)) {
    return config.repositories[trimmed]
  }

  if (Object.hasOwn(config.invalidRepositories, trimmed)) {
    const invalid = config.invalidRepositories[trimmed]
    throw new ConfigurationError(`Repository "${trimmed}" is misconfigured: ${invalid}`)
  }

  throw new ConfigurationError(`Repository "${trimmed}" is not configured`)
}

export function listRepositoryNames(config: DigestConfig): string[] {
  return Object.keys(config.repositories).sort()
}
