// Configuration types for commit-digest
import { z } from 'zod'

// ============================================================================
// Provider Types
// ============================================================================

export type AIProvider = 'openai' | 'anthropic'

export const AI_PROVIDERS = ['openai', 'anthropic'] as const satisfies readonly AIProvider[]

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Get the default API key environment variable for a provider
 */
export function getDefaultApiKeyEnvVar(provider: AIProvider): string {
  switch (provider) {
    case 'openai':
      return 'OPENAI_API_KEY'
    case 'anthropic':
      return 'ANTHROPIC_API_KEY'
  }
}

export function getDefaultModel(provider: AIProvider): string {
  switch (provider) {
    case 'openai':
      return 'gpt-4o-mini'
    case 'anthropic':
      return 'claude-sonnet-4-5-20250929'
  }
}

export function getProviderDisplayName(provider: AIProvider): string {
  switch (provider) {
    case 'openai':
      return 'OpenAI (Vercel AI SDK)'
    case 'anthropic':
      return 'Anthropic SDK'
  }
}

// ============================================================================
// Schemas
// ============================================================================

export const RepositoryConfigSchema = z.object({
  owner: z.string().min(1, 'owner is required'),
  name: z.string().min(1, 'name is required'),
  defaultBranch: z.string().min(1).default('main'),
})

export const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(3000),
})

/**
 * Top-level settings. `repositories` is validated entry by entry in
 * config.ts so one broken entry does not take the whole file down.
 */
export const DigestSettingsSchema = z.object({
  provider: z.enum(AI_PROVIDERS).default('openai'),
  model: z.string().min(1).optional(),
  apiKeyEnvVar: z.string().min(1).optional(),
  maxInputChars: z.number().int().positive().default(120_000),
  transcriptsDir: z.string().min(1).default('transcripts'),
  commitLimit: z.number().int().min(1).max(100).default(20),
  releaseKeyword: z.string().min(1).default('production'),
  server: ServerConfigSchema.default({}),
  repositories: z.record(z.unknown()).default({}),
})

// ============================================================================
// Config Types
// ============================================================================

export type RepositoryConfig = z.infer<typeof RepositoryConfigSchema>

export type ServerConfig = z.infer<typeof ServerConfigSchema>

export type DigestConfig = {
  provider: AIProvider
  model: string
  apiKeyEnvVar: string
  maxInputChars: number
  transcriptsDir: string
  commitLimit: number
  releaseKeyword: string
  server: ServerConfig
  /** Valid repository entries, keyed by the name users select them by */
  repositories: Record<string, RepositoryConfig>
  /** Entries that failed validation, with the reason */
  invalidRepositories: Record<string, string>
}

export const DEFAULT_CONFIG: DigestConfig = {
  provider: 'openai',
  model: getDefaultModel('openai'),
  apiKeyEnvVar: getDefaultApiKeyEnvVar('openai'),
  maxInputChars: 120_000,
  transcriptsDir: 'transcripts',
  commitLimit: 20,
  releaseKeyword: 'production',
  server: { port: 3000 },
  repositories: {},
  invalidRepositories: {},
}

// ============================================================================
// Credentials & Context
// ============================================================================

export type Credentials = {
  githubToken: string
  modelApiKey: string
}

/**
 * Everything the process needs, built once at startup and passed down
 * explicitly. Never mutated after construction.
 */
export type AppContext = Readonly<{
  config: Readonly<DigestConfig>
  credentials: Readonly<Credentials>
  configPath: string
}>
