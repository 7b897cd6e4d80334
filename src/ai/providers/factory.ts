// Provider factory

import type { ProviderType, SummaryProvider } from './types.ts'
import type { AppContext } from '../../config/types.ts'
import { OpenAIProvider } from './openai/index.ts'
import { AnthropicProvider } from './anthropic/index.ts'
import { debugLog } from '../../debug/logger.ts'

/**
 * Create the provider named by the config, keyed with the model credential
 * from the startup context.
 */
export function createProvider(type: ProviderType, apiKey: string): SummaryProvider {
  switch (type) {
    case 'openai':
      return new OpenAIProvider(apiKey)
    case 'anthropic':
      return new AnthropicProvider(apiKey)
  }
}

export function getProvider(context: AppContext): SummaryProvider {
  const provider = createProvider(context.config.provider, context.credentials.modelApiKey)
  debugLog.info(`Provider initialized: ${provider.displayName}`, {
    type: provider.type,
    model: context.config.model,
  })
  return provider
}
