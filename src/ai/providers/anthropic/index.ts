// Anthropic SDK Provider

import Anthropic from '@anthropic-ai/sdk'
import type { GenerateTextRequest, SummaryProvider } from '../types.ts'
import { mapToProviderError } from '../types.ts'
import { debugLog } from '../../../debug/logger.ts'

const DEFAULT_MAX_TOKENS = 4096

// ============================================================================
// AnthropicProvider
// ============================================================================

export class AnthropicProvider implements SummaryProvider {
  readonly type = 'anthropic' as const
  readonly displayName = 'Anthropic SDK'

  private readonly client: Anthropic

  constructor(apiKey: string) {
    this.client = new Anthropic({ apiKey, maxRetries: 0 })
  }

  async generateText(request: GenerateTextRequest): Promise<string> {
    debugLog.info('Anthropic: Generating text', {
      model: request.model,
      promptLength: request.userPrompt.length,
    })

    try {
      const response = await this.client.messages.create({
        model: request.model,
        system: request.systemPrompt,
        messages: [{ role: 'user', content: request.userPrompt }],
        max_tokens: request.maxOutputTokens ?? DEFAULT_MAX_TOKENS,
      })

      const textContent = response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('')

      debugLog.info('Anthropic: Generation complete', {
        totalLength: textContent.length,
        stopReason: response.stop_reason,
      })

      return textContent.trim()
    } catch (err) {
      const mapped = mapToProviderError(err, this.type)
      debugLog.error('Anthropic: Generation failed', {
        kind: mapped.kind,
        message: mapped.message,
      })
      throw mapped
    }
  }
}
