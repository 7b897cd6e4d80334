// OpenAI Provider using Vercel AI SDK

import { createOpenAI } from '@ai-sdk/openai'
import { generateText as aiGenerateText } from 'ai'
import type { GenerateTextRequest, SummaryProvider } from '../types.ts'
import { mapToProviderError } from '../types.ts'
import { debugLog } from '../../../debug/logger.ts'

// ============================================================================
// OpenAIProvider
// ============================================================================

export class OpenAIProvider implements SummaryProvider {
  readonly type = 'openai' as const
  readonly displayName = 'OpenAI (Vercel AI SDK)'

  private readonly openai: ReturnType<typeof createOpenAI>

  constructor(apiKey: string) {
    this.openai = createOpenAI({ apiKey })
  }

  async generateText(request: GenerateTextRequest): Promise<string> {
    debugLog.info('OpenAI: Generating text', {
      model: request.model,
      promptLength: request.userPrompt.length,
    })

    try {
      const { text } = await aiGenerateText({
        model: this.openai(request.model),
        system: request.systemPrompt,
        prompt: request.userPrompt,
        maxTokens: request.maxOutputTokens,
        maxRetries: 0,
      })

      debugLog.info('OpenAI: Generation complete', {
        totalLength: text.length,
      })

      return text.trim()
    } catch (err) {
      const mapped = mapToProviderError(err, this.type)
      debugLog.error('OpenAI: Generation failed', {
        kind: mapped.kind,
        message: mapped.message,
      })
      throw mapped
    }
  }
}
