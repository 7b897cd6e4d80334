// Summarization client: fill a prompt template with a diff and run one
// inference request

import type { AppContext } from '../config/types.ts'
import type { SummaryProvider } from './providers/types.ts'
import { mapToProviderError } from './providers/types.ts'
import { getProvider } from './providers/factory.ts'
import { fillTemplate } from './prompts/render.ts'
import type { PromptTemplate, PromptValues } from './prompts/types.ts'
import { InputTooLargeError, ModelError } from '../core/errors.ts'
import { debugLog } from '../debug/logger.ts'

/**
 * What the session controller and HTTP facade depend on.
 */
export interface SummarizationClient {
  summarize(diffText: string, template: PromptTemplate, values?: Omit<PromptValues, 'diff'>): Promise<string>
}

export type SummarizerOptions = {
  model: string
  /** Prompts longer than this (system + user, in characters) are refused */
  maxInputChars: number
  maxOutputTokens?: number
}

export class Summarizer implements SummarizationClient {
  constructor(
    private readonly provider: SummaryProvider,
    private readonly options: SummarizerOptions,
  ) {}

  async summarize(
    diffText: string,
    template: PromptTemplate,
    values: Omit<PromptValues, 'diff'> = {},
  ): Promise<string> {
    const prompt = fillTemplate(template, { ...values, diff: diffText })
    const inputLength = prompt.system.length + prompt.user.length

    if (inputLength > this.options.maxInputChars) {
      debugLog.warn('Summarizer: prompt over input limit', {
        template: template.id,
        inputLength,
        limit: this.options.maxInputChars,
      })
      throw new InputTooLargeError(
        `Prompt is ${inputLength} characters; the limit is ${this.options.maxInputChars}`,
        { inputLength, limit: this.options.maxInputChars },
      )
    }

    debugLog.info('Summarizer: sending request', {
      provider: this.provider.type,
      model: this.options.model,
      template: template.id,
      reference: values.reference,
      inputLength,
    })

    let text: string
    try {
      text = await this.provider.generateText({
        model: this.options.model,
        systemPrompt: prompt.system,
        userPrompt: prompt.user,
        maxOutputTokens: this.options.maxOutputTokens,
      })
    } catch (err) {
      throw mapToProviderError(err, this.provider.type)
    }

    if (!text) {
      throw new ModelError(`${this.provider.type}: model returned an empty summary`)
    }

    debugLog.info('Summarizer: summary received', {
      template: template.id,
      reference: values.reference,
      length: text.length,
    })

    return text
  }
}

export function createSummarizer(context: AppContext): Summarizer {
  return new Summarizer(getProvider(context), {
    model: context.config.model,
    maxInputChars: context.config.maxInputChars,
  })
}
