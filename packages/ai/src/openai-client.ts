import OpenAI from 'openai'
import { createLogger, loadEnv } from '@steward/core'
import { ChatMessage, CompleteOptions, LLMClient } from './client'

const log = createLogger('openai')

export const DEFAULT_TEMPERATURE = 0.2

export interface OpenAIChatClientOptions {
  model?: string
  apiKey?: string
  defaultSystemPrompt?: string
  temperature?: number
}

export class MissingApiKeyError extends Error {
  constructor() {
    super('An OpenAI API key is required. Set OPENAI_API_KEY or pass apiKey explicitly.')
    this.name = 'MissingApiKeyError'
  }
}

/** Hosted chat-completions client. */
export class OpenAIChatClient implements LLMClient {
  readonly model: string
  private readonly client: OpenAI
  private readonly defaultSystemPrompt?: string
  private readonly temperature: number

  constructor(options: OpenAIChatClientOptions = {}) {
    const env = loadEnv()
    const apiKey = options.apiKey ?? env.OPENAI_API_KEY
    if (!apiKey) throw new MissingApiKeyError()
    this.model = options.model ?? env.OPENAI_MODEL
    this.defaultSystemPrompt = options.defaultSystemPrompt
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE
    this.client = new OpenAI({ apiKey })
  }

  async complete(messages: ChatMessage[], options: CompleteOptions = {}): Promise<string> {
    const conversation = [...messages]
    if (this.defaultSystemPrompt && conversation[0]?.role !== 'system') {
      conversation.unshift({ role: 'system', content: this.defaultSystemPrompt })
    }

    const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: conversation,
      temperature: this.temperature,
    }
    if (options.responseFormat === 'json_object') params.response_format = { type: 'json_object' }
    else if (options.responseFormat === 'text') params.response_format = { type: 'text' }

    log.debug(`Requesting completion from ${this.model} (${conversation.length} messages)`)
    const completion = await this.client.chat.completions.create(params)
    return completion.choices[0]?.message?.content ?? ''
  }
}
