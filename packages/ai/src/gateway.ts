import { z } from 'zod'
import { createLogger } from '@steward/core'
import { ChatMessage, LLMClient } from './client'

const log = createLogger('gateway')

export class GatewayResponseError extends Error {
  readonly missingKeys: string[]

  constructor(message: string, missingKeys: string[] = [], options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'GatewayResponseError'
    this.missingKeys = missingKeys
  }
}

export interface CompleteJsonArgs<S extends z.ZodTypeAny> {
  system: string
  payload: unknown
  schema: S
  requiredKeys: readonly string[]
}

/** Sends a system prompt plus a pretty-printed JSON payload and validates the JSON reply. */
export async function completeJson<S extends z.ZodTypeAny>(
  llm: LLMClient,
  { system, payload, schema, requiredKeys }: CompleteJsonArgs<S>
): Promise<z.output<S>> {
  const messages: ChatMessage[] = [
    { role: 'system', content: system },
    { role: 'user', content: JSON.stringify(payload, null, 2) },
  ]
  const text = await llm.complete(messages, { responseFormat: 'json_object' })
  return parseJsonResponse(text, schema, requiredKeys)
}

export function parseJsonResponse<S extends z.ZodTypeAny>(
  text: string,
  schema: S,
  requiredKeys: readonly string[]
): z.output<S> {
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (error) {
    throw new GatewayResponseError('LLM response was not valid JSON', [], { cause: error })
  }

  if (data === null || typeof data !== 'object' || Array.isArray(data)) {
    throw new GatewayResponseError('LLM response was not a JSON object')
  }

  const missing = requiredKeys.filter((key) => !(key in data))
  if (missing.length > 0) {
    throw new GatewayResponseError(`LLM response missing keys: ${missing.join(', ')}`, missing)
  }

  const result = schema.safeParse(data)
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    log.warn(`Rejected model response: ${detail}`)
    throw new GatewayResponseError(`LLM response has invalid fields: ${detail}`, [], { cause: result.error })
  }
  return result.data
}
