/**
 * Anthropic Response Transformations
 *
 * Handles bidirectional transformation between GenericResponse and AnthropicResponse
 */

import { decodeContent } from '../../content/normalize'
import { computeUsage, type GenericResponse, type Usage } from '../../types/generic'
import { isRecord, optionalNumber, optionalString } from '../../util/json'
import { malformed } from '../base'
import { toAnthropicContent } from './shared'
import { type AnthropicResponse, type AnthropicUsage, isAnthropicResponse } from './types'

const PROVIDER = 'Anthropic'

/**
 * Parse an Anthropic response into GenericResponse
 */
export function parseResponse(response: unknown): GenericResponse {
  if (!isAnthropicResponse(response)) {
    throw malformed(PROVIDER, 'response', 'content must be an array')
  }

  const result: GenericResponse = {
    id: optionalString(response.id) ?? '',
    type: optionalString(response.type) ?? '',
    role: optionalString(response.role) ?? '',
    content: decodeContent(response.content ?? []),
    model: optionalString(response.model) ?? '',
  }

  const usage = parseUsage(response.usage)
  if (usage) result.usage = usage

  const stopReason = optionalString(response.stop_reason)
  if (stopReason) result.stopReason = stopReason

  return result
}

/**
 * Transform GenericResponse into an Anthropic response
 */
export function transformResponse(response: GenericResponse): AnthropicResponse {
  const result: AnthropicResponse = {
    id: response.id,
    type: response.type || 'message',
    role: response.role || 'assistant',
    model: response.model,
    content: toAnthropicContent(response.content, PROVIDER),
    stop_reason: response.stopReason ?? null,
  }

  if (response.usage) {
    result.usage = transformUsage(response.usage)
  }

  return result
}

/**
 * Anthropic omits the total; it is always input + output
 */
export function parseUsage(usage: unknown): Usage | undefined {
  if (!isRecord(usage)) return undefined
  return computeUsage(optionalNumber(usage.input_tokens) ?? 0, optionalNumber(usage.output_tokens) ?? 0)
}

export function transformUsage(usage: Usage): AnthropicUsage {
  return {
    input_tokens: usage.inputTokens,
    output_tokens: usage.outputTokens,
  }
}
