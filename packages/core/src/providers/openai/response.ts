/**
 * OpenAI Response Transformations
 *
 * Handles bidirectional transformation between OpenAI Chat Completions
 * responses and GenericResponse.
 */

import { flattenContent } from '../../content/normalize'
import { StructuralError } from '../../errors'
import { computeUsage, type GenericResponse, type Usage } from '../../types/generic'
import { isRecord, optionalNumber, optionalString } from '../../util/json'
import { malformed } from '../base'
import { DEFAULT_OPENAI_OPTIONS, type OpenAIOptions, parseAssistantContent, splitAssistantBlocks } from './shared'
import type {
  OpenAIFinishReason,
  OpenAIResponse,
  OpenAIResponseMessage,
  OpenAIUsage,
} from './types'

const PROVIDER = 'OpenAI'

// =============================================================================
// Finish Reason Mapping
// =============================================================================

const FINISH_REASON_TO_STOP_REASON: Record<string, string> = {
  stop: 'end_turn',
  length: 'max_tokens',
  tool_calls: 'tool_use',
  content_filter: 'stop_sequence',
}

const STOP_REASON_TO_FINISH_REASON: Record<string, OpenAIFinishReason> = {
  end_turn: 'stop',
  max_tokens: 'length',
  tool_use: 'tool_calls',
  stop_sequence: 'stop',
}

export function parseFinishReason(reason: unknown): string {
  if (typeof reason !== 'string') return 'end_turn'
  return FINISH_REASON_TO_STOP_REASON[reason] ?? 'end_turn'
}

export function transformStopReason(reason: string | undefined): OpenAIFinishReason {
  if (reason === undefined) return 'stop'
  return STOP_REASON_TO_FINISH_REASON[reason] ?? 'stop'
}

// =============================================================================
// OpenAI → Generic
// =============================================================================

/**
 * Parse an OpenAI response into GenericResponse. Only the first choice is read.
 */
export function parseResponse(
  response: unknown,
  options: OpenAIOptions = DEFAULT_OPENAI_OPTIONS
): GenericResponse {
  if (!isRecord(response)) {
    throw malformed(PROVIDER, 'response', 'response must be an object')
  }
  const { choices } = response
  if (choices !== undefined && choices !== null && !Array.isArray(choices)) {
    throw malformed(PROVIDER, 'response', 'choices must be an array')
  }

  const choice: unknown = Array.isArray(choices) ? choices[0] : undefined
  if (!isRecord(choice)) {
    throw new StructuralError('no choices in OpenAI response')
  }

  const message: Record<string, unknown> = isRecord(choice.message) ? choice.message : {}
  const content = parseAssistantContent(message.content, message.tool_calls, options.textSeparator)

  const result: GenericResponse = {
    id: optionalString(response.id) ?? '',
    type: 'message',
    role: optionalString(message.role) ?? 'assistant',
    // Responses are always a block sequence; an empty message has no blocks
    content:
      content.kind === 'text'
        ? { kind: 'blocks', blocks: content.text ? [{ type: 'text', text: content.text }] : [] }
        : content,
    model: optionalString(response.model) ?? '',
    stopReason: parseFinishReason(choice.finish_reason),
  }

  const usage = parseUsage(response.usage)
  if (usage) result.usage = usage

  return result
}

function parseUsage(usage: unknown): Usage | undefined {
  if (!isRecord(usage)) return undefined
  return computeUsage(
    optionalNumber(usage.prompt_tokens) ?? 0,
    optionalNumber(usage.completion_tokens) ?? 0,
    optionalNumber(usage.total_tokens)
  )
}

// =============================================================================
// Generic → OpenAI
// =============================================================================

/**
 * Transform GenericResponse into an OpenAI chat completion.
 *
 * `created` is 0: the generic response carries no timestamp.
 */
export function transformResponse(
  response: GenericResponse,
  options: OpenAIOptions = DEFAULT_OPENAI_OPTIONS
): OpenAIResponse {
  const message = transformMessage(response, options.textSeparator)

  const result: OpenAIResponse = {
    id: response.id,
    object: 'chat.completion',
    created: 0,
    model: response.model,
    choices: [
      {
        index: 0,
        message,
        finish_reason: message.tool_calls ? 'tool_calls' : transformStopReason(response.stopReason),
      },
    ],
  }

  if (response.usage) {
    result.usage = transformUsage(response.usage)
  }

  return result
}

function transformMessage(response: GenericResponse, separator: string): OpenAIResponseMessage {
  const role = response.role || 'assistant'

  if (response.content.kind !== 'blocks') {
    return { role, content: flattenContent(response.content, { separator }) }
  }

  const { text, toolCalls } = splitAssistantBlocks(response.content.blocks, separator)
  if (toolCalls.length === 0) {
    return { role, content: text }
  }
  return { role, content: text || null, tool_calls: toolCalls }
}

function transformUsage(usage: Usage): OpenAIUsage {
  return {
    prompt_tokens: usage.inputTokens,
    completion_tokens: usage.outputTokens,
    total_tokens: usage.totalTokens,
  }
}
