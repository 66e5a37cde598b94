/**
 * Anthropic Request Transformations
 *
 * Handles bidirectional transformation between AnthropicRequest and GenericRequest
 */

import { decodeContent } from '../../content/normalize'
import type { GenericMessage, GenericRequest } from '../../types/generic'
import { isRecord, optionalNumber } from '../../util/json'
import { malformed } from '../base'
import {
  parseSystem,
  parseToolChoice,
  parseTools,
  toAnthropicContent,
  transformToolChoice,
  transformTools,
} from './shared'
import { type AnthropicMessage, type AnthropicRequest, isAnthropicRequest } from './types'

const PROVIDER = 'Anthropic'

/**
 * Parse an Anthropic request into GenericRequest
 */
export function parse(request: unknown): GenericRequest {
  if (!isAnthropicRequest(request)) {
    throw malformed(PROVIDER, 'request', 'messages must be an array of messages with a role')
  }

  const result: GenericRequest = {
    model: typeof request.model === 'string' ? request.model : '',
    messages: request.messages.map(parseMessage),
    maxTokens: optionalNumber(request.max_tokens) ?? 0,
    temperature: optionalNumber(request.temperature) ?? 0,
    stream: request.stream === true,
  }

  const system = parseSystem(request.system, PROVIDER)
  if (system) result.system = system

  if (isRecord(request.metadata)) result.metadata = request.metadata

  const tools = parseTools(request.tools, PROVIDER)
  if (tools) result.tools = tools

  const toolChoice = parseToolChoice(request.tool_choice)
  if (toolChoice) result.toolChoice = toolChoice

  return result
}

/**
 * Transform GenericRequest into an Anthropic request
 */
export function transform(request: GenericRequest): AnthropicRequest {
  const result: AnthropicRequest = {
    model: request.model,
    messages: request.messages.map(transformMessage),
  }

  if (request.system) result.system = request.system
  if (request.maxTokens !== 0) result.max_tokens = request.maxTokens
  if (request.temperature !== 0) result.temperature = request.temperature
  if (request.stream) result.stream = true

  // Anthropic metadata is an object; anything else is dropped
  if (isRecord(request.metadata)) result.metadata = request.metadata

  if (request.tools && request.tools.length > 0) {
    result.tools = transformTools(request.tools)
  }
  if (request.toolChoice) {
    result.tool_choice = transformToolChoice(request.toolChoice)
  }

  return result
}

function parseMessage(message: AnthropicMessage): GenericMessage {
  return {
    role: message.role,
    content: decodeContent(message.content),
  }
}

function transformMessage(message: GenericMessage): AnthropicMessage {
  return {
    role: message.role,
    content: toAnthropicContent(message.content, PROVIDER),
  }
}
