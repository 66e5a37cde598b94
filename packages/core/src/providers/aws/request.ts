/**
 * AWS Bedrock Request Transformations
 */

import { decodeContent, encodeContent } from '../../content/normalize'
import type { GenericRequest } from '../../types/generic'
import { optionalNumber } from '../../util/json'
import {
  parseSystem,
  parseToolChoice,
  parseTools,
  transformToolChoice,
  transformTools,
} from '../anthropic/shared'
import { malformed } from '../base'
import { type AwsOptions, DEFAULT_AWS_OPTIONS } from './options'
import { type AwsRequest, isAwsRequest } from './types'

const PROVIDER = 'AWS'

/**
 * Parse a Bedrock request into GenericRequest. Message content passes
 * through as it came.
 */
export function parse(request: unknown): GenericRequest {
  if (!isAwsRequest(request)) {
    throw malformed(PROVIDER, 'request', 'messages must be an array of messages with a role')
  }

  const result: GenericRequest = {
    model: '',
    messages: request.messages.map((msg) => ({
      role: msg.role,
      content: decodeContent(msg.content),
    })),
    maxTokens: optionalNumber(request.max_tokens) ?? 0,
    temperature: optionalNumber(request.temperature) ?? 0,
    stream: false,
  }

  const system = parseSystem(request.system, PROVIDER)
  if (system) result.system = system

  const tools = parseTools(request.tools, PROVIDER)
  if (tools) result.tools = tools

  const toolChoice = parseToolChoice(request.tool_choice)
  if (toolChoice) result.toolChoice = toolChoice

  return result
}

/**
 * Transform GenericRequest into a Bedrock request. A max token budget of 0
 * or less becomes `options.defaultMaxTokens`.
 */
export function transform(request: GenericRequest, options: AwsOptions = DEFAULT_AWS_OPTIONS): AwsRequest {
  const result: AwsRequest = {
    anthropic_version: options.anthropicVersion,
    messages: request.messages.map((msg) => ({
      role: msg.role,
      content: encodeContent(msg.content),
    })),
    max_tokens: request.maxTokens > 0 ? request.maxTokens : options.defaultMaxTokens,
  }

  if (request.system) result.system = request.system
  if (request.temperature !== 0) result.temperature = request.temperature

  if (request.tools && request.tools.length > 0) {
    result.tools = transformTools(request.tools)
  }
  if (request.toolChoice) {
    result.tool_choice = transformToolChoice(request.toolChoice)
  }

  return result
}
