/**
 * AWS Bedrock (Anthropic models) InvokeModel Types
 *
 * Bedrock speaks the Anthropic Messages shape with an `anthropic_version`
 * field in the body; the model id travels in the URL, not the body.
 */

import { isRecord } from '../../util/json'
import type { AnthropicTool, AnthropicToolChoice, AnthropicUsage } from '../anthropic/types'

// =============================================================================
// Request Types
// =============================================================================

export interface AwsRequest {
  anthropic_version: string
  messages: AwsMessage[]
  system?: string
  max_tokens: number
  temperature?: number
  top_p?: number
  top_k?: number
  stop_sequences?: string[]
  tools?: AnthropicTool[]
  tool_choice?: AnthropicToolChoice
}

/**
 * Content is carried as raw JSON in both directions
 */
export interface AwsMessage {
  role: string
  content: unknown
}

// =============================================================================
// Response Types
// =============================================================================

export interface AwsResponse {
  id: string
  model: string
  type: string
  role: string
  content: unknown
  stop_reason: string
  stop_sequence?: string
  usage?: AnthropicUsage
}

// =============================================================================
// Type Guards
// =============================================================================

export function isAwsRequest(value: unknown): value is AwsRequest {
  if (!isRecord(value)) return false
  return Array.isArray(value.messages) && value.messages.every(isAwsMessage)
}

export function isAwsMessage(value: unknown): value is AwsMessage {
  return isRecord(value) && typeof value.role === 'string'
}

export function isAwsResponse(value: unknown): value is AwsResponse {
  return isRecord(value)
}
