/**
 * Anthropic Messages API Types
 */

import { isRecord } from '../../util/json'

// =============================================================================
// Request Types
// =============================================================================

/**
 * Anthropic Messages Request
 */
export interface AnthropicRequest {
  model: string
  messages: AnthropicMessage[]
  max_tokens?: number

  // System prompt (string or array of blocks)
  system?: string | AnthropicSystemBlock[]

  // Generation parameters
  stream?: boolean
  temperature?: number
  metadata?: Record<string, unknown>

  // Tools
  tools?: AnthropicTool[]
  tool_choice?: AnthropicToolChoice
}

/**
 * Anthropic Message
 *
 * Content arrays that are not made of known blocks (images, documents) are
 * carried through as they came.
 */
export interface AnthropicMessage {
  role: string
  content: string | AnthropicContentBlock[] | unknown[]
}

/**
 * System block
 */
export interface AnthropicSystemBlock {
  type: 'text'
  text: string
}

/**
 * Content block types
 */
export type AnthropicContentBlock = AnthropicTextBlock | AnthropicToolUseBlock | AnthropicToolResultBlock

/**
 * Text block
 */
export interface AnthropicTextBlock {
  type: 'text'
  text: string
}

/**
 * Tool use block (in assistant messages)
 */
export interface AnthropicToolUseBlock {
  type: 'tool_use'
  id: string
  name: string
  input: Record<string, unknown>
}

/**
 * Tool result block (in user messages)
 */
export interface AnthropicToolResultBlock {
  type: 'tool_result'
  tool_use_id: string
  content: string | Array<AnthropicTextBlock | Record<string, unknown>>
  is_error?: boolean
}

/**
 * Tool definition
 */
export interface AnthropicTool {
  name: string
  description?: string
  input_schema: Record<string, unknown>
}

/**
 * Tool choice
 */
export interface AnthropicToolChoice {
  type: 'auto' | 'any' | 'tool' | 'none'
  name?: string
}

// =============================================================================
// Response Types
// =============================================================================

/**
 * Anthropic Messages Response
 */
export interface AnthropicResponse {
  id: string
  type: string
  role: string
  model: string
  content: AnthropicContentBlock[] | unknown[]
  stop_reason: string | null
  usage?: AnthropicUsage
}

/**
 * Usage information - Anthropic reports no total
 */
export interface AnthropicUsage {
  input_tokens: number
  output_tokens: number
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if value is shaped like an Anthropic request: messages with string roles
 */
export function isAnthropicRequest(value: unknown): value is AnthropicRequest {
  if (!isRecord(value)) return false
  return Array.isArray(value.messages) && value.messages.every(isAnthropicMessage)
}

/**
 * Check if value is shaped like an Anthropic response
 */
export function isAnthropicResponse(value: unknown): value is AnthropicResponse {
  if (!isRecord(value)) return false
  return value.content === undefined || value.content === null || Array.isArray(value.content)
}

/**
 * Check if value is an Anthropic message
 */
export function isAnthropicMessage(value: unknown): value is AnthropicMessage {
  return isRecord(value) && typeof value.role === 'string'
}
