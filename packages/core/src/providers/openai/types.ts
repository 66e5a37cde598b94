/**
 * OpenAI Chat Completions API Types
 */

import { isRecord } from '../../util/json'

// =============================================================================
// Request Types
// =============================================================================

/**
 * OpenAI Chat Completion Request
 */
export interface OpenAIRequest {
  model: string
  messages: OpenAIMessage[]

  // Generation parameters
  max_tokens?: number
  temperature?: number
  stream?: boolean
  n?: number
  stop?: string | string[]

  // Tool calling
  tools?: OpenAITool[]
  tool_choice?: OpenAIToolChoice
}

/**
 * OpenAI Message
 *
 * One shape for every role: `tool_calls` only appears on assistant messages,
 * `tool_call_id` only on tool messages.
 */
export interface OpenAIMessage {
  role: string
  content: string | OpenAIContentPart[] | null
  name?: string
  tool_calls?: OpenAIToolCall[]
  tool_call_id?: string
}

/**
 * Content part types
 */
export type OpenAIContentPart = OpenAITextContent | OpenAIImageContent

export interface OpenAITextContent {
  type: 'text'
  text: string
}

export interface OpenAIImageContent {
  type: 'image_url'
  image_url:
    | string
    | {
        url: string
        detail?: 'auto' | 'low' | 'high'
      }
}

/**
 * Tool definition
 */
export interface OpenAITool {
  type: 'function'
  function: {
    name: string
    description?: string
    parameters?: Record<string, unknown>
  }
}

/**
 * Tool call in assistant message
 */
export interface OpenAIToolCall {
  id: string
  type: 'function'
  function: {
    name: string
    arguments: string // JSON string
  }
}

/**
 * Tool choice
 */
export type OpenAIToolChoice =
  | 'none'
  | 'auto'
  | 'required'
  | { type: 'function'; function: { name: string } }

// =============================================================================
// Response Types
// =============================================================================

/**
 * OpenAI Chat Completion Response
 */
export interface OpenAIResponse {
  id: string
  object: 'chat.completion'
  created: number
  model: string
  choices: OpenAIChoice[]
  usage?: OpenAIUsage
}

/**
 * Response choice
 */
export interface OpenAIChoice {
  index: number
  message: OpenAIResponseMessage
  finish_reason: OpenAIFinishReason
}

/**
 * Response message
 */
export interface OpenAIResponseMessage {
  role: string
  content: string | null
  tool_calls?: OpenAIToolCall[]
}

/**
 * Finish reason
 */
export type OpenAIFinishReason = 'stop' | 'length' | 'tool_calls' | 'content_filter' | null

/**
 * Usage information
 */
export interface OpenAIUsage {
  prompt_tokens: number
  completion_tokens: number
  total_tokens: number
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if value is an OpenAI request: messages with string roles
 */
export function isOpenAIRequest(value: unknown): value is OpenAIRequest {
  if (!isRecord(value)) return false
  return Array.isArray(value.messages) && value.messages.every(isOpenAIMessage)
}

/**
 * Check if value is an OpenAI response
 */
export function isOpenAIResponse(value: unknown): value is OpenAIResponse {
  return isRecord(value) && Array.isArray(value.choices)
}

/**
 * Check if value is an OpenAI message
 */
export function isOpenAIMessage(value: unknown): value is OpenAIMessage {
  return isRecord(value) && typeof value.role === 'string'
}

export function isOpenAITextContent(value: unknown): value is OpenAITextContent {
  return isRecord(value) && value.type === 'text' && typeof value.text === 'string'
}
