/**
 * Generic intermediate model - the hub format every codec reads and writes
 */

/**
 * Wire formats known to the engine. `generic` has no codec; it is the hub itself.
 */
export type MessageFormat = 'anthropic' | 'openai' | 'google' | 'aws' | 'generic'

export type ProviderFormat = Exclude<MessageFormat, 'generic'>

const MESSAGE_FORMATS: readonly MessageFormat[] = [
  'anthropic',
  'openai',
  'google',
  'aws',
  'generic',
] as const

export function isMessageFormat(value: unknown): value is MessageFormat {
  return typeof value === 'string' && MESSAGE_FORMATS.some((format) => format === value)
}

/**
 * GenericRequest - Central hub format for request conversions
 *
 * `maxTokens` and `temperature` use 0 for "not set", `stream` uses false.
 */
export interface GenericRequest {
  model: string
  messages: GenericMessage[]
  system?: string
  maxTokens: number
  temperature: number
  stream: boolean
  metadata?: unknown
  tools?: Tool[]
  toolChoice?: ToolChoice
}

/**
 * GenericResponse - Central hub format for response conversions
 */
export interface GenericResponse {
  id: string
  type: string
  role: string
  content: MessageContent
  model: string
  usage?: Usage
  stopReason?: string
}

export interface GenericMessage {
  role: string
  content: MessageContent
  name?: string
}

export type MessageRole = 'user' | 'assistant' | 'system'

export const MESSAGE_ROLES: readonly MessageRole[] = ['user', 'assistant', 'system'] as const

/**
 * MessageContent - the shape of a message's content, decided once at decode time
 *
 * - text: a bare string
 * - blocks: a sequence of typed content blocks
 * - opaque: any other JSON value from an unexpected source
 */
export type MessageContent = TextContent | BlockContent | OpaqueContent

export interface TextContent {
  kind: 'text'
  text: string
}

export interface BlockContent {
  kind: 'blocks'
  blocks: ContentBlock[]
}

export interface OpaqueContent {
  kind: 'opaque'
  value: unknown
}

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock | RawBlock

export interface TextBlock {
  type: 'text'
  text: string
}

export interface ToolUseBlock {
  type: 'tool_use'
  id: string
  name: string
  input: Record<string, unknown>
}

export interface ToolResultBlock {
  type: 'tool_result'
  tool_use_id: string
  content: string | ToolResultPart[]
  is_error?: boolean
}

export type ToolResultPart = TextBlock | RawBlock

/**
 * A block of a kind the model does not type (image, thinking, document, ...).
 * Kept as it arrived so block-capable targets can send it on; text-only
 * targets drop it.
 */
export interface RawBlock {
  type: 'raw'
  value: Record<string, unknown>
}

export interface Usage {
  inputTokens: number
  outputTokens: number
  totalTokens: number
}

/**
 * JSONSchema - loosely typed tool parameter schema; the validator narrows it
 */
export type JSONSchema = Record<string, unknown>

export interface Tool {
  name: string
  description?: string
  inputSchema: JSONSchema
}

export type ToolChoice =
  | { type: 'auto' }
  | { type: 'any' }
  | { type: 'none' }
  | { type: 'tool'; name: string }

/**
 * ToolCall - a concrete invocation of a tool in function-call form
 */
export interface ToolCall {
  id: string
  type: 'function'
  function: {
    name: string
    arguments: string
  }
}

/**
 * StreamEvent - a discrete SSE record handed over by the transport
 */
export interface StreamEvent {
  event: string
  data: string
}

export function computeUsage(inputTokens: number, outputTokens: number, totalTokens?: number): Usage {
  return {
    inputTokens,
    outputTokens,
    totalTokens: totalTokens ?? inputTokens + outputTokens,
  }
}
