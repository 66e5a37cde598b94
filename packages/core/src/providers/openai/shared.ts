/**
 * Content and tool-call helpers used by both OpenAI request and response paths
 */

import { blockContent, decodeContent, flattenBlocks } from '../../content/normalize'
import { StructuralError, ToolCallValidationError } from '../../errors'
import type { ContentBlock, MessageContent, ToolResultBlock, ToolUseBlock } from '../../types/generic'
import { isRecord, stringifyJSON } from '../../util/json'
import { isOpenAITextContent, type OpenAIToolCall } from './types'

export interface OpenAIOptions {
  /** Separator between flattened blocks */
  textSeparator: string
}

export const DEFAULT_OPENAI_OPTIONS: OpenAIOptions = {
  textSeparator: ' ',
}

/**
 * OpenAI content: string, array of parts, or null.
 *
 * Arrays of text parts become text blocks; arrays with other parts (images)
 * stay opaque.
 */
export function parseOpenAIContent(content: unknown): MessageContent {
  if (Array.isArray(content) && content.every(isOpenAITextContent)) {
    return blockContent(content.map((part) => ({ type: 'text', text: part.text })))
  }
  return decodeContent(content)
}

/**
 * Flat text of OpenAI content, joining text parts with the separator
 */
export function parseOpenAIText(content: unknown, separator: string): string {
  if (typeof content === 'string') return content
  if (Array.isArray(content)) {
    return content
      .filter(isOpenAITextContent)
      .map((part) => part.text)
      .join(separator)
  }
  return ''
}

/**
 * Assistant text plus tool calls as generic content.
 *
 * Without tool calls the content keeps its own shape; with tool calls it
 * becomes a block sequence: the text (if any) followed by tool_use blocks.
 */
export function parseAssistantContent(
  content: unknown,
  toolCalls: unknown,
  separator: string
): MessageContent {
  if (!Array.isArray(toolCalls) || toolCalls.length === 0) {
    return parseOpenAIContent(content)
  }

  const blocks: ContentBlock[] = []
  const text = parseOpenAIText(content, separator)
  if (text) blocks.push({ type: 'text', text })

  toolCalls.forEach((call, index) => {
    blocks.push(parseToolCall(call, index))
  })

  return blockContent(blocks)
}

/**
 * OpenAI tool call → tool_use block, keeping the id byte-for-byte
 */
export function parseToolCall(call: unknown, index: number): ToolUseBlock {
  if (!isRecord(call) || !isRecord(call.function)) {
    throw new StructuralError(`tool call ${index}: must have a function`)
  }
  const { id } = call
  const { name, arguments: args } = call.function

  if (typeof id !== 'string' || id === '') {
    throw new StructuralError(`tool call ${index}: missing ID`)
  }
  if (typeof name !== 'string' || name === '') {
    throw new StructuralError(`tool call ${index}: missing function name`)
  }

  return { type: 'tool_use', id, name, input: parseArguments(args, name, id) }
}

function parseArguments(args: unknown, toolName: string, toolId: string): Record<string, unknown> {
  if (args === undefined || args === null || args === '') return {}
  if (isRecord(args)) return args

  if (typeof args === 'string') {
    let parsed: unknown
    try {
      parsed = JSON.parse(args)
    } catch (error) {
      throw new ToolCallValidationError('json_error', 'invalid JSON in tool call arguments', {
        toolName,
        toolId,
        field: 'arguments',
        value: args,
        context: { parseError: error instanceof Error ? error.message : String(error) },
        suggestions: ['Ensure the arguments are valid JSON', 'Check for missing quotes or commas'],
      })
    }
    if (isRecord(parsed)) return parsed
  }

  throw new ToolCallValidationError('json_error', 'tool call arguments must be a JSON object', {
    toolName,
    toolId,
    field: 'arguments',
    value: args,
    suggestions: ['Pass the arguments as a JSON object string'],
  })
}

export function toOpenAIToolCall(block: ToolUseBlock): OpenAIToolCall {
  return {
    id: block.id,
    type: 'function',
    function: {
      name: block.name,
      arguments: stringifyJSON(block.input),
    },
  }
}

/**
 * Split assistant blocks into flat text and native tool calls
 */
export function splitAssistantBlocks(
  blocks: ContentBlock[],
  separator: string
): { text: string; toolCalls: OpenAIToolCall[] } {
  const toolCalls = blocks
    .filter((block): block is ToolUseBlock => block.type === 'tool_use')
    .map(toOpenAIToolCall)
  const rest = blocks.filter((block) => block.type !== 'tool_use')

  return { text: flattenBlocks(rest, { separator }), toolCalls }
}

export function isToolResultBlock(block: ContentBlock): block is ToolResultBlock {
  return block.type === 'tool_result'
}
