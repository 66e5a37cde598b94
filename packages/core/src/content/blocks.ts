import type { ContentBlock, RawBlock, TextBlock, ToolResultBlock, ToolResultPart, ToolUseBlock } from '../types/generic'
import { isRecord } from '../util/json'

/**
 * Parse one content block.
 *
 * Well-formed text, tool_use and tool_result blocks are typed; any other
 * object with a string `type` is kept as a raw block. Returns null for values
 * that are not blocks at all.
 */
export function parseContentBlock(value: unknown): ContentBlock | null {
  if (!isRecord(value) || typeof value.type !== 'string') return null
  return parseTypedBlock(value) ?? rawBlock(value)
}

function parseTypedBlock(value: Record<string, unknown>): ContentBlock | null {
  switch (value.type) {
    case 'text':
      return parseTextBlock(value)
    case 'tool_use':
      return parseToolUseBlock(value)
    case 'tool_result':
      return parseToolResultBlock(value)
    default:
      return null
  }
}

function rawBlock(value: Record<string, unknown>): RawBlock {
  return { type: 'raw', value }
}

function parseTextBlock(value: Record<string, unknown>): TextBlock | null {
  if (typeof value.text !== 'string') return null
  return { type: 'text', text: value.text }
}

function parseToolUseBlock(value: Record<string, unknown>): ToolUseBlock | null {
  if (typeof value.id !== 'string' || typeof value.name !== 'string') return null

  const input = value.input ?? {}
  if (!isRecord(input)) return null

  return { type: 'tool_use', id: value.id, name: value.name, input }
}

function parseToolResultBlock(value: Record<string, unknown>): ToolResultBlock | null {
  if (typeof value.tool_use_id !== 'string') return null

  const content = parseToolResultContent(value.content)
  if (content === null) return null

  const block: ToolResultBlock = { type: 'tool_result', tool_use_id: value.tool_use_id, content }
  if (typeof value.is_error === 'boolean') {
    block.is_error = value.is_error
  }
  return block
}

function parseToolResultContent(content: unknown): string | ToolResultPart[] | null {
  if (content === undefined || content === null) return ''
  if (typeof content === 'string') return content
  if (!Array.isArray(content)) return null

  const parts: ToolResultPart[] = []
  for (const item of content) {
    if (!isRecord(item) || typeof item.type !== 'string') return null
    parts.push((item.type === 'text' ? parseTextBlock(item) : null) ?? rawBlock(item))
  }
  return parts
}

/**
 * Parse a whole array as blocks; null if any element is not an object with a
 * string `type`
 */
export function parseContentBlocks(values: unknown[]): ContentBlock[] | null {
  const blocks: ContentBlock[] = []
  for (const value of values) {
    const block = parseContentBlock(value)
    if (!block) return null
    blocks.push(block)
  }
  return blocks
}

/**
 * Text of a tool result; raw parts are dropped
 */
export function toolResultText(block: ToolResultBlock, separator = ' '): string {
  if (typeof block.content === 'string') return block.content
  return block.content
    .filter((part): part is TextBlock => part.type === 'text')
    .map((part) => part.text)
    .join(separator)
}

export function isRawBlock(block: ContentBlock): block is RawBlock {
  return block.type === 'raw'
}

/**
 * The wire form of a block: raw blocks and raw tool result parts go back out
 * as they arrived
 */
export function encodeBlock(block: ContentBlock): unknown {
  switch (block.type) {
    case 'raw':
      return block.value
    case 'tool_result':
      if (typeof block.content === 'string') return block
      return { ...block, content: block.content.map((part) => (part.type === 'raw' ? part.value : part)) }
    default:
      return block
  }
}
