/**
 * Helpers shared by the Anthropic-shaped protocols (Anthropic and AWS Bedrock)
 */

import { encodeBlock } from '../../content/blocks'
import { contentBlocks } from '../../content/normalize'
import { ContentParseError } from '../../errors'
import type { MessageContent, Tool, ToolChoice } from '../../types/generic'
import { decodeToolChoice } from '../../types/generic-json'
import { isRecord } from '../../util/json'
import { malformed } from '../base'
import type { AnthropicTool, AnthropicToolChoice } from './types'

/**
 * System prompt as a string; block arrays are joined with newlines
 */
export function parseSystem(system: unknown, provider: string): string | undefined {
  if (system === undefined || system === null) return undefined
  if (typeof system === 'string') return system

  if (Array.isArray(system)) {
    const texts: string[] = []
    for (const block of system) {
      if (!isRecord(block) || typeof block.text !== 'string') {
        throw malformed(provider, 'request', 'system blocks must be text blocks')
      }
      texts.push(block.text)
    }
    return texts.join('\n')
  }

  throw malformed(provider, 'request', 'system must be a string or an array of text blocks')
}

export function parseTools(tools: unknown, provider: string): Tool[] | undefined {
  if (tools === undefined || tools === null) return undefined
  if (!Array.isArray(tools)) {
    throw malformed(provider, 'request', 'tools must be an array')
  }

  return tools.map((tool, index): Tool => {
    if (!isRecord(tool) || typeof tool.name !== 'string') {
      throw malformed(provider, 'request', `tool ${index} must have a string name`)
    }
    if (!isRecord(tool.input_schema)) {
      throw malformed(provider, 'request', `tool ${index} (${tool.name}) must have an input_schema object`)
    }

    const result: Tool = { name: tool.name, inputSchema: tool.input_schema }
    if (typeof tool.description === 'string') result.description = tool.description
    return result
  })
}

export function transformTools(tools: Tool[]): AnthropicTool[] {
  return tools.map((tool) => {
    const result: AnthropicTool = { name: tool.name, input_schema: tool.inputSchema }
    if (tool.description !== undefined) result.description = tool.description
    return result
  })
}

export function parseToolChoice(choice: unknown): ToolChoice | undefined {
  return decodeToolChoice(choice)
}

export function transformToolChoice(choice: ToolChoice): AnthropicToolChoice {
  return choice.type === 'tool' ? { type: 'tool', name: choice.name } : { type: choice.type }
}

/**
 * Content as an Anthropic block array.
 *
 * Text becomes a single text block; raw blocks and opaque arrays pass through
 * as they are; any other opaque value cannot be expressed.
 */
export function toAnthropicContent(content: MessageContent, provider: string): unknown[] {
  const blocks = contentBlocks(content)
  if (blocks) return blocks.map(encodeBlock)

  if (content.kind === 'opaque' && Array.isArray(content.value)) {
    return content.value
  }

  throw new ContentParseError(
    `failed to parse content: ${provider} content must be a string or an array of content blocks`
  )
}
