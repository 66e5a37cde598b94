/**
 * OpenAI Request Transformations
 *
 * Handles bidirectional transformation between OpenAI Chat Completions
 * requests and GenericRequest.
 */

import { isRawBlock, toolResultText } from '../../content/blocks'
import { flattenBlocks, flattenContent } from '../../content/normalize'
import type {
  ContentBlock,
  GenericMessage,
  GenericRequest,
  Tool,
  ToolChoice,
  ToolResultBlock,
} from '../../types/generic'
import { isRecord, optionalNumber, optionalString } from '../../util/json'
import { malformed } from '../base'
import {
  DEFAULT_OPENAI_OPTIONS,
  isToolResultBlock,
  type OpenAIOptions,
  parseAssistantContent,
  parseOpenAIContent,
  parseOpenAIText,
  splitAssistantBlocks,
} from './shared'
import {
  isOpenAIRequest,
  type OpenAIMessage,
  type OpenAIRequest,
  type OpenAITool,
  type OpenAIToolChoice,
} from './types'

const PROVIDER = 'OpenAI'

// =============================================================================
// OpenAI → Generic
// =============================================================================

/**
 * Parse an OpenAI request into GenericRequest
 *
 * System messages are lifted out of the list; when several are present the
 * last one wins. Consecutive `tool` messages fold into one user message of
 * tool_result blocks.
 */
export function parse(request: unknown, options: OpenAIOptions = DEFAULT_OPENAI_OPTIONS): GenericRequest {
  if (!isOpenAIRequest(request)) {
    throw malformed(PROVIDER, 'request', 'messages must be an array of messages with a role')
  }

  const messages: GenericMessage[] = []
  let system: string | undefined
  let toolResults: ToolResultBlock[] | null = null

  for (const msg of request.messages) {
    if (msg.role === 'system') {
      system = parseOpenAIText(msg.content, options.textSeparator)
      continue
    }

    if (msg.role === 'tool') {
      const block = parseToolMessage(msg, options.textSeparator)
      if (toolResults) {
        toolResults.push(block)
      } else {
        toolResults = [block]
        messages.push({ role: 'user', content: { kind: 'blocks', blocks: toolResults } })
      }
      continue
    }

    toolResults = null
    messages.push(parseMessage(msg, options.textSeparator))
  }

  const result: GenericRequest = {
    model: typeof request.model === 'string' ? request.model : '',
    messages,
    maxTokens: optionalNumber(request.max_tokens) ?? 0,
    temperature: optionalNumber(request.temperature) ?? 0,
    stream: request.stream === true,
  }

  if (system) result.system = system

  const tools = parseTools(request.tools)
  if (tools) result.tools = tools

  const toolChoice = parseToolChoice(request.tool_choice)
  if (toolChoice) result.toolChoice = toolChoice

  return result
}

function parseMessage(msg: OpenAIMessage, separator: string): GenericMessage {
  const content =
    msg.role === 'assistant'
      ? parseAssistantContent(msg.content, msg.tool_calls, separator)
      : parseOpenAIContent(msg.content)

  const result: GenericMessage = { role: msg.role, content }
  const name = optionalString(msg.name)
  if (name) result.name = name
  return result
}

function parseToolMessage(msg: OpenAIMessage, separator: string): ToolResultBlock {
  const toolUseId = optionalString(msg.tool_call_id)
  if (!toolUseId) {
    throw malformed(PROVIDER, 'request', 'tool message is missing tool_call_id')
  }
  return {
    type: 'tool_result',
    tool_use_id: toolUseId,
    content: parseOpenAIText(msg.content, separator),
  }
}

function parseTools(tools: unknown): Tool[] | undefined {
  if (!Array.isArray(tools)) return undefined

  return tools.map((tool, index): Tool => {
    if (!isRecord(tool) || !isRecord(tool.function) || typeof tool.function.name !== 'string') {
      throw malformed(PROVIDER, 'request', `tool ${index} must have a function name`)
    }
    const fn = tool.function
    const parsed: Tool = {
      name: typeof fn.name === 'string' ? fn.name : '',
      inputSchema: isRecord(fn.parameters) ? fn.parameters : { type: 'object' },
    }
    const description = optionalString(fn.description)
    if (description) parsed.description = description
    return parsed
  })
}

function parseToolChoice(choice: unknown): ToolChoice | undefined {
  switch (choice) {
    case 'auto':
      return { type: 'auto' }
    case 'none':
      return { type: 'none' }
    case 'required':
      return { type: 'any' }
  }
  if (isRecord(choice) && isRecord(choice.function) && typeof choice.function.name === 'string') {
    return { type: 'tool', name: choice.function.name }
  }
  return undefined
}

// =============================================================================
// Generic → OpenAI
// =============================================================================

/**
 * Transform GenericRequest into an OpenAI request
 *
 * The system prompt becomes a leading system message. Block content is
 * flattened: assistant tool_use blocks become native tool_calls, user
 * tool_result blocks become `tool` messages, everything else is joined text.
 */
export function transform(
  request: GenericRequest,
  options: OpenAIOptions = DEFAULT_OPENAI_OPTIONS
): OpenAIRequest {
  const messages: OpenAIMessage[] = []

  if (request.system) {
    messages.push({ role: 'system', content: request.system })
  }

  for (const msg of request.messages) {
    messages.push(...transformMessage(msg, options.textSeparator))
  }

  const result: OpenAIRequest = {
    model: request.model,
    messages,
  }

  if (request.maxTokens !== 0) result.max_tokens = request.maxTokens
  if (request.temperature !== 0) result.temperature = request.temperature
  if (request.stream) result.stream = true

  if (request.tools && request.tools.length > 0) {
    result.tools = request.tools.map(transformTool)
  }
  if (request.toolChoice) {
    result.tool_choice = transformToolChoice(request.toolChoice)
  }

  return result
}

function transformMessage(msg: GenericMessage, separator: string): OpenAIMessage[] {
  if (msg.content.kind !== 'blocks') {
    return [withName({ role: msg.role, content: flattenContent(msg.content, { separator }) }, msg.name)]
  }

  const blocks = msg.content.blocks
  if (msg.role === 'assistant') {
    return [withName(transformAssistantBlocks(blocks, separator), msg.name)]
  }

  const toolResults = blocks.filter(isToolResultBlock)
  const rest = blocks.filter((block) => !isToolResultBlock(block) && !isRawBlock(block))

  const result: OpenAIMessage[] = toolResults.map((block) => ({
    role: 'tool',
    tool_call_id: block.tool_use_id,
    content: toolResultText(block, separator),
  }))

  if (rest.length > 0 || toolResults.length === 0) {
    result.push(withName({ role: msg.role, content: flattenBlocks(rest, { separator }) }, msg.name))
  }

  return result
}

function transformAssistantBlocks(blocks: ContentBlock[], separator: string): OpenAIMessage {
  const { text, toolCalls } = splitAssistantBlocks(blocks, separator)
  if (toolCalls.length === 0) {
    return { role: 'assistant', content: text }
  }
  return {
    role: 'assistant',
    content: text || null,
    tool_calls: toolCalls,
  }
}

function withName(msg: OpenAIMessage, name: string | undefined): OpenAIMessage {
  if (name) msg.name = name
  return msg
}

function transformTool(tool: Tool): OpenAITool {
  const result: OpenAITool = {
    type: 'function',
    function: {
      name: tool.name,
      parameters: tool.inputSchema,
    },
  }
  if (tool.description) result.function.description = tool.description
  return result
}

function transformToolChoice(choice: ToolChoice): OpenAIToolChoice {
  switch (choice.type) {
    case 'auto':
      return 'auto'
    case 'none':
      return 'none'
    case 'any':
      return 'required'
    case 'tool':
      return { type: 'function', function: { name: choice.name } }
  }
}
