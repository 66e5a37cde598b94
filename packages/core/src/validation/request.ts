/**
 * Request validation
 *
 * Runs between decode and encode on every request conversion. Enforces the
 * configured limits, message and block structure, tool definitions and the
 * arguments of tool_use blocks that name a declared tool.
 */

import type { ConverterConfig } from '../config'
import { RequestValidationError } from '../errors'
import type { ToolConversionContext } from '../transform/context'
import { encodeGenericRequest } from '../types/generic-json'
import {
  type ContentBlock,
  type GenericMessage,
  type GenericRequest,
  MESSAGE_ROLES,
  type Tool,
  type ToolUseBlock,
} from '../types/generic'
import { stringifyJSON } from '../util/json'
import { validateToolCallArguments } from './tool-call'
import { validateToolSchema } from './tool-schema'

export interface RequestValidationResult {
  warnings: string[]
}

/**
 * Validate a generic request before it is encoded for the target.
 *
 * @throws RequestValidationError, SchemaValidationError or ToolCallValidationError
 */
export function validateRequest(
  request: GenericRequest,
  config: ConverterConfig,
  context: ToolConversionContext
): RequestValidationResult {
  const warnings: string[] = []
  const warn = (message: string, fields: Record<string, unknown> = {}): void => {
    warnings.push(message)
    context.logger.warn(fields, message)
  }

  if (request.messages.length > config.maxMessages) {
    throw new RequestValidationError(
      `too many messages: ${request.messages.length} (max ${config.maxMessages})`
    )
  }

  const toolUses: ToolUseBlock[] = []
  request.messages.forEach((message, index) => {
    toolUses.push(...validateMessage(message, index, config, warn))
  })

  const size = Buffer.byteLength(stringifyJSON(encodeGenericRequest(request)), 'utf8')
  if (size > config.maxRequestSize) {
    throw new RequestValidationError(`request too large: ${size} bytes (max ${config.maxRequestSize})`)
  }

  const tools = request.tools ?? []
  if (tools.length > config.maxTools) {
    throw new RequestValidationError(`too many tools: ${tools.length} (max ${config.maxTools})`)
  }

  const declared = new Map<string, Tool>()
  tools.forEach((tool, index) => {
    if (config.validateSchemas) {
      warnings.push(...validateToolSchema(tool, context).warnings)
    } else if (!tool.name) {
      throw new RequestValidationError(`tool ${index}: tool name cannot be empty`)
    }
    declared.set(tool.name, tool)
  })

  for (const block of toolUses) {
    const tool = declared.get(block.name)
    if (tool) {
      validateToolCallArguments(
        {
          id: block.id,
          type: 'function',
          function: { name: block.name, arguments: stringifyJSON(block.input) },
        },
        tool
      )
      continue
    }

    const message = `tool_use block '${block.id}' references undeclared tool '${block.name}'`
    if (config.strictMode) {
      throw new RequestValidationError(message)
    }
    warn(message, { tool: block.name, toolUseId: block.id })
  }

  context.logger.debug(
    { messages: request.messages.length, tools: tools.length, toolUses: toolUses.length, bytes: size },
    'Request validated'
  )

  return { warnings }
}

type Warn = (message: string, fields?: Record<string, unknown>) => void

/**
 * Validate one message; returns its tool_use blocks
 */
function validateMessage(
  message: GenericMessage,
  index: number,
  config: ConverterConfig,
  warn: Warn
): ToolUseBlock[] {
  if (!MESSAGE_ROLES.some((role) => role === message.role)) {
    throw new RequestValidationError(`message ${index}: invalid role: ${message.role || '(empty)'}`)
  }

  const { content } = message
  switch (content.kind) {
    case 'text':
      checkTextSize(content.text, `message ${index}`, config)
      return []
    case 'opaque':
      return []
    case 'blocks':
      return content.blocks.flatMap((block, position) =>
        validateBlock(block, `message ${index}: content block ${position}`, config, warn)
      )
  }
}

function validateBlock(block: ContentBlock, where: string, config: ConverterConfig, warn: Warn): ToolUseBlock[] {
  switch (block.type) {
    case 'text':
      if (block.text === '') {
        warn(`${where}: empty text block`)
      }
      checkTextSize(block.text, where, config)
      return []
    case 'tool_use':
      if (!block.name) {
        throw new RequestValidationError(`${where}: tool_use name cannot be empty`)
      }
      if (!block.id) {
        throw new RequestValidationError(`${where}: tool_use ID cannot be empty`)
      }
      return [block]
    case 'tool_result':
      if (!block.tool_use_id) {
        throw new RequestValidationError(`${where}: tool_result must have tool_use_id`)
      }
      return []
    case 'raw':
      return []
  }
}

function checkTextSize(text: string, where: string, config: ConverterConfig): void {
  const size = Buffer.byteLength(text, 'utf8')
  if (size > config.maxMessageSize) {
    throw new RequestValidationError(`${where}: message content too large: ${size} bytes (max ${config.maxMessageSize})`)
  }
}
