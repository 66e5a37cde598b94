/**
 * Google Request Transformations
 *
 * Handles bidirectional transformation between Gemini GenerateContent
 * requests and GenericRequest.
 */

import type { GenericMessage, GenericRequest, Tool, ToolChoice } from '../../types/generic'
import { isRecord, optionalNumber, optionalString } from '../../util/json'
import { malformed } from '../base'
import {
  DEFAULT_GOOGLE_OPTIONS,
  type GoogleOptions,
  parsePartsContent,
  partsText,
  toGenericRole,
  toGoogleRole,
  toParts,
} from './shared'
import {
  type GoogleContent,
  type GoogleFunctionDeclaration,
  type GoogleGenerationConfig,
  type GoogleRequest,
  type GoogleToolConfig,
  isGoogleRequest,
} from './types'

const PROVIDER = 'Google'

// =============================================================================
// Google → Generic
// =============================================================================

/**
 * Parse a Google request into GenericRequest
 *
 * The body carries no model name, so `model` is empty. A content without a
 * role is a user turn.
 */
export function parse(request: unknown, options: GoogleOptions = DEFAULT_GOOGLE_OPTIONS): GenericRequest {
  if (!isGoogleRequest(request)) {
    throw malformed(PROVIDER, 'request', 'contents must be an array of content objects')
  }

  const contents: unknown[] = request.contents
  const messages = contents.map((content) => parseContent(content, options.textSeparator))

  const config: unknown = request.generationConfig
  const result: GenericRequest = {
    model: '',
    messages,
    maxTokens: isRecord(config) ? (optionalNumber(config.maxOutputTokens) ?? 0) : 0,
    temperature: isRecord(config) ? (optionalNumber(config.temperature) ?? 0) : 0,
    stream: false,
  }

  const instruction: unknown = request.systemInstruction
  if (isRecord(instruction)) {
    const system = partsText(instruction.parts, options.textSeparator)
    if (system) result.system = system
  }

  const tools = parseTools(request.tools)
  if (tools.length > 0) result.tools = tools

  const toolChoice = parseToolConfig(request.toolConfig)
  if (toolChoice) result.toolChoice = toolChoice

  return result
}

function parseContent(content: unknown, separator: string): GenericMessage {
  const record: Record<string, unknown> = isRecord(content) ? content : {}
  return {
    role: toGenericRole(optionalString(record.role) || 'user'),
    content: parsePartsContent(record.parts, separator),
  }
}

function parseTools(tools: unknown): Tool[] {
  if (!Array.isArray(tools)) return []

  const result: Tool[] = []
  for (const tool of tools) {
    if (!isRecord(tool) || !Array.isArray(tool.functionDeclarations)) continue

    for (const declaration of tool.functionDeclarations) {
      if (!isRecord(declaration) || typeof declaration.name !== 'string') {
        throw malformed(PROVIDER, 'request', 'function declarations must have a string name')
      }
      const schema = declaration.parameters ?? declaration.parametersJsonSchema
      const parsed: Tool = {
        name: declaration.name,
        inputSchema: isRecord(schema) ? schema : { type: 'object' },
      }
      const description = optionalString(declaration.description)
      if (description) parsed.description = description
      result.push(parsed)
    }
  }
  return result
}

function parseToolConfig(toolConfig: unknown): ToolChoice | undefined {
  if (!isRecord(toolConfig) || !isRecord(toolConfig.functionCallingConfig)) return undefined
  const { mode, allowedFunctionNames } = toolConfig.functionCallingConfig

  switch (mode) {
    case 'AUTO':
      return { type: 'auto' }
    case 'NONE':
      return { type: 'none' }
    case 'ANY': {
      // A single allowed function is a forced tool choice
      const names: unknown[] = Array.isArray(allowedFunctionNames) ? allowedFunctionNames : []
      const [name] = names
      if (names.length === 1 && typeof name === 'string') {
        return { type: 'tool', name }
      }
      return { type: 'any' }
    }
    default:
      return undefined
  }
}

// =============================================================================
// Generic → Google
// =============================================================================

/**
 * Transform GenericRequest into a Google request
 *
 * Google gets the system prompt as a leading user turn. Each message becomes
 * one text part; tool blocks travel as markers inside that text.
 */
export function transform(
  request: GenericRequest,
  options: GoogleOptions = DEFAULT_GOOGLE_OPTIONS
): GoogleRequest {
  const contents: GoogleContent[] = []

  if (request.system) {
    contents.push({ role: 'user', parts: [{ text: request.system }] })
  }

  for (const msg of request.messages) {
    contents.push({
      role: toGoogleRole(msg.role),
      parts: toParts(msg.content, options.textSeparator),
    })
  }

  const result: GoogleRequest = { contents }

  if (request.maxTokens > 0 || request.temperature > 0) {
    const config: GoogleGenerationConfig = {}
    if (request.maxTokens > 0) config.maxOutputTokens = request.maxTokens
    if (request.temperature > 0) config.temperature = request.temperature
    result.generationConfig = config
  }

  if (request.tools && request.tools.length > 0) {
    result.tools = [{ functionDeclarations: request.tools.map(transformTool) }]
  }
  if (request.toolChoice) {
    result.toolConfig = transformToolChoice(request.toolChoice)
  }

  return result
}

function transformTool(tool: Tool): GoogleFunctionDeclaration {
  const declaration: GoogleFunctionDeclaration = {
    name: tool.name,
    parameters: tool.inputSchema,
  }
  if (tool.description) declaration.description = tool.description
  return declaration
}

function transformToolChoice(choice: ToolChoice): GoogleToolConfig {
  switch (choice.type) {
    case 'auto':
      return { functionCallingConfig: { mode: 'AUTO' } }
    case 'none':
      return { functionCallingConfig: { mode: 'NONE' } }
    case 'any':
      return { functionCallingConfig: { mode: 'ANY' } }
    case 'tool':
      return { functionCallingConfig: { mode: 'ANY', allowedFunctionNames: [choice.name] } }
  }
}
