/**
 * Generic JSON <-> typed generic model
 *
 * The generic wire form is the camelCase serialization of GenericRequest /
 * GenericResponse with `content` written back as its raw JSON value.
 */

import { decodeContent, encodeContent } from '../content/normalize'
import { StructuralError } from '../errors'
import { isRecord, optionalNumber, optionalString } from '../util/json'
import {
  computeUsage,
  type GenericMessage,
  type GenericRequest,
  type GenericResponse,
  type Tool,
  type ToolChoice,
  type Usage,
} from './generic'

export function decodeGenericRequest(value: unknown): GenericRequest {
  if (!isRecord(value)) {
    throw new StructuralError('generic request must be a JSON object')
  }
  if (!Array.isArray(value.messages)) {
    throw new StructuralError('generic request must have a messages array')
  }

  const request: GenericRequest = {
    model: optionalString(value.model) ?? '',
    messages: value.messages.map(decodeGenericMessage),
    maxTokens: optionalNumber(value.maxTokens) ?? 0,
    temperature: optionalNumber(value.temperature) ?? 0,
    stream: value.stream === true,
  }

  const system = optionalString(value.system)
  if (system !== undefined) request.system = system
  if (value.metadata !== undefined && value.metadata !== null) request.metadata = value.metadata
  if (Array.isArray(value.tools)) request.tools = value.tools.map(decodeTool)

  const toolChoice = decodeToolChoice(value.toolChoice)
  if (toolChoice) request.toolChoice = toolChoice

  return request
}

export function encodeGenericRequest(request: GenericRequest): Record<string, unknown> {
  return {
    model: request.model,
    messages: request.messages.map((message) => ({
      role: message.role,
      content: encodeContent(message.content),
      name: message.name,
    })),
    system: request.system,
    maxTokens: request.maxTokens,
    temperature: request.temperature,
    stream: request.stream,
    metadata: request.metadata,
    tools: request.tools,
    toolChoice: request.toolChoice,
  }
}

export function decodeGenericResponse(value: unknown): GenericResponse {
  if (!isRecord(value)) {
    throw new StructuralError('generic response must be a JSON object')
  }

  const response: GenericResponse = {
    id: optionalString(value.id) ?? '',
    type: optionalString(value.type) ?? '',
    role: optionalString(value.role) ?? '',
    content: decodeContent(value.content),
    model: optionalString(value.model) ?? '',
  }

  const usage = decodeUsage(value.usage)
  if (usage) response.usage = usage

  const stopReason = optionalString(value.stopReason)
  if (stopReason) response.stopReason = stopReason

  return response
}

export function encodeGenericResponse(response: GenericResponse): Record<string, unknown> {
  return {
    id: response.id,
    type: response.type,
    role: response.role,
    content: encodeContent(response.content),
    model: response.model,
    usage: response.usage,
    stopReason: response.stopReason,
  }
}

function decodeGenericMessage(value: unknown, index: number): GenericMessage {
  if (!isRecord(value) || typeof value.role !== 'string') {
    throw new StructuralError(`message ${index}: must be an object with a string role`)
  }

  const message: GenericMessage = {
    role: value.role,
    content: decodeContent(value.content),
  }
  const name = optionalString(value.name)
  if (name) message.name = name
  return message
}

function decodeTool(value: unknown, index: number): Tool {
  if (!isRecord(value) || typeof value.name !== 'string') {
    throw new StructuralError(`tool ${index}: must be an object with a string name`)
  }
  if (!isRecord(value.inputSchema)) {
    throw new StructuralError(`tool ${index} (${value.name}): inputSchema must be an object`)
  }

  const tool: Tool = { name: value.name, inputSchema: value.inputSchema }
  const description = optionalString(value.description)
  if (description !== undefined) tool.description = description
  return tool
}

export function decodeToolChoice(value: unknown): ToolChoice | undefined {
  if (!isRecord(value)) return undefined

  switch (value.type) {
    case 'auto':
    case 'any':
    case 'none':
      return { type: value.type }
    case 'tool':
      return typeof value.name === 'string' ? { type: 'tool', name: value.name } : undefined
    default:
      return undefined
  }
}

function decodeUsage(value: unknown): Usage | undefined {
  if (!isRecord(value)) return undefined
  return computeUsage(
    optionalNumber(value.inputTokens) ?? 0,
    optionalNumber(value.outputTokens) ?? 0,
    optionalNumber(value.totalTokens)
  )
}
