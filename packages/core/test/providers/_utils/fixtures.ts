import type {
  ContentBlock,
  GenericMessage,
  GenericRequest,
  GenericResponse,
  JSONSchema,
  Tool,
  ToolResultBlock,
  ToolUseBlock,
} from '../../../src/types/generic'

/**
 * Creates a generic message with bare string content
 */
export function createGenericMessage(role: string, text: string): GenericMessage {
  return {
    role,
    content: { kind: 'text', text },
  }
}

/**
 * Creates a generic message with block content
 */
export function createBlockMessage(role: string, blocks: ContentBlock[]): GenericMessage {
  return {
    role,
    content: { kind: 'blocks', blocks },
  }
}

/**
 * Creates a tool_use block
 */
export function createToolUse(
  name: string,
  input: Record<string, unknown> = {},
  id = 'toolu_test_1'
): ToolUseBlock {
  return { type: 'tool_use', id, name, input }
}

/**
 * Creates a tool_result block
 */
export function createToolResult(toolUseId: string, content = 'done'): ToolResultBlock {
  return { type: 'tool_result', tool_use_id: toolUseId, content }
}

/**
 * Creates a tool definition
 */
export function createTool(
  name: string,
  description?: string,
  inputSchema: JSONSchema = { type: 'object', properties: {} }
): Tool {
  const tool: Tool = { name, inputSchema }
  if (description !== undefined) tool.description = description
  return tool
}

/**
 * Creates a generic request with default values
 */
export function createGenericRequest(overrides: Partial<GenericRequest> = {}): GenericRequest {
  return {
    model: 'test-model',
    messages: [createGenericMessage('user', 'Hello')],
    maxTokens: 1000,
    temperature: 0.7,
    stream: false,
    ...overrides,
  }
}

/**
 * Creates a generic response with default values
 */
export function createGenericResponse(overrides: Partial<GenericResponse> = {}): GenericResponse {
  return {
    id: 'msg_test_1',
    type: 'message',
    role: 'assistant',
    content: { kind: 'blocks', blocks: [{ type: 'text', text: 'Hello! How can I help you today?' }] },
    model: 'test-model',
    stopReason: 'end_turn',
    usage: { inputTokens: 10, outputTokens: 20, totalTokens: 30 },
    ...overrides,
  }
}

/**
 * A weather tool schema used across suites
 */
export const WEATHER_SCHEMA: JSONSchema = {
  type: 'object',
  properties: {
    location: { type: 'string' },
    days: { type: 'integer', minimum: 1 },
  },
  required: ['location'],
}
