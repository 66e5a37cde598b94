/**
 * Tool Call Argument Validator
 *
 * Checks a concrete tool call's JSON arguments against the declared tool's
 * input schema: required parameters, top-level value types and, when the
 * schema closes it, the set of allowed parameters.
 */

import { ToolCallValidationError } from '../errors'
import type { Tool, ToolCall } from '../types/generic'
import { isRecord } from '../util/json'

type ValueType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object' | 'null'

interface TypeRule {
  matches: (value: unknown) => boolean
  /** Completes "parameter 'x' must be …" */
  expected: string
  suggestion: string
}

const TYPE_RULES: Record<ValueType, TypeRule> = {
  string: {
    matches: (value) => typeof value === 'string',
    expected: 'a string',
    suggestion: 'Ensure the parameter value is a string',
  },
  number: {
    matches: (value) => typeof value === 'number' && Number.isFinite(value),
    expected: 'a number',
    suggestion: 'Ensure the parameter value is a number',
  },
  integer: {
    matches: (value) => typeof value === 'number' && Number.isInteger(value),
    expected: 'an integer',
    suggestion: 'Ensure the parameter value is a whole number',
  },
  boolean: {
    matches: (value) => typeof value === 'boolean',
    expected: 'a boolean',
    suggestion: 'Ensure the parameter value is true or false',
  },
  array: {
    matches: (value) => Array.isArray(value),
    expected: 'an array',
    suggestion: 'Ensure the parameter value is an array',
  },
  object: {
    matches: isRecord,
    expected: 'an object',
    suggestion: 'Ensure the parameter value is an object',
  },
  null: {
    matches: (value) => value === null,
    expected: 'null',
    suggestion: 'Ensure the parameter value is null',
  },
}

function isValueType(type: unknown): type is ValueType {
  return typeof type === 'string' && Object.hasOwn(TYPE_RULES, type)
}

/**
 * Validate a tool call's arguments against the tool's input schema.
 *
 * @throws ToolCallValidationError with type `validation_error`, `json_error`
 *   or `type_error`
 */
export function validateToolCallArguments(toolCall: ToolCall, tool: Tool): void {
  const toolName = toolCall.function.name
  const toolId = toolCall.id
  const schema = tool.inputSchema
  const required = requiredParameters(schema.required)

  if (toolCall.function.arguments === '') {
    if (required.length > 0) {
      throw new ToolCallValidationError(
        'validation_error',
        'tool call has empty arguments but tool requires parameters',
        {
          toolName,
          toolId,
          field: 'required_parameters',
          value: required,
          suggestions: ['Provide the required parameters in the function arguments'],
        }
      )
    }
    return
  }

  const args = parseArguments(toolCall.function.arguments, toolName, toolId)

  for (const name of required) {
    if (!Object.hasOwn(args, name)) {
      throw new ToolCallValidationError('validation_error', `missing required parameter '${name}'`, {
        toolName,
        toolId,
        field: name,
        suggestions: [`Add the '${name}' parameter to the tool call`],
      })
    }
  }

  const properties = isRecord(schema.properties) ? schema.properties : undefined
  if (!properties) return

  for (const [name, value] of Object.entries(args)) {
    if (Object.hasOwn(properties, name)) {
      validateArgumentValue(name, value, properties[name], toolName, toolId)
    } else if (schema.additionalProperties === false) {
      throw new ToolCallValidationError('validation_error', `unexpected parameter '${name}'`, {
        toolName,
        toolId,
        field: name,
        value,
        suggestions: ['Remove the unexpected parameter', 'Check the tool schema for allowed parameters'],
      })
    }
  }
}

function requiredParameters(required: unknown): string[] {
  if (!Array.isArray(required)) return []
  return required.filter((entry): entry is string => typeof entry === 'string')
}

function parseArguments(raw: string, toolName: string, toolId: string): Record<string, unknown> {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new ToolCallValidationError('json_error', 'invalid JSON in tool call arguments', {
      toolName,
      toolId,
      field: 'arguments',
      value: raw,
      context: { parseError: error instanceof Error ? error.message : String(error) },
      suggestions: ['Ensure the arguments are valid JSON', 'Check for missing quotes or commas'],
    })
  }

  if (!isRecord(parsed)) {
    throw new ToolCallValidationError('json_error', 'tool call arguments must be a JSON object', {
      toolName,
      toolId,
      field: 'arguments',
      value: raw,
      suggestions: ['Ensure the arguments are valid JSON', 'Wrap the parameters in a JSON object'],
    })
  }

  return parsed
}

function validateArgumentValue(
  name: string,
  value: unknown,
  propertySchema: unknown,
  toolName: string,
  toolId: string
): void {
  // Properties without a usable type are not checked
  if (!isRecord(propertySchema) || !isValueType(propertySchema.type)) return

  const expectedType = propertySchema.type
  const rule = TYPE_RULES[expectedType]
  if (rule.matches(value)) return

  throw new ToolCallValidationError('type_error', `parameter '${name}' must be ${rule.expected}`, {
    toolName,
    toolId,
    field: name,
    value,
    context: { expectedType },
    suggestions: [rule.suggestion],
  })
}
