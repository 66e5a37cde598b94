/**
 * Tool Schema Validator
 *
 * Walks a tool's input schema and rejects shapes providers refuse. Nested
 * schemas (object properties, array items, additionalProperties) are walked
 * recursively with an explicit depth: root-level properties sit at depth 1.
 */

import { SchemaValidationError } from '../errors'
import type { ToolConversionContext } from '../transform/context'
import type { Tool } from '../types/generic'
import { isRecord } from '../util/json'
import { createLogger, type Logger } from '../util/logger'

const log = createLogger({ module: 'tool-schema' })

export const MAX_SCHEMA_DEPTH = 10

export const SCHEMA_TYPES = ['string', 'number', 'integer', 'boolean', 'array', 'object', 'null'] as const

export const STRING_FORMATS: ReadonlySet<string> = new Set([
  'date-time',
  'date',
  'time',
  'email',
  'hostname',
  'ipv4',
  'ipv6',
  'uri',
  'uuid',
])

export interface SchemaValidationResult {
  /** Non-fatal findings, also logged at warn */
  warnings: string[]
}

interface WalkState {
  toolName: string
  warnings: string[]
  logger: Logger
}

/**
 * Validate a tool definition's name and input schema.
 *
 * @throws SchemaValidationError on the first problem found
 */
export function validateToolSchema(tool: Tool, context?: ToolConversionContext): SchemaValidationResult {
  if (!tool.name) {
    throw new SchemaValidationError('tool name is required')
  }

  const state: WalkState = {
    toolName: tool.name,
    warnings: [],
    logger: context?.logger ?? log,
  }

  const schema: unknown = tool.inputSchema
  if (!isRecord(schema)) {
    throw new SchemaValidationError('input schema must be an object', '', tool.name)
  }
  if (schema.type !== 'object') {
    throw new SchemaValidationError("schema must have type 'object'", '', tool.name)
  }

  validateProperties(schema.properties, '', 1, state)
  validateRequired(schema.required, '', state)

  return { warnings: state.warnings }
}

function fail(state: WalkState, path: string, reason: string): SchemaValidationError {
  return new SchemaValidationError(reason, path, state.toolName)
}

function warn(state: WalkState, message: string, fields: Record<string, unknown>): void {
  state.warnings.push(message)
  state.logger.warn({ tool: state.toolName, ...fields }, message)
}

function childPath(parent: string, name: string): string {
  return parent ? `${parent}.${name}` : name
}

function validateProperties(properties: unknown, path: string, depth: number, state: WalkState): void {
  if (properties === undefined) return
  if (!isRecord(properties)) {
    throw fail(state, path, 'properties must be an object')
  }

  for (const [name, definition] of Object.entries(properties)) {
    validateProperty(childPath(path, name), definition, depth, state)
  }
}

function validateRequired(required: unknown, path: string, state: WalkState): void {
  if (required === undefined) return
  if (!Array.isArray(required)) {
    throw fail(state, path, 'required must be an array')
  }

  required.forEach((entry: unknown, index) => {
    if (typeof entry !== 'string') {
      throw fail(state, path, `required[${index}] must be a string`)
    }
  })
}

function validateProperty(path: string, definition: unknown, depth: number, state: WalkState): void {
  if (depth > MAX_SCHEMA_DEPTH) {
    throw fail(state, path, `schema nesting too deep (max ${MAX_SCHEMA_DEPTH} levels)`)
  }
  if (!isRecord(definition)) {
    throw fail(state, path, 'property definition must be an object')
  }

  if (!('type' in definition)) {
    warn(state, `property '${path}' is missing a type definition`, { property: path, depth })
    return
  }

  const { type } = definition
  if (typeof type !== 'string') {
    throw fail(state, path, 'type must be a string')
  }
  if (!isSchemaType(type)) {
    throw fail(state, path, `invalid type: ${type} (allowed: ${SCHEMA_TYPES.join(', ')})`)
  }

  switch (type) {
    case 'array':
      validateArraySchema(path, definition, depth, state)
      break
    case 'object':
      validateObjectSchema(path, definition, depth, state)
      break
    case 'string':
      validateStringSchema(path, definition, state)
      break
    case 'number':
    case 'integer':
      validateNumberSchema(path, definition, state)
      break
  }
}

function isSchemaType(type: string): type is (typeof SCHEMA_TYPES)[number] {
  return SCHEMA_TYPES.some((candidate) => candidate === type)
}

function validateArraySchema(path: string, schema: Record<string, unknown>, depth: number, state: WalkState): void {
  if ('items' in schema) {
    validateProperty(`${path}[items]`, schema.items, depth + 1, state)
  }
  validateNonNegative(schema, 'minItems', path, state)
  validateNonNegative(schema, 'maxItems', path, state)
}

function validateObjectSchema(path: string, schema: Record<string, unknown>, depth: number, state: WalkState): void {
  validateProperties(schema.properties, path, depth + 1, state)
  validateRequired(schema.required, path, state)

  const additional = schema.additionalProperties
  if (additional === undefined || typeof additional === 'boolean') return
  if (!isRecord(additional)) {
    throw fail(state, path, 'additionalProperties must be boolean or schema object')
  }
  validateProperty(`${path}[additionalProperties]`, additional, depth + 1, state)
}

function validateStringSchema(path: string, schema: Record<string, unknown>, state: WalkState): void {
  validateNonNegative(schema, 'minLength', path, state)
  validateNonNegative(schema, 'maxLength', path, state)

  if ('format' in schema) {
    const { format } = schema
    if (typeof format !== 'string') {
      throw fail(state, path, 'format must be a string')
    }
    if (!STRING_FORMATS.has(format)) {
      warn(state, `property '${path}' has unknown string format '${format}'`, { property: path, format })
    }
  }

  if ('enum' in schema) {
    const values = schema.enum
    if (!Array.isArray(values)) {
      throw fail(state, path, 'enum must be an array')
    }
    if (values.length === 0) {
      throw fail(state, path, 'enum array cannot be empty')
    }
    values.forEach((value: unknown, index) => {
      if (typeof value !== 'string') {
        throw fail(state, path, `enum[${index}] must be a string for string type`)
      }
    })
  }
}

function validateNumberSchema(path: string, schema: Record<string, unknown>, state: WalkState): void {
  for (const key of ['minimum', 'maximum', 'exclusiveMinimum', 'exclusiveMaximum'] as const) {
    if (key in schema && !isNumber(schema[key])) {
      throw fail(state, path, `${key} must be a number`)
    }
  }

  if ('multipleOf' in schema) {
    const { multipleOf } = schema
    if (!isNumber(multipleOf)) {
      throw fail(state, path, 'multipleOf must be a number')
    }
    if (multipleOf <= 0) {
      throw fail(state, path, 'multipleOf must be greater than 0')
    }
  }
}

function validateNonNegative(schema: Record<string, unknown>, key: string, path: string, state: WalkState): void {
  if (!(key in schema)) return
  const value = schema[key]
  if (!isNumber(value)) {
    throw fail(state, path, `${key} must be a number`)
  }
  if (value < 0) {
    throw fail(state, path, `${key} cannot be negative`)
  }
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}
