/**
 * Error taxonomy for the conversion engine.
 *
 * Every error carries a stable `code` so the gateway layer can map it to an
 * HTTP status without parsing message text.
 */

export type ErrorCode =
  | 'unmarshal_error'
  | 'structural_error'
  | 'content_parse_error'
  | 'schema_validation_error'
  | 'tool_call_validation_error'
  | 'request_validation_error'
  | 'unsupported_format'
  | 'conversion_error'
  | 'config_error'

export class WirebridgeError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'WirebridgeError'
    this.code = code
  }
}

export type Direction = 'request' | 'response'

/**
 * Malformed JSON on either side of a codec
 */
export class UnmarshalError extends WirebridgeError {
  readonly provider: string
  readonly direction: Direction

  constructor(provider: string, direction: Direction, cause: unknown) {
    super('unmarshal_error', `failed to unmarshal ${provider} ${direction}: ${describe(cause)}`, {
      cause,
    })
    this.name = 'UnmarshalError'
    this.provider = provider
    this.direction = direction
  }
}

/**
 * A mandatory element is missing or has the wrong shape
 */
export class StructuralError extends WirebridgeError {
  constructor(message: string) {
    super('structural_error', message)
    this.name = 'StructuralError'
  }
}

export class ContentParseError extends WirebridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('content_parse_error', message, options)
    this.name = 'ContentParseError'
  }
}

export class SchemaValidationError extends WirebridgeError {
  readonly path: string
  readonly toolName: string
  readonly reason: string

  constructor(reason: string, path = '', toolName = '') {
    const where = path ? ` at '${path}'` : ''
    const tool = toolName ? `tool '${toolName}'` : 'tool'
    super('schema_validation_error', `invalid schema for ${tool}${where}: ${reason}`)
    this.name = 'SchemaValidationError'
    this.reason = reason
    this.path = path
    this.toolName = toolName
  }
}

export type ToolCallErrorType = 'validation_error' | 'json_error' | 'type_error'

export interface ToolCallErrorDetails {
  toolName?: string
  toolId?: string
  field?: string
  value?: unknown
  suggestions?: string[]
  context?: Record<string, unknown>
}

/**
 * Structured failure of a concrete tool call against its tool's schema
 */
export class ToolCallValidationError extends WirebridgeError {
  readonly type: ToolCallErrorType
  readonly detail: string
  readonly toolName: string
  readonly toolId: string
  readonly field: string
  readonly value: unknown
  readonly suggestions: string[]
  readonly context: Record<string, unknown>

  constructor(type: ToolCallErrorType, detail: string, details: ToolCallErrorDetails = {}) {
    const prefix = details.toolName
      ? `tool call validation failed for '${details.toolName}'`
      : 'tool call validation failed'
    super('tool_call_validation_error', `${prefix}: ${detail}`)
    this.name = 'ToolCallValidationError'
    this.type = type
    this.detail = detail
    this.toolName = details.toolName ?? ''
    this.toolId = details.toolId ?? ''
    this.field = details.field ?? ''
    this.value = details.value
    this.suggestions = details.suggestions ?? []
    this.context = details.context ?? {}
  }

  toJSON(): Record<string, unknown> {
    return {
      type: this.type,
      message: this.detail,
      toolName: this.toolName,
      toolId: this.toolId,
      field: this.field,
      value: this.value,
      suggestions: this.suggestions,
      context: this.context,
    }
  }
}

/**
 * A generic request breaks a configured limit or a structural rule
 */
export class RequestValidationError extends WirebridgeError {
  constructor(message: string) {
    super('request_validation_error', message)
    this.name = 'RequestValidationError'
  }
}

export class UnsupportedFormatError extends WirebridgeError {
  readonly side: 'source' | 'target'
  readonly format: string

  constructor(side: 'source' | 'target', format: string) {
    super('unsupported_format', `unsupported ${side} format: ${format}`)
    this.name = 'UnsupportedFormatError'
    this.side = side
    this.format = format
  }
}

export type ConversionPhase = 'decode' | 'validate' | 'encode'

const PHASE_MESSAGES: Record<ConversionPhase, string> = {
  decode: 'failed to convert to generic format',
  validate: 'request validation failed',
  encode: 'failed to convert from generic format',
}

/**
 * Wraps a failure with the side of the translation it happened on
 */
export class ConversionError extends WirebridgeError {
  readonly phase: ConversionPhase

  constructor(phase: ConversionPhase, cause: unknown) {
    super('conversion_error', `${PHASE_MESSAGES[phase]}: ${describe(cause)}`, { cause })
    this.name = 'ConversionError'
    this.phase = phase
  }
}

export class ConfigError extends WirebridgeError {
  constructor(message: string) {
    super('config_error', message)
    this.name = 'ConfigError'
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
