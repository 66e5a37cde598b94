import { describe, expect, it } from 'vitest'
import {
  ConversionError,
  SchemaValidationError,
  StructuralError,
  ToolCallValidationError,
  UnmarshalError,
  UnsupportedFormatError,
  WirebridgeError,
} from '../src/errors'

describe('errors', () => {
  it('should carry a code and a name', () => {
    const error = new StructuralError('no choices in OpenAI response')

    expect(error).toBeInstanceOf(WirebridgeError)
    expect(error.code).toBe('structural_error')
    expect(error.name).toBe('StructuralError')
  })

  it('should name the provider and direction of unmarshal failures', () => {
    expect(new UnmarshalError('Google', 'response', new Error('bad token')).message).toBe(
      'failed to unmarshal Google response: bad token'
    )
  })

  it('should describe schema failures with tool and path', () => {
    expect(new SchemaValidationError('type must be a string', 'a.b', 'lookup').message).toBe(
      "invalid schema for tool 'lookup' at 'a.b': type must be a string"
    )
    expect(new SchemaValidationError('tool name is required').message).toBe(
      'invalid schema for tool: tool name is required'
    )
  })

  it('should describe tool call failures with or without a tool name', () => {
    expect(new ToolCallValidationError('json_error', 'invalid JSON in tool call arguments').message).toBe(
      'tool call validation failed: invalid JSON in tool call arguments'
    )
  })

  it('should keep the phase and cause of conversion failures', () => {
    const cause = new UnsupportedFormatError('target', 'cohere')
    const error = new ConversionError('encode', cause)

    expect(error.phase).toBe('encode')
    expect(error.cause).toBe(cause)
    expect(error.message).toBe('failed to convert from generic format: unsupported target format: cohere')
    expect(new ConversionError('decode', 'boom').message).toBe('failed to convert to generic format: boom')
  })
})
