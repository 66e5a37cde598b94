/**
 * @wirebridge/core - Multi-provider message conversion
 *
 * Bidirectional translation of chat requests and responses between
 * Anthropic, OpenAI, Google Gemini and AWS Bedrock through one generic model.
 *
 * @example
 * ```typescript
 * import { convertRequest, convertResponse } from '@wirebridge/core'
 *
 * // Anthropic request → OpenAI request
 * const openaiBody = convertRequest(anthropicBody, 'anthropic', 'openai')
 *
 * // OpenAI response → Anthropic response
 * const anthropicReply = convertResponse(openaiReply, 'openai', 'anthropic')
 * ```
 */

// Configuration
export {
  type ConverterConfig,
  converterConfigFromEnv,
  DEFAULT_CONVERTER_CONFIG,
  resolveConverterConfig,
} from './config'

// Content helpers
export { encodeBlock, isRawBlock, parseContentBlock, parseContentBlocks, toolResultText } from './content/blocks'
export {
  blockContent,
  contentBlocks,
  decodeContent,
  encodeContent,
  type FlattenOptions,
  flattenBlocks,
  flattenContent,
  joinTextBlocks,
  textContent,
} from './content/normalize'
export {
  encodeToolResultMarker,
  encodeToolUseMarker,
  extractToolMarkers,
  hasToolMarkers,
  TOOL_RESULT_END,
  TOOL_RESULT_START,
  TOOL_USE_END,
  TOOL_USE_START,
} from './content/tool-markers'

// Errors
export {
  ConfigError,
  ContentParseError,
  ConversionError,
  type ConversionPhase,
  type Direction,
  type ErrorCode,
  RequestValidationError,
  SchemaValidationError,
  StructuralError,
  type ToolCallErrorType,
  ToolCallValidationError,
  UnmarshalError,
  UnsupportedFormatError,
  WirebridgeError,
} from './errors'

// Codecs
export { AnthropicCodec } from './providers/anthropic'
export type { AnthropicMessage, AnthropicRequest, AnthropicResponse, AnthropicTool } from './providers/anthropic/types'
export { type AwsCodecOptions, AwsCodec, DEFAULT_AWS_OPTIONS } from './providers/aws'
export type { AwsMessage, AwsRequest, AwsResponse } from './providers/aws/types'
export { BaseCodec, type Codec, type CodecCapabilities, type CodecOptions } from './providers/base'
export { type GoogleCodecOptions, GoogleCodec } from './providers/google'
export type { GoogleContent, GoogleRequest, GoogleResponse } from './providers/google/types'
export { type OpenAICodecOptions, OpenAICodec } from './providers/openai'
export type { OpenAIMessage, OpenAIRequest, OpenAIResponse, OpenAIToolCall } from './providers/openai/types'
export { FormatRegistry } from './providers/registry'

// Conversion
export {
  createToolConversionContext,
  type ToolConversionContext,
  type ToolConversionContextOptions,
} from './transform/context'
export {
  Converter,
  type ConverterOptions,
  convertRequest,
  convertResponse,
  convertStreamEvent,
  createDefaultRegistry,
  type DefaultRegistryOptions,
  getDefaultConverter,
} from './transform/converter'
export { applyToolFallback, describeTools, TOOL_DESCRIPTIONS_HEADER } from './transform/tool-fallback'

// Generic model
export * from './types/generic'
export {
  decodeGenericRequest,
  decodeGenericResponse,
  encodeGenericRequest,
  encodeGenericResponse,
} from './types/generic-json'

// Validation
export { type RequestValidationResult, validateRequest } from './validation/request'
export { validateToolCallArguments } from './validation/tool-call'
export {
  MAX_SCHEMA_DEPTH,
  type SchemaValidationResult,
  SCHEMA_TYPES,
  STRING_FORMATS,
  validateToolSchema,
} from './validation/tool-schema'

// Logging
export { createLogger, type LogContext, type Logger, logger } from './util/logger'
