/**
 * Conversion dispatcher
 *
 * Flow: Source bytes → parse → GenericRequest/Response → (validate) → transform → Target bytes
 *
 * `generic` is accepted on either side and reads or writes the generic JSON
 * directly.
 */

import { type ConverterConfig, converterConfigFromEnv, resolveConverterConfig } from '../config'
import { ConversionError, type ConversionPhase, UnsupportedFormatError } from '../errors'
import { AnthropicCodec } from '../providers/anthropic'
import { AwsCodec, type AwsCodecOptions } from '../providers/aws'
import { type Codec, type CodecCapabilities, type CodecOptions, parseJSON } from '../providers/base'
import { GoogleCodec, type GoogleCodecOptions } from '../providers/google'
import { OpenAICodec, type OpenAICodecOptions } from '../providers/openai'
import { FormatRegistry } from '../providers/registry'
import { type GenericRequest, isMessageFormat, type StreamEvent } from '../types/generic'
import {
  decodeGenericRequest,
  decodeGenericResponse,
  encodeGenericRequest,
  encodeGenericResponse,
} from '../types/generic-json'
import { stringifyJSON } from '../util/json'
import { createLogger, type Logger } from '../util/logger'
import { validateRequest } from '../validation/request'
import { createToolConversionContext, type ToolConversionContext } from './context'
import { applyToolFallback } from './tool-fallback'

const GENERIC_CAPABILITIES: CodecCapabilities = {
  supportsTools: true,
  supportsStreaming: true,
}

export interface DefaultRegistryOptions {
  anthropic?: CodecOptions
  openai?: OpenAICodecOptions
  google?: GoogleCodecOptions
  aws?: AwsCodecOptions
}

/**
 * Registry with the four built-in codecs
 */
export function createDefaultRegistry(options: DefaultRegistryOptions = {}): FormatRegistry {
  return new FormatRegistry([
    new AnthropicCodec(options.anthropic),
    new OpenAICodec(options.openai),
    new GoogleCodec(options.google),
    new AwsCodec(options.aws),
  ])
}

export interface ConverterOptions {
  registry?: FormatRegistry
  config?: Partial<ConverterConfig>
  logger?: Logger
}

/**
 * The codec for a format, or null for the generic hub itself
 */
type Endpoint = Codec | null

export class Converter {
  readonly registry: FormatRegistry
  readonly config: ConverterConfig
  private readonly logger: Logger

  constructor(options: ConverterOptions = {}) {
    this.registry = options.registry ?? createDefaultRegistry()
    this.config = resolveConverterConfig(options.config)
    this.logger = options.logger ?? createLogger({ module: 'converter' })
  }

  /**
   * Convert a request body between two formats
   *
   * @throws UnsupportedFormatError for an unknown format, ConversionError for
   *   anything that fails while decoding, validating or encoding
   */
  convertRequest(data: string, from: string, to: string): string {
    if (from === to) return data

    const source = this.resolve('source', from)
    const target = this.resolve('target', to)
    const context = this.createContext(target)
    context.logger.info({ from, to, kind: 'request' }, 'Converting request')

    const decoded = run('decode', () =>
      source
        ? source.parseRequest(parseJSON(data, source.label, 'request'))
        : decodeGenericRequest(parseJSON(data, 'generic', 'request'))
    )

    logToolBlocks(decoded, context)

    const request = run('validate', () => {
      validateRequest(decoded, this.config, context)
      if (target && !target.capabilities.supportsTools) {
        return applyToolFallback(decoded, context)
      }
      return decoded
    })

    const output = run('encode', () =>
      stringifyJSON(target ? target.transformRequest(request) : encodeGenericRequest(request))
    )

    context.logger.info({ from, to, durationMs: Date.now() - context.startTime }, 'Request converted')
    return output
  }

  /**
   * Convert a response body between two formats
   */
  convertResponse(data: string, from: string, to: string): string {
    if (from === to) return data

    const source = this.resolve('source', from)
    const target = this.resolve('target', to)
    const context = this.createContext(target)
    context.logger.info({ from, to, kind: 'response' }, 'Converting response')

    const response = run('decode', () =>
      source
        ? source.parseResponse(parseJSON(data, source.label, 'response'))
        : decodeGenericResponse(parseJSON(data, 'generic', 'response'))
    )

    const output = run('encode', () =>
      stringifyJSON(target ? target.transformResponse(response) : encodeGenericResponse(response))
    )

    context.logger.info({ from, to, durationMs: Date.now() - context.startTime }, 'Response converted')
    return output
  }

  /**
   * Route a stream event through the source codec's hook
   */
  convertStreamEvent(event: StreamEvent, from: string, to: string): StreamEvent {
    if (from === to) return event

    const source = this.resolve('source', from)
    // Unknown targets are rejected even though events pass through
    this.resolve('target', to)
    if (!source || !isMessageFormat(to)) return event

    return source.transformStreamEvent(event, to)
  }

  private resolve(side: 'source' | 'target', format: string): Endpoint {
    if (format === 'generic') return null
    if (!isMessageFormat(format)) {
      throw new UnsupportedFormatError(side, format)
    }
    const codec = this.registry.get(format)
    if (!codec) {
      throw new UnsupportedFormatError(side, format)
    }
    return codec
  }

  private createContext(target: Endpoint): ToolConversionContext {
    return createToolConversionContext(
      target?.label ?? 'generic',
      target?.capabilities ?? GENERIC_CAPABILITIES,
      { logger: this.logger }
    )
  }
}

function run<T>(phase: ConversionPhase, step: () => T): T {
  try {
    return step()
  } catch (error) {
    throw new ConversionError(phase, error)
  }
}

function logToolBlocks(request: GenericRequest, context: ToolConversionContext): void {
  let toolUses = 0
  let toolResults = 0
  for (const message of request.messages) {
    if (message.content.kind !== 'blocks') continue
    for (const block of message.content.blocks) {
      if (block.type === 'tool_use') toolUses++
      if (block.type === 'tool_result') toolResults++
    }
  }
  if (toolUses > 0 || toolResults > 0) {
    context.logger.debug({ toolUses, toolResults }, 'Converting tool blocks')
  }
}

// =============================================================================
// Default converter
// =============================================================================

let defaultConverter: Converter | undefined

/**
 * Shared converter with the built-in codecs and settings from the environment
 */
export function getDefaultConverter(): Converter {
  defaultConverter ??= new Converter({ config: converterConfigFromEnv() })
  return defaultConverter
}

export function convertRequest(data: string, from: string, to: string): string {
  return getDefaultConverter().convertRequest(data, from, to)
}

export function convertResponse(data: string, from: string, to: string): string {
  return getDefaultConverter().convertResponse(data, from, to)
}

export function convertStreamEvent(event: StreamEvent, from: string, to: string): StreamEvent {
  return getDefaultConverter().convertStreamEvent(event, from, to)
}
