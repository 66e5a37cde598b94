/**
 * OpenAI Codec
 *
 * Codec for the OpenAI Chat Completions API. System prompts travel as a
 * system-role message and tool traffic as `tool_calls` / `tool` messages.
 */

import type { GenericRequest, GenericResponse, ProviderFormat } from '../../types/generic'
import { BaseCodec, type CodecCapabilities, type CodecOptions } from '../base'
import { parse, transform } from './request'
import { parseResponse, transformResponse } from './response'
import { DEFAULT_OPENAI_OPTIONS, type OpenAIOptions } from './shared'
import type { OpenAIRequest, OpenAIResponse } from './types'

const OPENAI_CAPABILITIES: CodecCapabilities = {
  supportsTools: true,
  supportsStreaming: true,
  maxTokens: 128000,
}

export interface OpenAICodecOptions extends CodecOptions {
  /** Separator used when block content is flattened to a string (default: a space) */
  textSeparator?: string
}

export class OpenAICodec extends BaseCodec {
  readonly format: ProviderFormat = 'openai'
  readonly label = 'OpenAI'
  private readonly options: OpenAIOptions

  constructor(options: OpenAICodecOptions = {}) {
    super(OPENAI_CAPABILITIES, options)
    this.options = {
      textSeparator: options.textSeparator ?? DEFAULT_OPENAI_OPTIONS.textSeparator,
    }
  }

  parseRequest(request: unknown): GenericRequest {
    return parse(request, this.options)
  }

  transformRequest(request: GenericRequest): OpenAIRequest {
    return transform(request, this.options)
  }

  parseResponse(response: unknown): GenericResponse {
    return parseResponse(response, this.options)
  }

  transformResponse(response: GenericResponse): OpenAIResponse {
    return transformResponse(response, this.options)
  }
}

export { parse, transform } from './request'
export { parseFinishReason, parseResponse, transformResponse, transformStopReason } from './response'
export type { OpenAIOptions } from './shared'
export * from './types'
