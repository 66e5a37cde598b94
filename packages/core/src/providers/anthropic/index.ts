/**
 * Anthropic Codec
 *
 * Codec for the Anthropic Messages API. Anthropic is the client-facing
 * protocol, so its shapes are closest to the generic model: a dedicated system
 * field and typed content blocks.
 */

import type { GenericRequest, GenericResponse, ProviderFormat } from '../../types/generic'
import { BaseCodec, type CodecCapabilities, type CodecOptions } from '../base'
import { parse, transform } from './request'
import { parseResponse, transformResponse } from './response'
import type { AnthropicRequest, AnthropicResponse } from './types'

const ANTHROPIC_CAPABILITIES: CodecCapabilities = {
  supportsTools: true,
  supportsStreaming: true,
  maxTokens: 200000,
}

export class AnthropicCodec extends BaseCodec {
  readonly format: ProviderFormat = 'anthropic'
  readonly label = 'Anthropic'

  constructor(options: CodecOptions = {}) {
    super(ANTHROPIC_CAPABILITIES, options)
  }

  parseRequest(request: unknown): GenericRequest {
    return parse(request)
  }

  transformRequest(request: GenericRequest): AnthropicRequest {
    return transform(request)
  }

  parseResponse(response: unknown): GenericResponse {
    return parseResponse(response)
  }

  transformResponse(response: GenericResponse): AnthropicResponse {
    return transformResponse(response)
  }
}

export { parse, transform } from './request'
export { parseResponse, transformResponse } from './response'
export * from './types'
