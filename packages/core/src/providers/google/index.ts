/**
 * Google Codec
 *
 * Codec for the Gemini GenerateContent API. Gemini has text-only parts here:
 * tool blocks ride inside the text as markers and are recovered on the way
 * back.
 */

import type { GenericRequest, GenericResponse, ProviderFormat } from '../../types/generic'
import { BaseCodec, type CodecCapabilities, type CodecOptions } from '../base'
import { parse, transform } from './request'
import { parseResponse, transformResponse } from './response'
import { DEFAULT_GOOGLE_OPTIONS, type GoogleOptions } from './shared'
import type { GoogleRequest, GoogleResponse } from './types'

const GOOGLE_CAPABILITIES: CodecCapabilities = {
  supportsTools: true,
  supportsStreaming: true,
  maxTokens: 65536,
}

export interface GoogleCodecOptions extends CodecOptions {
  /** Separator between concatenated parts (default: none) */
  textSeparator?: string
}

export class GoogleCodec extends BaseCodec {
  readonly format: ProviderFormat = 'google'
  readonly label = 'Google'
  private readonly options: GoogleOptions

  constructor(options: GoogleCodecOptions = {}) {
    super(GOOGLE_CAPABILITIES, options)
    this.options = {
      textSeparator: options.textSeparator ?? DEFAULT_GOOGLE_OPTIONS.textSeparator,
    }
  }

  parseRequest(request: unknown): GenericRequest {
    return parse(request, this.options)
  }

  transformRequest(request: GenericRequest): GoogleRequest {
    return transform(request, this.options)
  }

  parseResponse(response: unknown): GenericResponse {
    return parseResponse(response, this.options)
  }

  transformResponse(response: GenericResponse): GoogleResponse {
    return transformResponse(response, this.options)
  }
}

export { parse, transform } from './request'
export { parseFinishReason, parseResponse, transformResponse, transformStopReason } from './response'
export type { GoogleOptions } from './shared'
export * from './types'
