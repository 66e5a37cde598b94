/**
 * AWS Bedrock Codec
 *
 * Bedrock's Anthropic models take the Messages shape with a version field and
 * a required max_tokens. Message content is passed through untouched.
 */

import type { GenericRequest, GenericResponse, ProviderFormat } from '../../types/generic'
import { BaseCodec, type CodecCapabilities, type CodecOptions } from '../base'
import { type AwsOptions, DEFAULT_AWS_OPTIONS } from './options'
import { parse, transform } from './request'
import { parseResponse, transformResponse } from './response'
import type { AwsRequest, AwsResponse } from './types'

const AWS_CAPABILITIES: CodecCapabilities = {
  supportsTools: true,
  supportsStreaming: true,
  maxTokens: 200000,
}

export interface AwsCodecOptions extends CodecOptions, Partial<AwsOptions> {}

export class AwsCodec extends BaseCodec {
  readonly format: ProviderFormat = 'aws'
  readonly label = 'AWS'
  private readonly options: AwsOptions

  constructor(options: AwsCodecOptions = {}) {
    super(AWS_CAPABILITIES, options)
    this.options = {
      anthropicVersion: options.anthropicVersion ?? DEFAULT_AWS_OPTIONS.anthropicVersion,
      defaultMaxTokens: options.defaultMaxTokens ?? DEFAULT_AWS_OPTIONS.defaultMaxTokens,
      defaultStopReason: options.defaultStopReason ?? DEFAULT_AWS_OPTIONS.defaultStopReason,
    }
  }

  parseRequest(request: unknown): GenericRequest {
    return parse(request)
  }

  transformRequest(request: GenericRequest): AwsRequest {
    return transform(request, this.options)
  }

  parseResponse(response: unknown): GenericResponse {
    return parseResponse(response, this.options)
  }

  transformResponse(response: GenericResponse): AwsResponse {
    return transformResponse(response, this.options)
  }
}

export { DEFAULT_AWS_OPTIONS, type AwsOptions } from './options'
export { parse, transform } from './request'
export { parseResponse, transformResponse } from './response'
export * from './types'
