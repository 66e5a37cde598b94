/**
 * AWS Bedrock Response Transformations
 */

import { decodeContent, encodeContent } from '../../content/normalize'
import type { GenericResponse } from '../../types/generic'
import { optionalString } from '../../util/json'
import { parseUsage, transformUsage } from '../anthropic/response'
import { malformed } from '../base'
import { type AwsOptions, DEFAULT_AWS_OPTIONS } from './options'
import { type AwsResponse, isAwsResponse } from './types'

const PROVIDER = 'AWS'

/**
 * Parse a Bedrock response into GenericResponse
 */
export function parseResponse(response: unknown, options: AwsOptions = DEFAULT_AWS_OPTIONS): GenericResponse {
  if (!isAwsResponse(response)) {
    throw malformed(PROVIDER, 'response', 'response must be an object')
  }

  const result: GenericResponse = {
    id: optionalString(response.id) ?? '',
    type: optionalString(response.type) ?? '',
    role: optionalString(response.role) ?? '',
    content: decodeContent(response.content),
    model: optionalString(response.model) ?? '',
    stopReason: optionalString(response.stop_reason) || options.defaultStopReason,
  }

  const usage = parseUsage(response.usage)
  if (usage) result.usage = usage

  return result
}

/**
 * Transform GenericResponse into a Bedrock response
 */
export function transformResponse(
  response: GenericResponse,
  options: AwsOptions = DEFAULT_AWS_OPTIONS
): AwsResponse {
  const result: AwsResponse = {
    id: response.id,
    model: response.model,
    type: response.type,
    role: response.role,
    content: encodeContent(response.content),
    stop_reason: response.stopReason || options.defaultStopReason,
  }

  if (response.usage) {
    result.usage = transformUsage(response.usage)
  }

  return result
}
