/**
 * Google Response Transformations
 *
 * Handles bidirectional transformation between Gemini GenerateContent
 * responses and GenericResponse. Only the first candidate is read.
 */

import { StructuralError } from '../../errors'
import { computeUsage, type GenericResponse, type Usage } from '../../types/generic'
import { isRecord, optionalNumber, optionalString } from '../../util/json'
import { malformed } from '../base'
import {
  DEFAULT_GOOGLE_OPTIONS,
  type GoogleOptions,
  parsePartsContent,
  toGenericRole,
  toGoogleRole,
  toParts,
} from './shared'
import { type GoogleFinishReason, type GoogleResponse, type GoogleUsageMetadata, isGoogleResponse } from './types'

const PROVIDER = 'Google'

// =============================================================================
// Finish Reason Mapping
// =============================================================================

const FINISH_REASON_TO_STOP_REASON: Record<string, string> = {
  STOP: 'end_turn',
  MAX_TOKENS: 'max_tokens',
  SAFETY: 'stop_sequence',
  RECITATION: 'stop_sequence',
}

/**
 * Unknown finish reasons leave stopReason unset
 */
export function parseFinishReason(reason: unknown): string | undefined {
  if (typeof reason !== 'string') return undefined
  return FINISH_REASON_TO_STOP_REASON[reason]
}

export function transformStopReason(reason: string | undefined): GoogleFinishReason {
  return reason === 'max_tokens' ? 'MAX_TOKENS' : 'STOP'
}

// =============================================================================
// Google → Generic
// =============================================================================

/**
 * Parse a Google response into GenericResponse
 */
export function parseResponse(
  response: unknown,
  options: GoogleOptions = DEFAULT_GOOGLE_OPTIONS
): GenericResponse {
  if (!isRecord(response)) {
    throw malformed(PROVIDER, 'response', 'response must be an object')
  }
  if (!isGoogleResponse(response) || response.candidates.length === 0) {
    throw new StructuralError('no candidates in Google response')
  }

  const candidate: unknown = response.candidates[0]
  const content: Record<string, unknown> =
    isRecord(candidate) && isRecord(candidate.content) ? candidate.content : {}

  const result: GenericResponse = {
    id: optionalString(response.responseId) ?? '',
    type: 'message',
    role: toGenericRole(optionalString(content.role) ?? ''),
    content: parsePartsContent(content.parts, options.textSeparator),
    model: optionalString(response.modelVersion) ?? '',
  }

  const stopReason = isRecord(candidate) ? parseFinishReason(candidate.finishReason) : undefined
  if (stopReason) result.stopReason = stopReason

  const usage = parseUsage(response.usageMetadata)
  if (usage) result.usage = usage

  return result
}

function parseUsage(usage: unknown): Usage | undefined {
  if (!isRecord(usage)) return undefined
  return computeUsage(
    optionalNumber(usage.promptTokenCount) ?? 0,
    optionalNumber(usage.candidatesTokenCount) ?? 0,
    optionalNumber(usage.totalTokenCount)
  )
}

// =============================================================================
// Generic → Google
// =============================================================================

/**
 * Transform GenericResponse into a Google response
 */
export function transformResponse(
  response: GenericResponse,
  options: GoogleOptions = DEFAULT_GOOGLE_OPTIONS
): GoogleResponse {
  const result: GoogleResponse = {
    candidates: [
      {
        content: {
          role: toGoogleRole(response.role),
          parts: toParts(response.content, options.textSeparator),
        },
        finishReason: transformStopReason(response.stopReason),
      },
    ],
  }

  if (response.usage) {
    result.usageMetadata = transformUsage(response.usage)
  }
  if (response.id) result.responseId = response.id
  if (response.model) result.modelVersion = response.model

  return result
}

function transformUsage(usage: Usage): GoogleUsageMetadata {
  return {
    promptTokenCount: usage.inputTokens,
    candidatesTokenCount: usage.outputTokens,
    totalTokenCount: usage.totalTokens,
  }
}
