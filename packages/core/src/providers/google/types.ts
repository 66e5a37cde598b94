/**
 * Google Gemini GenerateContent API Types
 */

import { isRecord } from '../../util/json'

// =============================================================================
// Request Types
// =============================================================================

/**
 * Gemini GenerateContent Request
 */
export interface GoogleRequest {
  contents: GoogleContent[]
  systemInstruction?: GoogleSystemInstruction
  tools?: GoogleTool[]
  toolConfig?: GoogleToolConfig
  generationConfig?: GoogleGenerationConfig
}

/**
 * Content structure (message). Roles are `user` and `model`.
 */
export interface GoogleContent {
  role: string
  parts: GooglePart[]
}

/**
 * System instruction (an object with parts, not a string)
 */
export interface GoogleSystemInstruction {
  parts: GooglePart[]
}

/**
 * Only text parts are read and written; other part kinds are ignored on decode
 */
export interface GooglePart {
  text?: string
}

/**
 * Tool definition
 */
export interface GoogleTool {
  functionDeclarations?: GoogleFunctionDeclaration[]
}

export interface GoogleFunctionDeclaration {
  name: string
  description?: string
  parameters?: Record<string, unknown>
  parametersJsonSchema?: Record<string, unknown> // Alternative key name
}

export type GoogleFunctionCallingMode = 'AUTO' | 'ANY' | 'NONE'

export interface GoogleToolConfig {
  functionCallingConfig?: {
    mode: GoogleFunctionCallingMode
    allowedFunctionNames?: string[]
  }
}

/**
 * Generation config
 */
export interface GoogleGenerationConfig {
  temperature?: number
  maxOutputTokens?: number
  topP?: number
  topK?: number
  stopSequences?: string[]
}

// =============================================================================
// Response Types
// =============================================================================

/**
 * Gemini GenerateContent Response
 */
export interface GoogleResponse {
  candidates: GoogleCandidate[]
  usageMetadata?: GoogleUsageMetadata
  responseId?: string
  modelVersion?: string
}

export interface GoogleCandidate {
  content: GoogleContent
  finishReason: GoogleFinishReason
  index?: number
}

export type GoogleFinishReason =
  | 'STOP'
  | 'MAX_TOKENS'
  | 'SAFETY'
  | 'RECITATION'
  | 'OTHER'
  | (string & {})

export interface GoogleUsageMetadata {
  promptTokenCount: number
  candidatesTokenCount: number
  totalTokenCount: number
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if value is a Google request: an array of content objects
 */
export function isGoogleRequest(value: unknown): value is GoogleRequest {
  if (!isRecord(value)) return false
  return Array.isArray(value.contents) && value.contents.every(isRecord)
}

/**
 * Check if value is a Google response
 */
export function isGoogleResponse(value: unknown): value is GoogleResponse {
  return isRecord(value) && Array.isArray(value.candidates)
}
