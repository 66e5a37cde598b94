/**
 * Role and part helpers shared by the Google request and response paths
 */

import { blockContent, flattenContent, textContent } from '../../content/normalize'
import { extractToolMarkers } from '../../content/tool-markers'
import type { MessageContent } from '../../types/generic'
import { isRecord } from '../../util/json'
import type { GooglePart } from './types'

export interface GoogleOptions {
  /** Separator between parts on decode and between blocks on encode */
  textSeparator: string
}

export const DEFAULT_GOOGLE_OPTIONS: GoogleOptions = {
  textSeparator: '',
}

/**
 * Google calls the assistant `model`
 */
export function toGenericRole(role: string): string {
  return role === 'model' ? 'assistant' : role
}

export function toGoogleRole(role: string): string {
  return role === 'assistant' ? 'model' : role
}

/**
 * Concatenate the text of every text part. Parts without text are skipped.
 */
export function partsText(parts: unknown, separator: string): string {
  if (!Array.isArray(parts)) return ''
  const texts: string[] = []
  for (const part of parts) {
    if (isRecord(part) && typeof part.text === 'string') {
      texts.push(part.text)
    }
  }
  return texts.join(separator)
}

/**
 * Part text as generic content, recovering tool blocks written as markers
 */
export function parsePartsContent(parts: unknown, separator: string): MessageContent {
  const text = partsText(parts, separator)
  const blocks = extractToolMarkers(text)
  return blocks ? blockContent(blocks) : textContent(text)
}

/**
 * Generic content as a single text part; tool blocks become markers
 */
export function toParts(content: MessageContent, separator: string): GooglePart[] {
  return [{ text: flattenContent(content, { separator }) }]
}
