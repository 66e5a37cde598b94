/**
 * Text markers for tool blocks
 *
 * Targets that only carry plain text get tool_use / tool_result blocks as JSON
 * wrapped in sentinel markers. A consumer that knows the convention recovers
 * the blocks with extractToolMarkers; anyone else sees inert text.
 */

import type { ContentBlock, TextBlock, ToolResultBlock, ToolUseBlock } from '../types/generic'
import { stringifyJSON } from '../util/json'
import { encodeBlock, parseContentBlock } from './blocks'

export const TOOL_USE_START = '__TOOL_USE_START__'
export const TOOL_USE_END = '__TOOL_USE_END__'
export const TOOL_RESULT_START = '__TOOL_RESULT_START__'
export const TOOL_RESULT_END = '__TOOL_RESULT_END__'

const MARKER_PATTERN = new RegExp(
  `${TOOL_USE_START}([\\s\\S]*?)${TOOL_USE_END}|${TOOL_RESULT_START}([\\s\\S]*?)${TOOL_RESULT_END}`,
  'g'
)

export function encodeToolUseMarker(block: ToolUseBlock): string {
  const payload = stringifyJSON({
    type: 'tool_use',
    id: block.id,
    name: block.name,
    input: block.input,
  })
  return `${TOOL_USE_START}${payload}${TOOL_USE_END}`
}

export function encodeToolResultMarker(block: ToolResultBlock): string {
  const payload = stringifyJSON(encodeBlock(block))
  return `${TOOL_RESULT_START}${payload}${TOOL_RESULT_END}`
}

export function hasToolMarkers(text: string): boolean {
  return text.includes(TOOL_USE_START) || text.includes(TOOL_RESULT_START)
}

/**
 * Recover content blocks from marker text.
 *
 * Returns null when the text holds no well-formed marker. Text around the
 * markers becomes text blocks; a marker whose payload does not decode stays
 * as text.
 */
export function extractToolMarkers(text: string): ContentBlock[] | null {
  if (!hasToolMarkers(text)) return null

  const blocks: ContentBlock[] = []
  let recovered = 0
  let cursor = 0

  for (const match of text.matchAll(MARKER_PATTERN)) {
    const start = match.index ?? 0
    pushText(blocks, text.slice(cursor, start))
    cursor = start + match[0].length

    const payload = match[1] ?? match[2] ?? ''
    const expectedType = match[1] !== undefined ? 'tool_use' : 'tool_result'
    const block = decodeMarkerPayload(payload)

    if (block && block.type === expectedType) {
      blocks.push(block)
      recovered++
    } else {
      pushText(blocks, match[0])
    }
  }
  pushText(blocks, text.slice(cursor))

  return recovered > 0 ? blocks : null
}

function decodeMarkerPayload(payload: string): ContentBlock | null {
  let value: unknown
  try {
    value = JSON.parse(payload)
  } catch {
    // not a marker we wrote; caller keeps it as text
    return null
  }
  return parseContentBlock(value)
}

function pushText(blocks: ContentBlock[], text: string): void {
  if (!text) return
  const last = blocks[blocks.length - 1]
  if (last?.type === 'text') {
    blocks[blocks.length - 1] = { type: 'text', text: last.text + text } satisfies TextBlock
    return
  }
  blocks.push({ type: 'text', text })
}
