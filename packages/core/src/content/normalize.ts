/**
 * Content Normalizer
 *
 * Message content arrives as a bare string, a sequence of typed blocks, or
 * some other JSON value. decodeContent settles the shape once; codecs then
 * switch on `kind` instead of re-inspecting raw JSON.
 *
 * Flattening opaque content is lossy: the value is written out as its JSON
 * text and any structure is gone for the target.
 */

import type { ContentBlock, MessageContent, RawBlock, TextBlock } from '../types/generic'
import { stringifyJSON } from '../util/json'
import { encodeBlock, parseContentBlocks } from './blocks'
import { encodeToolResultMarker, encodeToolUseMarker } from './tool-markers'

export interface FlattenOptions {
  /** Inserted between consecutive blocks */
  separator: string
}

export function textContent(text: string): MessageContent {
  return { kind: 'text', text }
}

export function blockContent(blocks: ContentBlock[]): MessageContent {
  return { kind: 'blocks', blocks }
}

/**
 * Decode raw JSON content: string first, then typed-block array, then opaque.
 * Absent content decodes to the empty string.
 */
export function decodeContent(raw: unknown): MessageContent {
  if (raw === undefined || raw === null) return textContent('')
  if (typeof raw === 'string') return textContent(raw)

  if (Array.isArray(raw)) {
    const blocks = parseContentBlocks(raw)
    if (blocks) return blockContent(blocks)
  }

  return { kind: 'opaque', value: raw }
}

/**
 * Encode content back to its raw JSON value
 */
export function encodeContent(content: MessageContent): unknown {
  switch (content.kind) {
    case 'text':
      return content.text
    case 'blocks':
      return content.blocks.map(encodeBlock)
    case 'opaque':
      return content.value
  }
}

/**
 * Flatten content into a single string for text-only targets.
 *
 * Text blocks keep their text and tool blocks become markers, joined with
 * `options.separator` in their original order. Raw blocks are dropped.
 */
export function flattenContent(content: MessageContent, options: FlattenOptions): string {
  switch (content.kind) {
    case 'text':
      return content.text
    case 'blocks':
      return flattenBlocks(content.blocks, options)
    case 'opaque':
      return typeof content.value === 'string' ? content.value : stringifyJSON(content.value)
  }
}

export function flattenBlocks(blocks: ContentBlock[], options: FlattenOptions): string {
  return blocks
    .filter((block): block is Exclude<ContentBlock, RawBlock> => block.type !== 'raw')
    .map(flattenBlock)
    .join(options.separator)
}

function flattenBlock(block: Exclude<ContentBlock, RawBlock>): string {
  switch (block.type) {
    case 'text':
      return block.text
    case 'tool_use':
      return encodeToolUseMarker(block)
    case 'tool_result':
      return encodeToolResultMarker(block)
  }
}

/**
 * Concatenate only the text blocks, ignoring every other kind
 */
export function joinTextBlocks(blocks: ContentBlock[], separator: string): string {
  return blocks
    .filter((block): block is TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join(separator)
}

/**
 * View content as blocks: text becomes a single text block, opaque yields null
 */
export function contentBlocks(content: MessageContent): ContentBlock[] | null {
  switch (content.kind) {
    case 'text':
      return [{ type: 'text', text: content.text }]
    case 'blocks':
      return content.blocks
    case 'opaque':
      return null
  }
}
