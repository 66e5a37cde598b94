import { ContentParseError } from '../errors'

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * JSON.stringify that never yields an empty or missing string on failure.
 *
 * Throws ContentParseError for values JSON cannot represent (cycles, BigInt,
 * undefined at the top level).
 */
export function stringifyJSON(value: unknown): string {
  let text: string | undefined
  try {
    text = JSON.stringify(value)
  } catch (error) {
    throw new ContentParseError(`failed to serialize content: ${String(error)}`, { cause: error })
  }
  if (text === undefined) {
    throw new ContentParseError(`failed to serialize content: ${typeof value} is not JSON`)
  }
  return text
}

export function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

export function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}
