import { UnmarshalError, type Direction } from '../errors'
import type {
  GenericRequest,
  GenericResponse,
  MessageFormat,
  ProviderFormat,
  StreamEvent,
} from '../types/generic'
import {
  decodeGenericRequest,
  decodeGenericResponse,
  encodeGenericRequest,
  encodeGenericResponse,
} from '../types/generic-json'
import { stringifyJSON } from '../util/json'

/**
 * What a codec's target protocol can carry
 */
export interface CodecCapabilities {
  supportsTools: boolean
  supportsStreaming: boolean
  maxTokens?: number
}

/**
 * Options every codec accepts
 */
export interface CodecOptions {
  capabilities?: Partial<CodecCapabilities>
}

/**
 * Codec interface - Each provider implements this for bidirectional translation
 *
 * Flow:
 * 1. Native bytes → toGeneric() → generic bytes
 * 2. Generic bytes → fromGeneric() → native bytes
 *
 * The typed methods do the work; the byte methods add JSON decoding with
 * errors that name the provider and direction.
 */
export interface Codec {
  readonly format: ProviderFormat
  /** Provider name used in error messages */
  readonly label: string
  readonly capabilities: CodecCapabilities

  toGeneric(data: string, isRequest: boolean): string
  fromGeneric(data: string, isRequest: boolean): string

  parseRequest(native: unknown): GenericRequest
  transformRequest(request: GenericRequest): unknown
  parseResponse(native: unknown): GenericResponse
  transformResponse(response: GenericResponse): unknown

  /**
   * Stream-level hook for SSE records travelling to `to`
   */
  transformStreamEvent(event: StreamEvent, to: MessageFormat): StreamEvent
}

/**
 * Abstract base class for codecs with the byte-level plumbing
 */
export abstract class BaseCodec implements Codec {
  abstract readonly format: ProviderFormat
  abstract readonly label: string
  readonly capabilities: CodecCapabilities

  constructor(defaults: CodecCapabilities, options: CodecOptions = {}) {
    this.capabilities = { ...defaults, ...options.capabilities }
  }

  abstract parseRequest(native: unknown): GenericRequest
  abstract transformRequest(request: GenericRequest): unknown
  abstract parseResponse(native: unknown): GenericResponse
  abstract transformResponse(response: GenericResponse): unknown

  toGeneric(data: string, isRequest: boolean): string {
    const native = parseJSON(data, this.label, direction(isRequest))
    if (isRequest) {
      return stringifyJSON(encodeGenericRequest(this.parseRequest(native)))
    }
    return stringifyJSON(encodeGenericResponse(this.parseResponse(native)))
  }

  fromGeneric(data: string, isRequest: boolean): string {
    const generic = parseJSON(data, 'generic', direction(isRequest))
    if (isRequest) {
      return stringifyJSON(this.transformRequest(decodeGenericRequest(generic)))
    }
    return stringifyJSON(this.transformResponse(decodeGenericResponse(generic)))
  }

  // Stream events pass through untouched; event translation is not implemented yet
  transformStreamEvent(event: StreamEvent, _to: MessageFormat): StreamEvent {
    return event
  }
}

function direction(isRequest: boolean): Direction {
  return isRequest ? 'request' : 'response'
}

export function parseJSON(data: string, provider: string, dir: Direction): unknown {
  try {
    return JSON.parse(data)
  } catch (error) {
    throw new UnmarshalError(provider, dir, error)
  }
}

/**
 * A payload that parsed as JSON but does not have the provider's shape
 */
export function malformed(provider: string, dir: Direction, reason: string): UnmarshalError {
  return new UnmarshalError(provider, dir, new Error(reason))
}
