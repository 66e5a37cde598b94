import { randomUUID } from 'node:crypto'
import type { CodecCapabilities } from '../providers/base'
import { createLogger, type Logger } from '../util/logger'

/**
 * Per-conversion state threaded through validation and tool handling
 */
export interface ToolConversionContext {
  requestId: string
  /** Target provider label */
  providerName: string
  capabilities: CodecCapabilities
  /** Epoch milliseconds at creation */
  startTime: number
  metadata: Record<string, unknown>
  /** Child logger tagged with the request id and provider */
  logger: Logger
}

export interface ToolConversionContextOptions {
  requestId?: string
  metadata?: Record<string, unknown>
  /** Parent of the context logger (default: a `converter` module logger) */
  logger?: Logger
}

export function createToolConversionContext(
  providerName: string,
  capabilities: CodecCapabilities,
  options: ToolConversionContextOptions = {}
): ToolConversionContext {
  const requestId = options.requestId ?? `req_${randomUUID()}`
  return {
    requestId,
    providerName,
    capabilities,
    startTime: Date.now(),
    metadata: options.metadata ?? {},
    logger: options.logger
      ? options.logger.child({ requestId, provider: providerName })
      : createLogger({ module: 'converter', requestId, provider: providerName }),
  }
}
