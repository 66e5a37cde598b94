import type { MessageFormat } from '../types/generic'
import type { Codec } from './base'

/**
 * Registry of codecs keyed by wire format.
 *
 * Each converter owns its registry; nothing here is module-global.
 */
export class FormatRegistry {
  private readonly codecs = new Map<MessageFormat, Codec>()

  constructor(codecs: Iterable<Codec> = []) {
    for (const codec of codecs) {
      this.register(codec)
    }
  }

  /**
   * Register a codec, replacing any codec already registered for its format
   */
  register(codec: Codec): this {
    this.codecs.set(codec.format, codec)
    return this
  }

  get(format: MessageFormat): Codec | undefined {
    return this.codecs.get(format)
  }

  has(format: MessageFormat): boolean {
    return this.codecs.has(format)
  }

  /**
   * All registered format names
   */
  formats(): MessageFormat[] {
    return Array.from(this.codecs.keys())
  }
}
