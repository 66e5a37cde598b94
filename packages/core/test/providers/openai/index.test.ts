import { describe, expect, it } from 'vitest'
import { UnmarshalError } from '../../../src/errors'
import { OpenAICodec } from '../../../src/providers/openai'

describe('OpenAICodec', () => {
  it('should expose its format and capabilities', () => {
    const codec = new OpenAICodec()

    expect(codec.format).toBe('openai')
    expect(codec.label).toBe('OpenAI')
    expect(codec.capabilities).toEqual({ supportsTools: true, supportsStreaming: true, maxTokens: 128000 })
  })

  it('should convert request bytes to generic JSON', () => {
    const codec = new OpenAICodec()
    const data = JSON.stringify({
      model: 'gpt-test',
      messages: [
        { role: 'system', content: 'Be brief' },
        { role: 'user', content: 'Hi', name: 'alice' },
      ],
      stream: true,
    })

    expect(JSON.parse(new OpenAICodec().toGeneric(data, true))).toEqual({
      model: 'gpt-test',
      messages: [{ role: 'user', content: 'Hi', name: 'alice' }],
      system: 'Be brief',
      maxTokens: 0,
      temperature: 0,
      stream: true,
    })
    expect(() => codec.toGeneric('[', true)).toThrow(UnmarshalError)
  })

  it('should flatten with the configured separator', () => {
    const codec = new OpenAICodec({ textSeparator: '\n' })
    const data = JSON.stringify({
      model: 'gpt-test',
      messages: [{ role: 'user', content: [{ type: 'text', text: 'a' }, { type: 'text', text: 'b' }] }],
    })

    expect(JSON.parse(codec.fromGeneric(data, true))).toEqual({
      model: 'gpt-test',
      messages: [{ role: 'user', content: 'a\nb' }],
    })
  })
})
