import { describe, expect, it } from 'vitest'
import { ConfigError, ConversionError, UnsupportedFormatError } from '../../src/errors'
import { Converter, convertRequest, createDefaultRegistry } from '../../src/transform/converter'
import { WEATHER_SCHEMA } from '../providers/_utils/fixtures'

const converter = new Converter()

function convert(body: unknown, from: string, to: string): unknown {
  return JSON.parse(converter.convertRequest(JSON.stringify(body), from, to))
}

function convertBack(body: unknown, from: string, to: string): unknown {
  return JSON.parse(converter.convertResponse(JSON.stringify(body), from, to))
}

function captureConversionError(fn: () => void): ConversionError {
  try {
    fn()
  } catch (error) {
    if (error instanceof ConversionError) return error
    throw error
  }
  throw new Error('expected a ConversionError')
}

describe('Converter', () => {
  describe('identity', () => {
    it('should return the input unchanged when both formats match', () => {
      for (const format of ['anthropic', 'openai', 'google', 'aws', 'generic', 'mystery']) {
        expect(converter.convertRequest('not json', format, format)).toBe('not json')
        expect(converter.convertResponse('not json', format, format)).toBe('not json')
      }
    })
  })

  describe('requests', () => {
    const anthropicRequest = {
      model: 'claude-test',
      max_tokens: 100,
      system: 'Be brief',
      messages: [{ role: 'user', content: 'Hi' }],
    }

    it('should move the Anthropic system prompt into an OpenAI system message', () => {
      expect(convert(anthropicRequest, 'anthropic', 'openai')).toEqual({
        model: 'claude-test',
        messages: [
          { role: 'system', content: 'Be brief' },
          { role: 'user', content: 'Hi' },
        ],
        max_tokens: 100,
      })
    })

    it('should lift the OpenAI system message back out', () => {
      const openai = convert(anthropicRequest, 'anthropic', 'openai')

      expect(convert(openai, 'openai', 'anthropic')).toEqual({
        model: 'claude-test',
        messages: [{ role: 'user', content: [{ type: 'text', text: 'Hi' }] }],
        system: 'Be brief',
        max_tokens: 100,
      })
    })

    it('should keep the last of several OpenAI system messages', () => {
      const result = convert(
        {
          model: 'gpt-test',
          messages: [
            { role: 'system', content: 'First' },
            { role: 'system', content: 'Second' },
            { role: 'user', content: 'Hi' },
          ],
        },
        'openai',
        'anthropic'
      )

      expect(result).toEqual({
        model: 'gpt-test',
        messages: [{ role: 'user', content: [{ type: 'text', text: 'Hi' }] }],
        system: 'Second',
      })
    })

    it('should rename the assistant role for Google', () => {
      const result = convert(
        {
          model: 'gpt-test',
          messages: [
            { role: 'user', content: 'Hi' },
            { role: 'assistant', content: 'Hello' },
          ],
        },
        'openai',
        'google'
      )

      expect(result).toEqual({
        contents: [
          { role: 'user', parts: [{ text: 'Hi' }] },
          { role: 'model', parts: [{ text: 'Hello' }] },
        ],
      })
    })

    it('should fill in the Bedrock defaults', () => {
      expect(convert({ model: 'm', messages: [{ role: 'user', content: 'Hi' }] }, 'generic', 'aws')).toEqual({
        anthropic_version: 'bedrock-2023-05-31',
        messages: [{ role: 'user', content: 'Hi' }],
        max_tokens: 4096,
      })
    })

    it('should write generic JSON', () => {
      expect(convert(anthropicRequest, 'anthropic', 'generic')).toEqual({
        model: 'claude-test',
        messages: [{ role: 'user', content: 'Hi' }],
        system: 'Be brief',
        maxTokens: 100,
        temperature: 0,
        stream: false,
      })
    })

    it('should keep tool call ids from OpenAI to Anthropic', () => {
      const result = convert(
        {
          model: 'gpt-test',
          messages: [
            { role: 'user', content: 'Weather?' },
            {
              role: 'assistant',
              content: null,
              tool_calls: [
                {
                  id: 'call_abc123',
                  type: 'function',
                  function: { name: 'get_weather', arguments: '{"location":"Paris"}' },
                },
              ],
            },
            { role: 'tool', tool_call_id: 'call_abc123', content: 'Sunny' },
          ],
          tools: [
            {
              type: 'function',
              function: { name: 'get_weather', description: 'Get weather', parameters: WEATHER_SCHEMA },
            },
          ],
        },
        'openai',
        'anthropic'
      )

      expect(result).toEqual({
        model: 'gpt-test',
        messages: [
          { role: 'user', content: [{ type: 'text', text: 'Weather?' }] },
          {
            role: 'assistant',
            content: [{ type: 'tool_use', id: 'call_abc123', name: 'get_weather', input: { location: 'Paris' } }],
          },
          { role: 'user', content: [{ type: 'tool_result', tool_use_id: 'call_abc123', content: 'Sunny' }] },
        ],
        tools: [{ name: 'get_weather', description: 'Get weather', input_schema: WEATHER_SCHEMA }],
      })
    })

    it('should keep tool_use ids from Anthropic to OpenAI', () => {
      const result = convert(
        {
          model: 'claude-test',
          messages: [
            {
              role: 'assistant',
              content: [{ type: 'tool_use', id: 'toolu_01', name: 'lookup', input: { q: 'x' } }],
            },
            { role: 'user', content: [{ type: 'tool_result', tool_use_id: 'toolu_01', content: 'found' }] },
          ],
        },
        'anthropic',
        'openai'
      )

      expect(result).toEqual({
        model: 'claude-test',
        messages: [
          {
            role: 'assistant',
            content: null,
            tool_calls: [{ id: 'toolu_01', type: 'function', function: { name: 'lookup', arguments: '{"q":"x"}' } }],
          },
          { role: 'tool', tool_call_id: 'toolu_01', content: 'found' },
        ],
      })
    })
  })

  describe('blocks without a typed form', () => {
    const image = { type: 'image', source: { type: 'base64', media_type: 'image/png', data: 'AAAA' } }
    const thinking = { type: 'thinking', thinking: 'Look it up', signature: 'sig' }
    const withImage = {
      model: 'claude-test',
      messages: [{ role: 'user', content: [{ type: 'text', text: 'Describe' }, image] }],
    }
    const withThinking = {
      model: 'claude-test',
      messages: [
        { role: 'assistant', content: [thinking, { type: 'tool_use', id: 'toolu_1', name: 'lookup', input: {} }] },
        { role: 'user', content: [{ type: 'tool_result', tool_use_id: 'toolu_1', content: 'found' }] },
      ],
    }

    it('should keep only the text for OpenAI', () => {
      expect(convert(withImage, 'anthropic', 'openai')).toEqual({
        model: 'claude-test',
        messages: [{ role: 'user', content: 'Describe' }],
      })
    })

    it('should keep tool_use ids next to thinking blocks for OpenAI', () => {
      expect(convert(withThinking, 'anthropic', 'openai')).toEqual({
        model: 'claude-test',
        messages: [
          {
            role: 'assistant',
            content: null,
            tool_calls: [{ id: 'toolu_1', type: 'function', function: { name: 'lookup', arguments: '{}' } }],
          },
          { role: 'tool', tool_call_id: 'toolu_1', content: 'found' },
        ],
      })
    })

    it('should keep only the text for Google', () => {
      expect(convert(withImage, 'anthropic', 'google')).toEqual({
        contents: [{ role: 'user', parts: [{ text: 'Describe' }] }],
      })
    })

    it('should keep tool_use ids next to thinking blocks for Google', () => {
      expect(convert(withThinking, 'anthropic', 'google')).toEqual({
        contents: [
          {
            role: 'model',
            parts: [
              { text: '__TOOL_USE_START__{"type":"tool_use","id":"toolu_1","name":"lookup","input":{}}__TOOL_USE_END__' },
            ],
          },
          {
            role: 'user',
            parts: [
              {
                text: '__TOOL_RESULT_START__{"type":"tool_result","tool_use_id":"toolu_1","content":"found"}__TOOL_RESULT_END__',
              },
            ],
          },
        ],
      })
    })

    it('should send the blocks on unchanged to Bedrock', () => {
      expect(convert({ ...withThinking, max_tokens: 100 }, 'anthropic', 'aws')).toEqual({
        anthropic_version: 'bedrock-2023-05-31',
        messages: withThinking.messages,
        max_tokens: 100,
      })
    })
  })

  describe('responses', () => {
    const anthropicResponse = {
      id: 'msg_1',
      type: 'message',
      role: 'assistant',
      model: 'claude-test',
      content: [{ type: 'text', text: 'Hi' }],
      stop_reason: 'end_turn',
      usage: { input_tokens: 25, output_tokens: 15 },
    }

    it('should compute the usage total for OpenAI', () => {
      expect(convertBack(anthropicResponse, 'anthropic', 'openai')).toEqual({
        id: 'msg_1',
        object: 'chat.completion',
        created: 0,
        model: 'claude-test',
        choices: [{ index: 0, message: { role: 'assistant', content: 'Hi' }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 25, completion_tokens: 15, total_tokens: 40 },
      })
    })

    it('should default the Bedrock stop reason', () => {
      const { stop_reason: _stopReason, ...withoutStop } = anthropicResponse

      expect(convertBack(withoutStop, 'anthropic', 'aws')).toEqual({
        id: 'msg_1',
        model: 'claude-test',
        type: 'message',
        role: 'assistant',
        content: [{ type: 'text', text: 'Hi' }],
        stop_reason: 'stop_sequence',
        usage: { input_tokens: 25, output_tokens: 15 },
      })
    })
  })

  describe('errors', () => {
    it('should reject unknown formats', () => {
      expect(() => converter.convertRequest('{}', 'cohere', 'openai')).toThrow(UnsupportedFormatError)
      expect(() => converter.convertRequest('{}', 'cohere', 'openai')).toThrow('unsupported source format: cohere')
      expect(() => converter.convertResponse('{}', 'openai', 'cohere')).toThrow('unsupported target format: cohere')
      expect(() => converter.convertStreamEvent({ event: 'ping', data: '{}' }, 'openai', 'cohere')).toThrow(
        'unsupported target format: cohere'
      )
    })

    it('should name the decode phase', () => {
      const error = captureConversionError(() => converter.convertRequest('{bad', 'anthropic', 'openai'))

      expect(error.phase).toBe('decode')
      expect(error.message).toMatch(/^failed to convert to generic format: failed to unmarshal Anthropic request: /)
    })

    it('should name the validate phase', () => {
      const error = captureConversionError(() =>
        converter.convertRequest(
          JSON.stringify({ model: 'm', messages: [{ role: 'robot', content: 'Hi' }] }),
          'generic',
          'openai'
        )
      )

      expect(error.phase).toBe('validate')
      expect(error.message).toBe('request validation failed: message 0: invalid role: robot')
    })

    it('should name the encode phase', () => {
      const error = captureConversionError(() =>
        converter.convertRequest(
          JSON.stringify({ model: 'm', messages: [{ role: 'user', content: { foo: 1 } }] }),
          'generic',
          'anthropic'
        )
      )

      expect(error.phase).toBe('encode')
      expect(error.message).toBe(
        'failed to convert from generic format: failed to parse content: Anthropic content must be a string or an array of content blocks'
      )
    })

    it('should reject invalid limits', () => {
      expect(() => new Converter({ config: { maxMessages: 0 } })).toThrow(ConfigError)
    })
  })

  describe('tool fallback', () => {
    it('should describe tools in the system prompt for targets without tool support', () => {
      const limited = new Converter({
        registry: createDefaultRegistry({ openai: { capabilities: { supportsTools: false } } }),
      })

      const result = JSON.parse(
        limited.convertRequest(
          JSON.stringify({
            model: 'claude-test',
            system: 'Be brief',
            messages: [{ role: 'user', content: 'Weather?' }],
            tools: [{ name: 'get_weather', description: 'Get weather', input_schema: WEATHER_SCHEMA }],
            tool_choice: { type: 'auto' },
          }),
          'anthropic',
          'openai'
        )
      )

      expect(result).toEqual({
        model: 'claude-test',
        messages: [
          {
            role: 'system',
            content:
              'Be brief\n\nAvailable tools (for reference only, cannot be called directly):\n' +
              '- get_weather: Get weather (parameters: location, days)',
          },
          { role: 'user', content: 'Weather?' },
        ],
      })
    })
  })

  describe('stream events', () => {
    it('should pass events through the source codec', () => {
      const event = { event: 'message_start', data: '{"type":"message_start"}' }

      expect(converter.convertStreamEvent(event, 'anthropic', 'openai')).toBe(event)
      expect(converter.convertStreamEvent(event, 'generic', 'openai')).toBe(event)
    })
  })

  describe('default converter', () => {
    it('should convert with the built-in codecs', () => {
      const result = convertRequest(
        JSON.stringify({ model: 'gpt-test', messages: [{ role: 'user', content: 'Hi' }] }),
        'openai',
        'google'
      )

      expect(JSON.parse(result)).toEqual({ contents: [{ role: 'user', parts: [{ text: 'Hi' }] }] })
    })
  })
})
