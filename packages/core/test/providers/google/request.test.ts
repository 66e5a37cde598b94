import { describe, expect, it } from 'vitest'
import { UnmarshalError } from '../../../src/errors'
import { parse, transform } from '../../../src/providers/google/request'
import {
  createBlockMessage,
  createGenericMessage,
  createGenericRequest,
  createTool,
  createToolUse,
  WEATHER_SCHEMA,
} from '../_utils/fixtures'

const LOOKUP_MARKER = '__TOOL_USE_START__{"type":"tool_use","id":"t1","name":"lookup","input":{"q":"x"}}__TOOL_USE_END__'

describe('Google Request Transformations', () => {
  describe('parse (GoogleRequest → GenericRequest)', () => {
    it('should parse contents, system instruction and generation config', () => {
      const result = parse({
        contents: [
          { role: 'user', parts: [{ text: 'Hello' }, { text: ' world' }] },
          { role: 'model', parts: [{ text: 'Hi' }] },
          { parts: [{ text: 'Again' }] },
        ],
        systemInstruction: { parts: [{ text: 'Be kind' }] },
        generationConfig: { maxOutputTokens: 50, temperature: 0.5 },
      })

      expect(result).toEqual({
        model: '',
        messages: [
          { role: 'user', content: { kind: 'text', text: 'Hello world' } },
          { role: 'assistant', content: { kind: 'text', text: 'Hi' } },
          { role: 'user', content: { kind: 'text', text: 'Again' } },
        ],
        maxTokens: 50,
        temperature: 0.5,
        stream: false,
        system: 'Be kind',
      })
    })

    it('should recover tool blocks from markers', () => {
      const result = parse({ contents: [{ role: 'model', parts: [{ text: `Calling ${LOOKUP_MARKER}` }] }] })

      expect(result.messages[0]?.content).toEqual({
        kind: 'blocks',
        blocks: [
          { type: 'text', text: 'Calling ' },
          { type: 'tool_use', id: 't1', name: 'lookup', input: { q: 'x' } },
        ],
      })
    })

    it('should parse function declarations under either schema key', () => {
      const result = parse({
        contents: [],
        tools: [
          {
            functionDeclarations: [
              { name: 'get_weather', description: 'Get weather', parameters: WEATHER_SCHEMA },
              { name: 'ping', parametersJsonSchema: { type: 'object', properties: {} } },
            ],
          },
        ],
      })

      expect(result.tools).toEqual([
        { name: 'get_weather', description: 'Get weather', inputSchema: WEATHER_SCHEMA },
        { name: 'ping', inputSchema: { type: 'object', properties: {} } },
      ])
    })

    it('should map function calling modes to tool choices', () => {
      const choice = (functionCallingConfig: Record<string, unknown>) =>
        parse({ contents: [], toolConfig: { functionCallingConfig } }).toolChoice

      expect(choice({ mode: 'AUTO' })).toEqual({ type: 'auto' })
      expect(choice({ mode: 'NONE' })).toEqual({ type: 'none' })
      expect(choice({ mode: 'ANY' })).toEqual({ type: 'any' })
      expect(choice({ mode: 'ANY', allowedFunctionNames: ['get_weather'] })).toEqual({
        type: 'tool',
        name: 'get_weather',
      })
      expect(choice({ mode: 'ANY', allowedFunctionNames: ['a', 'b'] })).toEqual({ type: 'any' })
      expect(choice({ mode: 'MODE_UNSPECIFIED' })).toBeUndefined()
    })

    it('should reject a request without a contents array', () => {
      expect(() => parse({ contents: 'Hello' })).toThrow(UnmarshalError)
      expect(() => parse({ contents: 'Hello' })).toThrow(
        'failed to unmarshal Google request: contents must be an array of content objects'
      )
    })
  })

  describe('transform (GenericRequest → GoogleRequest)', () => {
    it('should send the system prompt as a leading user turn', () => {
      expect(transform(createGenericRequest({ system: 'Be kind' }))).toEqual({
        contents: [
          { role: 'user', parts: [{ text: 'Be kind' }] },
          { role: 'user', parts: [{ text: 'Hello' }] },
        ],
        generationConfig: { maxOutputTokens: 1000, temperature: 0.7 },
      })
    })

    it('should rename the assistant role and omit empty generation config', () => {
      const result = transform(
        createGenericRequest({
          messages: [createGenericMessage('user', 'Hi'), createGenericMessage('assistant', 'Hello')],
          maxTokens: 0,
          temperature: 0,
        })
      )

      expect(result).toEqual({
        contents: [
          { role: 'user', parts: [{ text: 'Hi' }] },
          { role: 'model', parts: [{ text: 'Hello' }] },
        ],
      })
    })

    it('should write tool blocks as markers that parse back into blocks', () => {
      const request = createGenericRequest({
        messages: [
          createBlockMessage('assistant', [
            { type: 'text', text: 'Calling ' },
            createToolUse('lookup', { q: 'x' }, 't1'),
          ]),
        ],
      })

      const encoded = transform(request)
      expect(encoded.contents).toEqual([{ role: 'model', parts: [{ text: `Calling ${LOOKUP_MARKER}` }] }])
      expect(parse(encoded).messages).toEqual(request.messages)
    })

    it('should transform tools and a forced tool choice', () => {
      const result = transform(
        createGenericRequest({
          tools: [createTool('get_weather', 'Get weather', WEATHER_SCHEMA)],
          toolChoice: { type: 'tool', name: 'get_weather' },
        })
      )

      expect(result.tools).toEqual([
        { functionDeclarations: [{ name: 'get_weather', description: 'Get weather', parameters: WEATHER_SCHEMA }] },
      ])
      expect(result.toolConfig).toEqual({
        functionCallingConfig: { mode: 'ANY', allowedFunctionNames: ['get_weather'] },
      })
    })
  })
})
