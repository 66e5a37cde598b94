import { describe, expect, it } from 'vitest'
import { UnmarshalError } from '../../../src/errors'
import { parseResponse, transformResponse } from '../../../src/providers/anthropic/response'
import { createGenericResponse } from '../_utils/fixtures'

describe('Anthropic Response Transformations', () => {
  describe('parseResponse', () => {
    it('should parse a text response and compute the usage total', () => {
      const result = parseResponse({
        id: 'msg_1',
        type: 'message',
        role: 'assistant',
        model: 'claude-test',
        content: [{ type: 'text', text: 'Hi there' }],
        stop_reason: 'end_turn',
        usage: { input_tokens: 25, output_tokens: 15 },
      })

      expect(result).toEqual({
        id: 'msg_1',
        type: 'message',
        role: 'assistant',
        content: { kind: 'blocks', blocks: [{ type: 'text', text: 'Hi there' }] },
        model: 'claude-test',
        usage: { inputTokens: 25, outputTokens: 15, totalTokens: 40 },
        stopReason: 'end_turn',
      })
    })

    it('should leave stopReason unset for a null stop_reason', () => {
      const result = parseResponse({ id: 'msg_1', content: [], stop_reason: null })

      expect(result.stopReason).toBeUndefined()
      expect(result.content).toEqual({ kind: 'blocks', blocks: [] })
    })

    it('should reject a non-object response', () => {
      expect(() => parseResponse('not a response')).toThrow(UnmarshalError)
    })
  })

  describe('transformResponse', () => {
    it('should transform a generic response', () => {
      expect(transformResponse(createGenericResponse())).toEqual({
        id: 'msg_test_1',
        type: 'message',
        role: 'assistant',
        model: 'test-model',
        content: [{ type: 'text', text: 'Hello! How can I help you today?' }],
        stop_reason: 'end_turn',
        usage: { input_tokens: 10, output_tokens: 20 },
      })
    })

    it('should fill in type, role and a null stop_reason', () => {
      const result = transformResponse(
        createGenericResponse({ type: '', role: '', stopReason: undefined, usage: undefined })
      )

      expect(result.type).toBe('message')
      expect(result.role).toBe('assistant')
      expect(result.stop_reason).toBeNull()
      expect(result).not.toHaveProperty('usage')
    })

    it('should wrap string content in a text block', () => {
      const result = transformResponse(createGenericResponse({ content: { kind: 'text', text: 'Plain' } }))

      expect(result.content).toEqual([{ type: 'text', text: 'Plain' }])
    })
  })
})
