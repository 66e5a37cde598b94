import { describe, expect, it } from 'vitest'
import { StructuralError } from '../../src/errors'
import { computeUsage, isMessageFormat } from '../../src/types/generic'
import {
  decodeGenericRequest,
  decodeGenericResponse,
  decodeToolChoice,
  encodeGenericRequest,
} from '../../src/types/generic-json'

describe('generic JSON', () => {
  it('should decode a request with defaults for missing fields', () => {
    expect(decodeGenericRequest({ messages: [{ role: 'user', content: 'Hi', name: 'alice' }] })).toEqual({
      model: '',
      messages: [{ role: 'user', content: { kind: 'text', text: 'Hi' }, name: 'alice' }],
      maxTokens: 0,
      temperature: 0,
      stream: false,
    })
  })

  it('should decode tools and tool choice', () => {
    const request = decodeGenericRequest({
      model: 'm',
      messages: [],
      tools: [{ name: 'lookup', inputSchema: { type: 'object' } }],
      toolChoice: { type: 'tool', name: 'lookup' },
      metadata: { user_id: 'u1' },
    })

    expect(request.tools).toEqual([{ name: 'lookup', inputSchema: { type: 'object' } }])
    expect(request.toolChoice).toEqual({ type: 'tool', name: 'lookup' })
    expect(request.metadata).toEqual({ user_id: 'u1' })
  })

  it('should reject malformed requests', () => {
    expect(() => decodeGenericRequest([])).toThrow(StructuralError)
    expect(() => decodeGenericRequest({ model: 'm' })).toThrow('generic request must have a messages array')
    expect(() => decodeGenericRequest({ messages: [{ content: 'Hi' }] })).toThrow(
      'message 0: must be an object with a string role'
    )
    expect(() => decodeGenericRequest({ messages: [], tools: [{ name: 'lookup' }] })).toThrow(
      'tool 0 (lookup): inputSchema must be an object'
    )
  })

  it('should write the camelCase form and drop unset fields when serialized', () => {
    const json = JSON.stringify(
      encodeGenericRequest({
        model: 'm',
        messages: [{ role: 'user', content: { kind: 'text', text: 'Hi' } }],
        maxTokens: 10,
        temperature: 0,
        stream: false,
      })
    )

    expect(json).toBe(
      '{"model":"m","messages":[{"role":"user","content":"Hi"}],"maxTokens":10,"temperature":0,"stream":false}'
    )
  })

  it('should decode a response and compute the usage total', () => {
    expect(
      decodeGenericResponse({
        id: 'r1',
        content: [{ type: 'text', text: 'Hi' }],
        usage: { inputTokens: 25, outputTokens: 15 },
        stopReason: 'end_turn',
      })
    ).toEqual({
      id: 'r1',
      type: '',
      role: '',
      content: { kind: 'blocks', blocks: [{ type: 'text', text: 'Hi' }] },
      model: '',
      usage: { inputTokens: 25, outputTokens: 15, totalTokens: 40 },
      stopReason: 'end_turn',
    })
  })

  it('should ignore unknown tool choices', () => {
    expect(decodeToolChoice({ type: 'auto' })).toEqual({ type: 'auto' })
    expect(decodeToolChoice({ type: 'tool' })).toBeUndefined()
    expect(decodeToolChoice('auto')).toBeUndefined()
  })

  it('should compute usage and recognize formats', () => {
    expect(computeUsage(3, 4)).toEqual({ inputTokens: 3, outputTokens: 4, totalTokens: 7 })
    expect(computeUsage(3, 4, 9)).toEqual({ inputTokens: 3, outputTokens: 4, totalTokens: 9 })
    expect(isMessageFormat('google')).toBe(true)
    expect(isMessageFormat('gemini')).toBe(false)
  })
})
