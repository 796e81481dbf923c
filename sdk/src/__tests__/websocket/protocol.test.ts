import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  decodeMessage,
  frameToString,
  isOperationMessage,
  parseMessage,
  parseOperation,
  parsePropValue,
  serializeMessage,
  type Message,
} from '../../websocket/protocol'
import { ProtocolError, ProtocolErrorCode } from '../../types'

describe('protocol', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('decodeMessage', () => {
    it('decodes state operations', () => {
      expect(
        decodeMessage('{"t":"entity.create","id":"milk","parent":"list","p":{"done":false}}')
      ).toEqual({ t: 'entity.create', id: 'milk', parent: 'list', p: { done: false } })
    })

    it('decodes annotations, constraints and escalations', () => {
      expect(decodeMessage('{"t":"meta.annotate","p":{"note":"Buy organic","pinned":true}}')).toEqual({
        t: 'meta.annotate',
        p: { note: 'Buy organic', pinned: true },
      })
      expect(
        decodeMessage(
          '{"t":"rel.constrain","id":"apart","rule":"exclude_pair","entities":["milk","eggs"],"rel_type":"in","strict":true}'
        )
      ).toEqual({
        t: 'rel.constrain',
        id: 'apart',
        rule: 'exclude_pair',
        entities: ['milk', 'eggs'],
        rel_type: 'in',
        strict: true,
      })
      expect(decodeMessage('{"t":"escalate","tier":"large","reason":"stuck"}')).toEqual({
        t: 'escalate',
        tier: 'large',
        reason: 'stuck',
      })
      expect(() => decodeMessage('{"t":"meta.constrain","rule":"max_children"}')).toThrow(ProtocolError)
    })

    it('decodes control messages', () => {
      expect(decodeMessage('{"t":"snapshot.start"}')).toEqual({ t: 'snapshot.start' })
      expect(decodeMessage('{"t":"stream.end","message_id":"m1"}')).toEqual({
        t: 'stream.end',
        message_id: 'm1',
      })
      expect(
        decodeMessage('{"t":"direct_edit","entity_id":"milk","field":"done","value":true}')
      ).toEqual({ t: 'direct_edit', entity_id: 'milk', field: 'done', value: true })
    })

    it('drops unknown keys', () => {
      expect(decodeMessage('{"t":"entity.remove","ref":"milk","extra":1}')).toEqual({
        t: 'entity.remove',
        ref: 'milk',
      })
    })

    it('throws a ProtocolError for invalid JSON', () => {
      expect(() => decodeMessage('{nope')).toThrow(ProtocolError)
      expect(() => decodeMessage('{nope')).toThrow('Message is not valid JSON')
    })

    it('throws a ProtocolError naming the bad field', () => {
      try {
        decodeMessage('{"t":"entity.update","ref":"milk"}')
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(ProtocolError)
        if (error instanceof ProtocolError) {
          expect(error.code).toBe(ProtocolErrorCode.MALFORMED_MESSAGE)
          expect(error.message).toBe('Malformed message: p: Required')
        }
      }
    })

    it('rejects unknown message types', () => {
      expect(() => decodeMessage('{"t":"entity.explode","ref":"milk"}')).toThrow(ProtocolError)
    })

    it('rejects negative move positions and object props', () => {
      expect(() => decodeMessage('{"t":"entity.move","ref":"milk","position":-1}')).toThrow(
        ProtocolError
      )
      expect(() =>
        decodeMessage('{"t":"entity.update","ref":"milk","p":{"nested":{"a":1}}}')
      ).toThrow(ProtocolError)
    })
  })

  describe('parseMessage', () => {
    it('returns null and warns for malformed input', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
      expect(parseMessage('[]')).toBeNull()
      expect(warn).toHaveBeenCalledTimes(1)
      expect(warn.mock.calls[0][0]).toBe('[Protocol] Discarding message:')
    })

    it('passes well-formed messages through', () => {
      expect(parseMessage('{"t":"voice","text":"Done."}')).toEqual({ t: 'voice', text: 'Done.' })
    })
  })

  describe('parseOperation', () => {
    it('accepts operations and signals only', () => {
      expect(parseOperation({ t: 'batch.start' })).toEqual({ t: 'batch.start' })
      expect(parseOperation({ t: 'snapshot.start' })).toBeNull()
      expect(parseOperation('entity.create')).toBeNull()
    })
  })

  describe('parsePropValue', () => {
    it('accepts scalars, tagged dates and scalar arrays', () => {
      expect(parsePropValue('x')).toBe('x')
      expect(parsePropValue(3.5)).toBe(3.5)
      expect(parsePropValue(false)).toBe(false)
      expect(parsePropValue({ $date: '2026-03-01' })).toEqual({ $date: '2026-03-01' })
      expect(parsePropValue([1, 'a', true])).toEqual([1, 'a', true])
    })

    it('rejects everything else', () => {
      expect(parsePropValue(null)).toBeNull()
      expect(parsePropValue(undefined)).toBeNull()
      expect(parsePropValue(Number.NaN)).toBeNull()
      expect(parsePropValue({ a: 1 })).toBeNull()
      expect(parsePropValue([[1]])).toBeNull()
      expect(parsePropValue({ $date: 'someday' })).toBeNull()
      expect(parsePropValue({ $date: '2026-03-01', tz: 'UTC' })).toBeNull()
    })
  })

  describe('serializeMessage', () => {
    it('writes JSON that decodes to the same message', () => {
      const message: Message = { t: 'rel.set', from: 'milk', to: 'eggs', type: 'next' }
      const raw = serializeMessage(message)
      expect(raw).toBe('{"t":"rel.set","from":"milk","to":"eggs","type":"next"}')
      expect(decodeMessage(raw)).toEqual(message)
    })
  })

  it('separates operations from control messages', () => {
    expect(isOperationMessage({ t: 'voice', text: 'hi' })).toBe(true)
    expect(isOperationMessage({ t: 'entity.remove', ref: 'milk' })).toBe(true)
    expect(isOperationMessage({ t: 'snapshot.end' })).toBe(false)
    expect(isOperationMessage({ t: 'direct_edit', entity_id: 'milk', field: 'done' })).toBe(false)
  })

  it('reads text from every ws frame shape', () => {
    const text = '{"t":"snapshot.start"}'
    const buffer = Buffer.from(text, 'utf8')

    expect(frameToString(buffer)).toBe(text)
    expect(frameToString([buffer.subarray(0, 5), buffer.subarray(5)])).toBe(text)
    const arrayBuffer = new ArrayBuffer(buffer.length)
    new Uint8Array(arrayBuffer).set(buffer)
    expect(frameToString(arrayBuffer)).toBe(text)
  })
})
