/**
 * WebSocket Protocol
 *
 * JSON text protocol shared by the server and the client channel. Every
 * message is a JSON object discriminated by `t`, the operation language's
 * type key. State operations travel as themselves; control messages
 * (hydration brackets, stream markers, direct edits) use the same key.
 *
 * Decoding is the system boundary: incoming payloads are validated and
 * coerced here, so the reducer only ever sees well-shaped operations.
 */

import type { RawData } from 'ws'
import { z } from 'zod'
import {
  ProtocolError,
  ProtocolErrorCode,
  type Operation,
  type PropValue,
  type StateOperation,
} from '../types'

// ====================
// Message Types
// ====================

export interface SnapshotStartMessage {
  t: 'snapshot.start'
}

export interface SnapshotEndMessage {
  t: 'snapshot.end'
}

export interface StreamStartMessage {
  t: 'stream.start'
  message_id?: string
}

export interface StreamEndMessage {
  t: 'stream.end'
  message_id?: string
}

export interface DirectEditMessage {
  t: 'direct_edit'
  entity_id: string
  field: string
  /** Coerced to a prop value by the server; invalid values are rejected there */
  value?: unknown
}

export interface DirectEditErrorMessage {
  t: 'direct_edit.error'
  error: string
  code?: string
  entity_id?: string
}

export type ControlMessage =
  | SnapshotStartMessage
  | SnapshotEndMessage
  | StreamStartMessage
  | StreamEndMessage
  | DirectEditMessage
  | DirectEditErrorMessage

export type Message = Operation | ControlMessage

export type MessageType = Message['t']

// ====================
// Schemas
// ====================

const dateValueSchema = z
  .object({
    $date: z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'Invalid ISO date'),
  })
  .strict()

const scalarSchema = z.union([z.string(), z.number().finite(), z.boolean(), dateValueSchema])

export const propValueSchema = z.union([scalarSchema, z.array(scalarSchema)])

const propsSchema = z.record(z.string().min(1), propValueSchema)

const cardinalitySchema = z.enum(['many_to_one', 'one_to_one', 'many_to_many'])

const idSchema = z.string().min(1)

const stateOperationSchemas = [
  z.object({
    t: z.literal('entity.create'),
    id: idSchema,
    parent: idSchema.optional(),
    display: z.string().nullable().optional(),
    p: propsSchema.optional(),
  }),
  z.object({ t: z.literal('entity.update'), ref: idSchema, p: propsSchema }),
  z.object({ t: z.literal('entity.remove'), ref: idSchema }),
  z.object({
    t: z.literal('entity.move'),
    ref: idSchema,
    parent: idSchema.optional(),
    position: z.number().int().nonnegative().optional(),
  }),
  z.object({ t: z.literal('entity.reorder'), ref: idSchema, children: z.array(idSchema) }),
  z.object({
    t: z.literal('rel.set'),
    from: idSchema,
    to: idSchema,
    type: z.string().min(1),
    cardinality: cardinalitySchema.optional(),
  }),
  z.object({ t: z.literal('rel.remove'), from: idSchema, to: idSchema, type: z.string().min(1) }),
  z.object({
    t: z.literal('meta.update'),
    data: z.object({
      title: z.string().nullable().optional(),
      identity: z.string().nullable().optional(),
    }),
  }),
  z.object({ t: z.literal('style.set'), p: propsSchema }),
  z.object({ t: z.literal('style.entity'), ref: idSchema, p: propsSchema }),
  z.object({
    t: z.literal('meta.annotate'),
    p: z.object({ note: z.string().optional(), pinned: z.boolean().optional() }),
  }),
  z.object({
    t: z.literal('meta.constrain'),
    id: idSchema,
    rule: z.string().optional(),
    parent: idSchema.optional(),
    value: scalarSchema.optional(),
    message: z.string().optional(),
    strict: z.boolean().optional(),
  }),
  z.object({
    t: z.literal('rel.constrain'),
    id: idSchema,
    rule: z.string().optional(),
    entities: z.array(idSchema).optional(),
    rel_type: z.string().min(1).optional(),
    value: scalarSchema.optional(),
    message: z.string().optional(),
    strict: z.boolean().optional(),
  }),
] as const

const signalSchemas = [
  z.object({ t: z.literal('voice'), text: z.string() }),
  z.object({
    t: z.literal('escalate'),
    tier: z.string().optional(),
    reason: z.string().optional(),
    extract: z.string().optional(),
  }),
  z.object({ t: z.literal('batch.start') }),
  z.object({ t: z.literal('batch.end') }),
] as const

const controlSchemas = [
  z.object({ t: z.literal('snapshot.start') }),
  z.object({ t: z.literal('snapshot.end') }),
  z.object({ t: z.literal('stream.start'), message_id: z.string().optional() }),
  z.object({ t: z.literal('stream.end'), message_id: z.string().optional() }),
  z.object({
    t: z.literal('direct_edit'),
    entity_id: idSchema,
    field: z.string().min(1),
    value: z.unknown(),
  }),
  z.object({
    t: z.literal('direct_edit.error'),
    error: z.string(),
    code: z.string().optional(),
    entity_id: z.string().optional(),
  }),
] as const

export const operationSchema = z.discriminatedUnion('t', [...stateOperationSchemas, ...signalSchemas])

export const messageSchema = z.discriminatedUnion('t', [
  ...stateOperationSchemas,
  ...signalSchemas,
  ...controlSchemas,
])

// ====================
// Encode / Decode
// ====================

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
}

/**
 * Decode one wire message
 *
 * @throws {ProtocolError} when the payload is not JSON or not a known message
 */
export function decodeMessage(raw: string): Message {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch {
    throw new ProtocolError('Message is not valid JSON', ProtocolErrorCode.MALFORMED_MESSAGE)
  }

  const result = messageSchema.safeParse(data)
  if (!result.success) {
    throw new ProtocolError(
      `Malformed message: ${describeIssues(result.error)}`,
      ProtocolErrorCode.MALFORMED_MESSAGE
    )
  }
  return result.data
}

/**
 * Parse a wire message, discarding anything malformed
 *
 * @returns null for malformed input
 */
export function parseMessage(raw: string): Message | null {
  try {
    return decodeMessage(raw)
  } catch (error) {
    if (error instanceof ProtocolError) {
      console.warn('[Protocol] Discarding message:', error.message)
      return null
    }
    throw error
  }
}

/**
 * Validate an operation that arrived outside the socket (HTTP ingress, a
 * stored log)
 */
export function parseOperation(data: unknown): Operation | null {
  const result = operationSchema.safeParse(data)
  return result.success ? result.data : null
}

/**
 * Coerce an arbitrary value into a prop value
 */
export function parsePropValue(value: unknown): PropValue | null {
  const result = propValueSchema.safeParse(value)
  return result.success ? result.data : null
}

export function serializeMessage(message: Message): string {
  return JSON.stringify(message)
}

/**
 * Text of a ws frame, whichever buffer shape it arrived in
 */
export function frameToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8')
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8')
  }
  return Buffer.from(data).toString('utf8')
}

const CONTROL_TYPES: ReadonlySet<string> = new Set<ControlMessage['t']>([
  'snapshot.start',
  'snapshot.end',
  'stream.start',
  'stream.end',
  'direct_edit',
  'direct_edit.error',
])

export function isOperationMessage(message: Message): message is Operation {
  return !CONTROL_TYPES.has(message.t)
}

export type { StateOperation }
