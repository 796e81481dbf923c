/**
 * Core TypeScript types for the pagesync SDK
 * @module types
 */

// ====================
// Entity Types
// ====================

/** Parent id of top-level entities. Never a valid entity id. */
export const ROOT = 'root'

/** Date prop value, tagged so it survives a JSON round trip */
export interface DateValue {
  readonly $date: string
}

export type ScalarValue = string | number | boolean | DateValue

export type PropValue = ScalarValue | readonly ScalarValue[]

/** Insertion-ordered prop mapping */
export type Props = Readonly<Record<string, PropValue>>

export interface Entity {
  readonly id: string
  /** Parent entity id, or ROOT */
  readonly parent: string
  /** Rendering shape selector */
  readonly display: string | null
  readonly props: Props
  readonly creationSeq: number
  readonly updatedSeq: number
  /** Tombstone flag. Removed entities stay addressable for id uniqueness. */
  readonly removed: boolean
  readonly removedSeq?: number
}

export type Cardinality = 'many_to_one' | 'one_to_one' | 'many_to_many'

export interface Relationship {
  readonly from: string
  readonly to: string
  readonly type: string
  readonly cardinality: Cardinality
}

export interface Meta {
  readonly title: string | null
  readonly identity: string | null
}

/** Free-form page note, ordered by the mutation that recorded it */
export interface Annotation {
  readonly note: string
  readonly pinned: boolean
  /** Sequence number of the meta.annotate that added it */
  readonly seq: number
}

/**
 * Page rule recorded by meta.constrain. Only `max_children` is checked, and
 * only when the constraint is strict and being recorded.
 */
export interface MetaConstraint {
  readonly id: string
  readonly rule: string | null
  /** Entity the rule is about */
  readonly parent: string | null
  readonly value: ScalarValue | null
  readonly message: string | null
  readonly strict: boolean
}

/** Relationship rule recorded by rel.constrain; `exclude_pair` is the checked rule */
export interface RelConstraint {
  readonly id: string
  readonly rule: string | null
  readonly entities: readonly string[]
  readonly relType: string | null
  readonly value: ScalarValue | null
  readonly message: string | null
  readonly strict: boolean
}

export interface Styles {
  readonly global: Props
  readonly entities: ReadonlyMap<string, Props>
}

/**
 * Canonical page state. The pure reducer returns a new snapshot and never
 * modifies its input; a PageStore's live snapshot changes in place.
 */
export interface PageSnapshot {
  readonly meta: Meta
  readonly entities: ReadonlyMap<string, Entity>
  /** Parent id (or ROOT) to child ids, in order. Tombstoned children stay listed. */
  readonly children: ReadonlyMap<string, readonly string[]>
  readonly relationships: readonly Relationship[]
  /** Cardinality registered by the first rel.set of each relationship type */
  readonly relCardinalities: ReadonlyMap<string, Cardinality>
  readonly styles: Styles
  readonly annotations: readonly Annotation[]
  /** meta.constrain records by constraint id */
  readonly constraints: ReadonlyMap<string, MetaConstraint>
  /** rel.constrain records by constraint id */
  readonly relConstraints: ReadonlyMap<string, RelConstraint>
  /** Count of accepted mutations */
  readonly sequence: number
}

// ====================
// Operation Types
// ====================

export interface EntityCreateOp {
  t: 'entity.create'
  id: string
  parent?: string
  display?: string | null
  p?: Props
}

export interface EntityUpdateOp {
  t: 'entity.update'
  ref: string
  p: Props
}

export interface EntityRemoveOp {
  t: 'entity.remove'
  ref: string
}

export interface EntityMoveOp {
  t: 'entity.move'
  ref: string
  parent?: string
  /** Index among the new parent's live children; appends when absent */
  position?: number
}

export interface EntityReorderOp {
  t: 'entity.reorder'
  ref: string
  children: readonly string[]
}

export interface RelSetOp {
  t: 'rel.set'
  from: string
  to: string
  type: string
  cardinality?: Cardinality
}

export interface RelRemoveOp {
  t: 'rel.remove'
  from: string
  to: string
  type: string
}

export interface MetaUpdateOp {
  t: 'meta.update'
  data: Partial<Meta>
}

export interface StyleSetOp {
  t: 'style.set'
  p: Props
}

export interface StyleEntityOp {
  t: 'style.entity'
  ref: string
  p: Props
}

export interface MetaAnnotateOp {
  t: 'meta.annotate'
  p: { note?: string; pinned?: boolean }
}

export interface MetaConstrainOp {
  t: 'meta.constrain'
  id: string
  rule?: string
  parent?: string
  value?: ScalarValue
  message?: string
  /** Reject the constraint itself when the page already breaks it */
  strict?: boolean
}

export interface RelConstrainOp {
  t: 'rel.constrain'
  id: string
  rule?: string
  entities?: readonly string[]
  rel_type?: string
  value?: ScalarValue
  message?: string
  strict?: boolean
}

export interface VoiceOp {
  t: 'voice'
  text: string
}

/** Producer asks for a stronger model to take over; carries no state */
export interface EscalateOp {
  t: 'escalate'
  tier?: string
  reason?: string
  extract?: string
}

export interface BatchStartOp {
  t: 'batch.start'
}

export interface BatchEndOp {
  t: 'batch.end'
}

/** Operations that change page state */
export type StateOperation =
  | EntityCreateOp
  | EntityUpdateOp
  | EntityRemoveOp
  | EntityMoveOp
  | EntityReorderOp
  | RelSetOp
  | RelRemoveOp
  | MetaUpdateOp
  | StyleSetOp
  | StyleEntityOp
  | MetaAnnotateOp
  | MetaConstrainOp
  | RelConstrainOp

/** Operations the reducer accepts without touching state */
export type SignalOperation = VoiceOp | EscalateOp | BatchStartOp | BatchEndOp

export type Operation = StateOperation | SignalOperation

export type OperationType = Operation['t']

const STATE_OPERATION_TYPES: ReadonlySet<string> = new Set<StateOperation['t']>([
  'entity.create',
  'entity.update',
  'entity.remove',
  'entity.move',
  'entity.reorder',
  'rel.set',
  'rel.remove',
  'meta.update',
  'style.set',
  'style.entity',
  'meta.annotate',
  'meta.constrain',
  'rel.constrain',
])

export function isStateOperation(op: { t: string }): op is StateOperation {
  return STATE_OPERATION_TYPES.has(op.t)
}

// ====================
// Utility Types
// ====================

export type Unsubscribe = () => void

// ====================
// Error Types
// ====================

export class PageSyncError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message)
    this.name = 'PageSyncError'
  }
}

export enum ValidationErrorCode {
  UNKNOWN_PARENT = 'UNKNOWN_PARENT',
  DUPLICATE_ID = 'DUPLICATE_ID',
  UNKNOWN_ENTITY = 'UNKNOWN_ENTITY',
  INVALID_REORDER = 'INVALID_REORDER',
  INVALID_CARDINALITY = 'INVALID_CARDINALITY',
  INVALID_ID = 'INVALID_ID',
  INVALID_MOVE = 'INVALID_MOVE',
  INVALID_PAGE = 'INVALID_PAGE',
  INVALID_VALUE = 'INVALID_VALUE',
  CONSTRAINT_VIOLATED = 'CONSTRAINT_VIOLATED',
}

/** Raised by the validator; the snapshot it was checked against is unchanged */
export class ValidationError extends PageSyncError {
  constructor(
    message: string,
    public readonly code: ValidationErrorCode
  ) {
    super(message, code)
    this.name = 'ValidationError'
  }
}

export enum TransportErrorCode {
  CONNECT_FAILED = 'CONNECT_FAILED',
  SOCKET_CLOSED = 'SOCKET_CLOSED',
  QUEUE_FULL = 'QUEUE_FULL',
}

export class TransportError extends PageSyncError {
  constructor(
    message: string,
    public readonly code: TransportErrorCode
  ) {
    super(message, code)
    this.name = 'TransportError'
  }
}

export enum ProtocolErrorCode {
  MALFORMED_MESSAGE = 'MALFORMED_MESSAGE',
}

export class ProtocolError extends PageSyncError {
  constructor(
    message: string,
    public readonly code: ProtocolErrorCode = ProtocolErrorCode.MALFORMED_MESSAGE
  ) {
    super(message, code)
    this.name = 'ProtocolError'
  }
}
