/**
 * Entity Store reducer
 *
 * Pure function: (snapshot, operation) → ApplyResult.
 * No I/O, no randomness, no wall clock, so replaying the same operation log
 * always yields the same snapshot.
 *
 * Operations are applied to a copy-on-write draft. Maps are copied on the
 * first write and each children list only when its parent is touched, so a
 * bulk apply (replay, hydration, producer batches) shares one draft across
 * the whole run. Long-lived owners use PageStore instead, which runs the same
 * handlers against state it mutates in place.
 *
 * @module store/reducer
 */

import {
  ROOT,
  ValidationError,
  type Annotation,
  type Cardinality,
  type Entity,
  type EntityCreateOp,
  type EntityMoveOp,
  type EntityRemoveOp,
  type EntityReorderOp,
  type EntityUpdateOp,
  type Meta,
  type MetaConstrainOp,
  type MetaConstraint,
  type Operation,
  type PageSnapshot,
  type Props,
  type RelConstrainOp,
  type RelConstraint,
  type Relationship,
  type RelRemoveOp,
  type RelSetOp,
} from '../types'
import { liveEntity, validateOperation, type StateView } from './validator'

// ====================
// Result Types
// ====================

export type ApplyResult =
  | { accepted: true; snapshot: PageSnapshot }
  | { accepted: false; snapshot: PageSnapshot; error: ValidationError }

export interface Rejection {
  operation: Operation
  error: ValidationError
}

export interface ApplyAllResult {
  snapshot: PageSnapshot
  accepted: Operation[]
  rejected: Rejection[]
}

// ====================
// Snapshot
// ====================

const EMPTY_PROPS: Props = Object.freeze({})

export function emptySnapshot(): PageSnapshot {
  return {
    meta: { title: null, identity: null },
    entities: new Map(),
    children: new Map(),
    relationships: [],
    relCardinalities: new Map(),
    styles: { global: EMPTY_PROPS, entities: new Map() },
    annotations: [],
    constraints: new Map(),
    relConstraints: new Map(),
    sequence: 0,
  }
}

// ====================
// Draft
// ====================

/**
 * Writable state the handlers work against
 *
 * @internal Implemented by the copy-on-write draft here and by PageStore.
 */
export interface Draft extends StateView {
  meta: Meta
  relationships: readonly Relationship[]
  globalStyle: Props
  readonly entityStyles: ReadonlyMap<string, Props>
  /** Advance the mutation counter and return the new sequence number */
  bump(): number
  setEntity(entity: Entity): void
  /** Children list of a parent that the draft may mutate in place */
  writableChildren(parentId: string): string[]
  replaceChildren(parentId: string, ids: string[]): void
  registerCardinality(type: string, cardinality: Cardinality): void
  setEntityStyle(id: string, props: Props): void
  addAnnotation(annotation: Annotation): void
  setConstraint(constraint: MetaConstraint): void
  setRelConstraint(constraint: RelConstraint): void
}

class SnapshotDraft implements Draft {
  meta: Meta
  entities: ReadonlyMap<string, Entity>
  children: ReadonlyMap<string, readonly string[]>
  relationships: readonly Relationship[]
  relCardinalities: ReadonlyMap<string, Cardinality>
  globalStyle: Props
  entityStyles: ReadonlyMap<string, Props>
  annotations: readonly Annotation[]
  constraints: ReadonlyMap<string, MetaConstraint>
  relConstraints: ReadonlyMap<string, RelConstraint>
  sequence: number

  private ownEntities: Map<string, Entity> | null = null
  private ownChildren: Map<string, readonly string[]> | null = null
  private ownLists = new Map<string, string[]>()
  private ownCardinalities: Map<string, Cardinality> | null = null
  private ownEntityStyles: Map<string, Props> | null = null
  private ownConstraints: Map<string, MetaConstraint> | null = null
  private ownRelConstraints: Map<string, RelConstraint> | null = null
  private dirty = false

  constructor(private readonly base: PageSnapshot) {
    this.meta = base.meta
    this.entities = base.entities
    this.children = base.children
    this.relationships = base.relationships
    this.relCardinalities = base.relCardinalities
    this.globalStyle = base.styles.global
    this.entityStyles = base.styles.entities
    this.annotations = base.annotations
    this.constraints = base.constraints
    this.relConstraints = base.relConstraints
    this.sequence = base.sequence
  }

  bump(): number {
    this.dirty = true
    this.sequence += 1
    return this.sequence
  }

  setEntity(entity: Entity): void {
    if (!this.ownEntities) {
      this.ownEntities = new Map(this.entities)
      this.entities = this.ownEntities
    }
    this.ownEntities.set(entity.id, entity)
  }

  writableChildren(parentId: string): string[] {
    let list = this.ownLists.get(parentId)
    if (!list) {
      list = [...(this.children.get(parentId) ?? [])]
      this.ownLists.set(parentId, list)
      this.setChildren(parentId, list)
    }
    return list
  }

  replaceChildren(parentId: string, ids: string[]): void {
    this.ownLists.set(parentId, ids)
    this.setChildren(parentId, ids)
  }

  registerCardinality(type: string, cardinality: Cardinality): void {
    if (!this.ownCardinalities) {
      this.ownCardinalities = new Map(this.relCardinalities)
      this.relCardinalities = this.ownCardinalities
    }
    this.ownCardinalities.set(type, cardinality)
  }

  setEntityStyle(id: string, props: Props): void {
    if (!this.ownEntityStyles) {
      this.ownEntityStyles = new Map(this.entityStyles)
      this.entityStyles = this.ownEntityStyles
    }
    this.ownEntityStyles.set(id, props)
  }

  addAnnotation(annotation: Annotation): void {
    this.annotations = [...this.annotations, annotation]
  }

  setConstraint(constraint: MetaConstraint): void {
    if (!this.ownConstraints) {
      this.ownConstraints = new Map(this.constraints)
      this.constraints = this.ownConstraints
    }
    this.ownConstraints.set(constraint.id, constraint)
  }

  setRelConstraint(constraint: RelConstraint): void {
    if (!this.ownRelConstraints) {
      this.ownRelConstraints = new Map(this.relConstraints)
      this.relConstraints = this.ownRelConstraints
    }
    this.ownRelConstraints.set(constraint.id, constraint)
  }

  toSnapshot(): PageSnapshot {
    if (!this.dirty) {
      return this.base
    }
    return {
      meta: this.meta,
      entities: this.entities,
      children: this.children,
      relationships: this.relationships,
      relCardinalities: this.relCardinalities,
      styles: { global: this.globalStyle, entities: this.entityStyles },
      annotations: this.annotations,
      constraints: this.constraints,
      relConstraints: this.relConstraints,
      sequence: this.sequence,
    }
  }

  private setChildren(parentId: string, ids: readonly string[]): void {
    if (!this.ownChildren) {
      this.ownChildren = new Map(this.children)
      this.children = this.ownChildren
    }
    this.ownChildren.set(parentId, ids)
  }
}

// ====================
// Handlers
// ====================

function requireEntity(draft: Draft, id: string): Entity {
  const entity = draft.entities.get(id)
  if (!entity) {
    throw new Error(`[Reducer] Entity '${id}' vanished after validation`)
  }
  return entity
}

function applyCreate(draft: Draft, op: EntityCreateOp): void {
  const parent = op.parent ?? ROOT
  const seq = draft.bump()
  draft.setEntity({
    id: op.id,
    parent,
    display: op.display ?? null,
    props: { ...(op.p ?? EMPTY_PROPS) },
    creationSeq: seq,
    updatedSeq: seq,
    removed: false,
  })
  draft.writableChildren(parent).push(op.id)
}

function applyUpdate(draft: Draft, op: EntityUpdateOp): void {
  const entity = requireEntity(draft, op.ref)
  const seq = draft.bump()
  draft.setEntity({ ...entity, props: { ...entity.props, ...op.p }, updatedSeq: seq })
}

function applyRemove(draft: Draft, op: EntityRemoveOp): void {
  const seq = draft.bump()
  const pending = [op.ref]
  while (pending.length > 0) {
    const id = pending.pop()
    const entity = id === undefined ? undefined : draft.entities.get(id)
    if (!entity || entity.removed) {
      continue
    }
    draft.setEntity({ ...entity, removed: true, removedSeq: seq, updatedSeq: seq })
    pending.push(...(draft.children.get(entity.id) ?? []))
  }
}

function applyMove(draft: Draft, op: EntityMoveOp): void {
  const entity = requireEntity(draft, op.ref)
  const parent = op.parent ?? ROOT
  const seq = draft.bump()

  const previous = draft.writableChildren(entity.parent)
  const index = previous.indexOf(op.ref)
  if (index >= 0) {
    previous.splice(index, 1)
  }

  const target = draft.writableChildren(parent)
  const live = target.filter((id) => liveEntity(draft, id) !== undefined)
  if (op.position === undefined || op.position < 0 || op.position >= live.length) {
    target.push(op.ref)
  } else {
    target.splice(target.indexOf(live[op.position]), 0, op.ref)
  }

  draft.setEntity({ ...entity, parent, updatedSeq: seq })
}

function applyReorder(draft: Draft, op: EntityReorderOp): void {
  const entity = requireEntity(draft, op.ref)
  const seq = draft.bump()
  const tombstoned = (draft.children.get(op.ref) ?? []).filter(
    (id) => liveEntity(draft, id) === undefined
  )
  draft.replaceChildren(op.ref, [...op.children, ...tombstoned])
  draft.setEntity({ ...entity, updatedSeq: seq })
}

function applyRelSet(draft: Draft, op: RelSetOp): void {
  let cardinality = draft.relCardinalities.get(op.type)
  if (!cardinality) {
    cardinality = op.cardinality ?? 'many_to_many'
    draft.registerCardinality(op.type, cardinality)
  }
  const replaced = (r: Relationship): boolean => {
    if (r.type !== op.type) return false
    if (r.from === op.from && r.to === op.to) return true
    if (cardinality === 'many_to_one') return r.from === op.from
    if (cardinality === 'one_to_one') return r.from === op.from || r.to === op.to
    return false
  }
  draft.bump()
  draft.relationships = [
    ...draft.relationships.filter((r) => !replaced(r)),
    { from: op.from, to: op.to, type: op.type, cardinality },
  ]
}

function applyRelRemove(draft: Draft, op: RelRemoveOp): void {
  const kept = draft.relationships.filter(
    (r) => !(r.from === op.from && r.to === op.to && r.type === op.type)
  )
  if (kept.length === draft.relationships.length) {
    return
  }
  draft.bump()
  draft.relationships = kept
}

function applyConstrain(draft: Draft, op: MetaConstrainOp): void {
  draft.bump()
  draft.setConstraint({
    id: op.id,
    rule: op.rule ?? null,
    parent: op.parent ?? null,
    value: op.value ?? null,
    message: op.message ?? null,
    strict: op.strict ?? false,
  })
}

function applyRelConstrain(draft: Draft, op: RelConstrainOp): void {
  draft.bump()
  draft.setRelConstraint({
    id: op.id,
    rule: op.rule ?? null,
    entities: [...(op.entities ?? [])],
    relType: op.rel_type ?? null,
    value: op.value ?? null,
    message: op.message ?? null,
    strict: op.strict ?? false,
  })
}

/**
 * Run one validated operation against a draft
 *
 * @internal
 */
export function applyToDraft(draft: Draft, op: Operation): void {
  switch (op.t) {
    case 'entity.create':
      return applyCreate(draft, op)
    case 'entity.update':
      return applyUpdate(draft, op)
    case 'entity.remove':
      return applyRemove(draft, op)
    case 'entity.move':
      return applyMove(draft, op)
    case 'entity.reorder':
      return applyReorder(draft, op)
    case 'rel.set':
      return applyRelSet(draft, op)
    case 'rel.remove':
      return applyRelRemove(draft, op)
    case 'meta.update':
      draft.bump()
      draft.meta = {
        title: op.data.title !== undefined ? op.data.title : draft.meta.title,
        identity: op.data.identity !== undefined ? op.data.identity : draft.meta.identity,
      }
      return
    case 'style.set':
      draft.bump()
      draft.globalStyle = { ...draft.globalStyle, ...op.p }
      return
    case 'style.entity':
      draft.bump()
      draft.setEntityStyle(op.ref, { ...(draft.entityStyles.get(op.ref) ?? EMPTY_PROPS), ...op.p })
      return
    case 'meta.annotate': {
      const seq = draft.bump()
      draft.addAnnotation({ note: op.p.note ?? '', pinned: op.p.pinned ?? false, seq })
      return
    }
    case 'meta.constrain':
      return applyConstrain(draft, op)
    case 'rel.constrain':
      return applyRelConstrain(draft, op)
    case 'voice':
    case 'escalate':
    case 'batch.start':
    case 'batch.end':
      return
  }
}

// ====================
// Public API
// ====================

/**
 * Apply one operation
 *
 * A rejected operation returns the input snapshot untouched together with
 * the validation error. Signals and no-op removals return the same
 * snapshot reference.
 */
export function apply(snapshot: PageSnapshot, op: Operation): ApplyResult {
  const error = validateOperation(snapshot, op)
  if (error) {
    return { accepted: false, snapshot, error }
  }
  const draft = new SnapshotDraft(snapshot)
  applyToDraft(draft, op)
  return { accepted: true, snapshot: draft.toSnapshot() }
}

/**
 * Apply a sequence of operations, skipping the ones that fail validation
 */
export function applyAll(snapshot: PageSnapshot, ops: readonly Operation[]): ApplyAllResult {
  const draft = new SnapshotDraft(snapshot)
  const accepted: Operation[] = []
  const rejected: Rejection[] = []

  for (const op of ops) {
    const error = validateOperation(draft, op)
    if (error) {
      rejected.push({ operation: op, error })
      continue
    }
    applyToDraft(draft, op)
    accepted.push(op)
  }

  return { snapshot: draft.toSnapshot(), accepted, rejected }
}

/**
 * Rebuild a snapshot from an operation log, starting empty
 */
export function replay(ops: readonly Operation[]): PageSnapshot {
  return applyAll(emptySnapshot(), ops).snapshot
}
