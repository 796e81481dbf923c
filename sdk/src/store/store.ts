/**
 * Page Store
 *
 * Owns one page's state and commits operations to it in place, so a commit
 * costs what the operation touches rather than the size of the page. Runs the
 * same validator and handlers as the pure reducer.
 *
 * @module store/store
 */

import type {
  Annotation,
  Cardinality,
  Entity,
  Meta,
  MetaConstraint,
  Operation,
  PageSnapshot,
  Props,
  RelConstraint,
  Relationship,
  ValidationError,
} from '../types'
import { applyToDraft, emptySnapshot, type Draft, type Rejection } from './reducer'
import { validateOperation } from './validator'

interface MutableState {
  meta: Meta
  entities: Map<string, Entity>
  children: Map<string, string[]>
  relationships: readonly Relationship[]
  relCardinalities: Map<string, Cardinality>
  styles: { global: Props; entities: Map<string, Props> }
  annotations: Annotation[]
  constraints: Map<string, MetaConstraint>
  relConstraints: Map<string, RelConstraint>
  sequence: number
}

function copyState(snapshot: PageSnapshot): MutableState {
  return {
    meta: snapshot.meta,
    entities: new Map(snapshot.entities),
    children: new Map(Array.from(snapshot.children, ([parent, ids]) => [parent, [...ids]])),
    relationships: snapshot.relationships,
    relCardinalities: new Map(snapshot.relCardinalities),
    styles: { global: snapshot.styles.global, entities: new Map(snapshot.styles.entities) },
    annotations: [...snapshot.annotations],
    constraints: new Map(snapshot.constraints),
    relConstraints: new Map(snapshot.relConstraints),
    sequence: snapshot.sequence,
  }
}

class InPlaceDraft implements Draft {
  constructor(private readonly state: MutableState) {}

  get meta(): Meta {
    return this.state.meta
  }

  set meta(meta: Meta) {
    this.state.meta = meta
  }

  get entities(): ReadonlyMap<string, Entity> {
    return this.state.entities
  }

  get children(): ReadonlyMap<string, readonly string[]> {
    return this.state.children
  }

  get relationships(): readonly Relationship[] {
    return this.state.relationships
  }

  set relationships(relationships: readonly Relationship[]) {
    this.state.relationships = relationships
  }

  get relCardinalities(): ReadonlyMap<string, Cardinality> {
    return this.state.relCardinalities
  }

  get globalStyle(): Props {
    return this.state.styles.global
  }

  set globalStyle(props: Props) {
    this.state.styles.global = props
  }

  get entityStyles(): ReadonlyMap<string, Props> {
    return this.state.styles.entities
  }

  bump(): number {
    this.state.sequence += 1
    return this.state.sequence
  }

  setEntity(entity: Entity): void {
    this.state.entities.set(entity.id, entity)
  }

  writableChildren(parentId: string): string[] {
    let list = this.state.children.get(parentId)
    if (!list) {
      list = []
      this.state.children.set(parentId, list)
    }
    return list
  }

  replaceChildren(parentId: string, ids: string[]): void {
    this.state.children.set(parentId, ids)
  }

  registerCardinality(type: string, cardinality: Cardinality): void {
    this.state.relCardinalities.set(type, cardinality)
  }

  setEntityStyle(id: string, props: Props): void {
    this.state.styles.entities.set(id, props)
  }

  addAnnotation(annotation: Annotation): void {
    this.state.annotations.push(annotation)
  }

  setConstraint(constraint: MetaConstraint): void {
    this.state.constraints.set(constraint.id, constraint)
  }

  setRelConstraint(constraint: RelConstraint): void {
    this.state.relConstraints.set(constraint.id, constraint)
  }
}

export interface StoreApplyResult {
  accepted: Operation[]
  rejected: Rejection[]
}

export class PageStore {
  private readonly state: MutableState
  private readonly draft: InPlaceDraft

  constructor(initial: PageSnapshot = emptySnapshot()) {
    this.state = copyState(initial)
    this.draft = new InPlaceDraft(this.state)
  }

  /**
   * The current state
   *
   * This is a live view: it changes with every accepted operation. Use
   * `toSnapshot()` for a copy that stays put.
   */
  get snapshot(): PageSnapshot {
    return this.state
  }

  get sequence(): number {
    return this.state.sequence
  }

  /**
   * Validate and commit one operation
   *
   * @returns the validation error, or null when the operation was applied
   */
  apply(op: Operation): ValidationError | null {
    const error = validateOperation(this.state, op)
    if (error) {
      return error
    }
    applyToDraft(this.draft, op)
    return null
  }

  /**
   * Commit a sequence of operations, skipping the ones that fail validation
   */
  applyAll(ops: readonly Operation[]): StoreApplyResult {
    const accepted: Operation[] = []
    const rejected: Rejection[] = []
    for (const op of ops) {
      const error = this.apply(op)
      if (error) {
        rejected.push({ operation: op, error })
      } else {
        accepted.push(op)
      }
    }
    return { accepted, rejected }
  }

  /** Copy of the current state that later commits do not touch */
  toSnapshot(): PageSnapshot {
    return copyState(this.state)
  }
}
