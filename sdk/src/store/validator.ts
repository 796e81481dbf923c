/**
 * Operation Validator
 *
 * Checks an operation against the current state before the reducer commits
 * it. Every producer goes through the same checks: the LLM compiler, clients
 * sending raw operations and direct edits.
 *
 * Shape and value coercion happen earlier, at the wire boundary
 * (see websocket/protocol). This module only enforces state invariants.
 *
 * @module store/validator
 */

import {
  ROOT,
  ValidationError,
  ValidationErrorCode,
  type Cardinality,
  type Entity,
  type MetaConstrainOp,
  type Operation,
  type RelConstrainOp,
  type Relationship,
} from '../types'

/** Read-only view shared by snapshots and the reducer's working draft */
export interface StateView {
  readonly entities: ReadonlyMap<string, Entity>
  readonly children: ReadonlyMap<string, readonly string[]>
  readonly relationships: readonly Relationship[]
  readonly relCardinalities: ReadonlyMap<string, Cardinality>
}

const ID_PATTERN = /^[a-z][a-z0-9_]{0,63}$/

export function isValidEntityId(id: string): boolean {
  return id !== ROOT && ID_PATTERN.test(id)
}

/**
 * Entity by id, unless it is missing or tombstoned
 */
export function liveEntity(view: StateView, id: string): Entity | undefined {
  const entity = view.entities.get(id)
  return entity && !entity.removed ? entity : undefined
}

export function liveChildren(view: StateView, parentId: string): string[] {
  const ids = view.children.get(parentId) ?? []
  return ids.filter((id) => liveEntity(view, id) !== undefined)
}

/**
 * True when `candidate` sits somewhere below `ancestorId`
 */
function isDescendantOf(view: StateView, candidate: string, ancestorId: string): boolean {
  let current = view.entities.get(candidate)
  while (current && current.parent !== ROOT) {
    if (current.parent === ancestorId) {
      return true
    }
    current = view.entities.get(current.parent)
  }
  return false
}

function hasLivePage(view: StateView): boolean {
  return liveChildren(view, ROOT).some((id) => liveEntity(view, id)?.display === 'page')
}

function unknownEntity(id: string): ValidationError {
  return new ValidationError(
    `Entity '${id}' does not exist or is removed`,
    ValidationErrorCode.UNKNOWN_ENTITY
  )
}

function unknownParent(id: string): ValidationError {
  return new ValidationError(
    `Parent '${id}' does not exist or is removed`,
    ValidationErrorCode.UNKNOWN_PARENT
  )
}

function constraintViolated(op: { id: string; message?: string }, detail: string): ValidationError {
  return new ValidationError(
    `Strict constraint '${op.id}' is already violated: ${op.message ?? detail}`,
    ValidationErrorCode.CONSTRAINT_VIOLATED
  )
}

/**
 * A strict max_children constraint may not be recorded on a parent that
 * already has more live children than the limit
 */
function checkMaxChildren(view: StateView, op: MetaConstrainOp): ValidationError | null {
  if (op.rule !== 'max_children' || op.parent === undefined || typeof op.value !== 'number') {
    return null
  }
  if (!liveEntity(view, op.parent)) {
    return null
  }
  const count = liveChildren(view, op.parent).length
  if (count > op.value) {
    return constraintViolated(op, `'${op.parent}' has ${count} children, limit is ${op.value}`)
  }
  return null
}

/**
 * A strict exclude_pair constraint may not be recorded while both entities
 * point at the same target through the relationship type
 */
function checkExcludePair(view: StateView, op: RelConstrainOp): ValidationError | null {
  const pair = op.entities ?? []
  if (op.rule !== 'exclude_pair' || op.rel_type === undefined || pair.length !== 2) {
    return null
  }
  const [first, second] = pair
  if (first === second) {
    return null
  }
  const targets = new Map<string, string>()
  for (const rel of view.relationships) {
    if (rel.type === op.rel_type && (rel.from === first || rel.from === second)) {
      targets.set(rel.from, rel.to)
    }
  }
  const target = targets.get(first)
  if (target !== undefined && target === targets.get(second)) {
    return constraintViolated(op, `'${first}' and '${second}' both point to '${target}' via '${op.rel_type}'`)
  }
  return null
}

/**
 * Validate an operation against the given state
 *
 * @returns null when the reducer may apply the operation
 */
export function validateOperation(view: StateView, op: Operation): ValidationError | null {
  switch (op.t) {
    case 'entity.create': {
      if (!isValidEntityId(op.id)) {
        return new ValidationError(
          `Invalid id '${op.id}': must be snake_case, start with a letter, max 64 chars`,
          ValidationErrorCode.INVALID_ID
        )
      }
      if (view.entities.has(op.id)) {
        return new ValidationError(
          `Entity '${op.id}' already exists`,
          ValidationErrorCode.DUPLICATE_ID
        )
      }
      const parent = op.parent ?? ROOT
      if (parent !== ROOT && !liveEntity(view, parent)) {
        return unknownParent(parent)
      }
      if (op.display === 'page') {
        if (parent !== ROOT) {
          return new ValidationError(
            `Page '${op.id}' must be created at the root`,
            ValidationErrorCode.INVALID_PAGE
          )
        }
        if (hasLivePage(view)) {
          return new ValidationError(
            'Document already has a page entity',
            ValidationErrorCode.INVALID_PAGE
          )
        }
      }
      return null
    }

    case 'entity.update':
    case 'entity.remove':
    case 'style.entity':
      return liveEntity(view, op.ref) ? null : unknownEntity(op.ref)

    case 'entity.move': {
      const entity = liveEntity(view, op.ref)
      if (!entity) {
        return unknownEntity(op.ref)
      }
      const parent = op.parent ?? ROOT
      if (parent === op.ref) {
        return new ValidationError(
          `Cannot move '${op.ref}' into itself`,
          ValidationErrorCode.INVALID_MOVE
        )
      }
      if (parent !== ROOT) {
        if (!liveEntity(view, parent)) {
          return unknownParent(parent)
        }
        if (isDescendantOf(view, parent, op.ref)) {
          return new ValidationError(
            `Moving '${op.ref}' under '${parent}' would create a cycle`,
            ValidationErrorCode.INVALID_MOVE
          )
        }
      }
      if (entity.display === 'page' && parent !== ROOT) {
        return new ValidationError(
          `Page '${op.ref}' must stay at the root`,
          ValidationErrorCode.INVALID_PAGE
        )
      }
      return null
    }

    case 'entity.reorder': {
      if (!liveEntity(view, op.ref)) {
        return unknownEntity(op.ref)
      }
      const current = new Set(liveChildren(view, op.ref))
      const seen = new Set<string>()
      for (const id of op.children) {
        if (!current.has(id)) {
          return new ValidationError(
            `'${id}' is not a child of '${op.ref}'`,
            ValidationErrorCode.INVALID_REORDER
          )
        }
        if (seen.has(id)) {
          return new ValidationError(
            `'${id}' appears more than once in the new order`,
            ValidationErrorCode.INVALID_REORDER
          )
        }
        seen.add(id)
      }
      if (seen.size !== current.size) {
        const missing = [...current].filter((id) => !seen.has(id))
        return new ValidationError(
          `Reorder of '${op.ref}' omits children: ${missing.join(', ')}`,
          ValidationErrorCode.INVALID_REORDER
        )
      }
      return null
    }

    case 'rel.set': {
      if (!liveEntity(view, op.from)) {
        return unknownEntity(op.from)
      }
      if (!liveEntity(view, op.to)) {
        return unknownEntity(op.to)
      }
      const registered = view.relCardinalities.get(op.type)
      if (registered && op.cardinality && op.cardinality !== registered) {
        return new ValidationError(
          `Relationship type '${op.type}' is ${registered}, not ${op.cardinality}`,
          ValidationErrorCode.INVALID_CARDINALITY
        )
      }
      return null
    }

    case 'rel.remove':
      if (!liveEntity(view, op.from)) {
        return unknownEntity(op.from)
      }
      if (!liveEntity(view, op.to)) {
        return unknownEntity(op.to)
      }
      return null

    case 'meta.constrain':
      return op.strict ? checkMaxChildren(view, op) : null

    case 'rel.constrain':
      return op.strict ? checkExcludePair(view, op) : null

    case 'meta.update':
    case 'meta.annotate':
    case 'style.set':
    case 'voice':
    case 'escalate':
    case 'batch.start':
    case 'batch.end':
      return null
  }
}
