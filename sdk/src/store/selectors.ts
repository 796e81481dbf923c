/**
 * Snapshot selectors
 *
 * Read-side helpers over a PageSnapshot: live traversal (tombstones
 * hidden), the flat hydration stream sent to new replicas, and a plain JSON
 * view for rendering collaborators.
 *
 * @module store/selectors
 */

import {
  ROOT,
  type Entity,
  type Meta,
  type MetaConstraint,
  type PageSnapshot,
  type Props,
  type RelConstraint,
  type Relationship,
  type StateOperation,
} from '../types'
import { liveChildren, liveEntity } from './validator'

export function getEntity(snapshot: PageSnapshot, id: string): Entity | undefined {
  return liveEntity(snapshot, id)
}

/** Live top-level entity ids in order */
export function rootIds(snapshot: PageSnapshot): string[] {
  return liveChildren(snapshot, ROOT)
}

/** Live child ids of an entity in order */
export function childIds(snapshot: PageSnapshot, id: string): string[] {
  return liveChildren(snapshot, id)
}

/** The top-of-tree page entity, if one is live */
export function getPage(snapshot: PageSnapshot): Entity | undefined {
  return rootIds(snapshot)
    .map((id) => liveEntity(snapshot, id))
    .find((entity) => entity?.display === 'page')
}

/** Edges whose endpoints are both live */
export function activeRelationships(snapshot: PageSnapshot): Relationship[] {
  return snapshot.relationships.filter(
    (r) => liveEntity(snapshot, r.from) !== undefined && liveEntity(snapshot, r.to) !== undefined
  )
}

/**
 * Live entities in pre-order: every parent precedes its children, siblings
 * keep their order
 */
export function traverse(snapshot: PageSnapshot): Entity[] {
  const out: Entity[] = []
  const visit = (parentId: string): void => {
    for (const id of liveChildren(snapshot, parentId)) {
      const entity = snapshot.entities.get(id)
      if (entity) {
        out.push(entity)
        visit(id)
      }
    }
  }
  visit(ROOT)
  return out
}

function constrainOperation(c: MetaConstraint): StateOperation {
  return {
    t: 'meta.constrain',
    id: c.id,
    ...(c.rule !== null ? { rule: c.rule } : {}),
    ...(c.parent !== null ? { parent: c.parent } : {}),
    ...(c.value !== null ? { value: c.value } : {}),
    ...(c.message !== null ? { message: c.message } : {}),
    strict: c.strict,
  }
}

function relConstrainOperation(c: RelConstraint): StateOperation {
  return {
    t: 'rel.constrain',
    id: c.id,
    ...(c.rule !== null ? { rule: c.rule } : {}),
    entities: c.entities,
    ...(c.relType !== null ? { rel_type: c.relType } : {}),
    ...(c.value !== null ? { value: c.value } : {}),
    ...(c.message !== null ? { message: c.message } : {}),
    strict: c.strict,
  }
}

/**
 * Flatten a snapshot into the operations that rebuild its live view
 *
 * This is the body of a `snapshot.start … snapshot.end` hydration bracket.
 * Constraints go first, against an empty page, so a strict one is never
 * rejected on the way back in.
 */
export function hydrationOperations(snapshot: PageSnapshot): StateOperation[] {
  const ops: StateOperation[] = [
    ...Array.from(snapshot.constraints.values(), constrainOperation),
    ...Array.from(snapshot.relConstraints.values(), relConstrainOperation),
  ]

  for (const entity of traverse(snapshot)) {
    ops.push({
      t: 'entity.create',
      id: entity.id,
      parent: entity.parent,
      display: entity.display,
      p: entity.props,
    })
  }

  for (const r of activeRelationships(snapshot)) {
    ops.push({ t: 'rel.set', from: r.from, to: r.to, type: r.type, cardinality: r.cardinality })
  }

  if (Object.keys(snapshot.styles.global).length > 0) {
    ops.push({ t: 'style.set', p: snapshot.styles.global })
  }
  for (const [ref, p] of snapshot.styles.entities) {
    if (liveEntity(snapshot, ref)) {
      ops.push({ t: 'style.entity', ref, p })
    }
  }

  const { title, identity } = snapshot.meta
  if (title !== null || identity !== null) {
    ops.push({ t: 'meta.update', data: { title, identity } })
  }

  for (const { note, pinned } of snapshot.annotations) {
    ops.push({ t: 'meta.annotate', p: { note, pinned } })
  }

  return ops
}

// ====================
// JSON View
// ====================

export interface EntityJSON {
  id: string
  parent: string
  display: string | null
  props: Props
  children: string[]
  style?: Props
}

export interface PageSnapshotJSON {
  meta: Meta
  rootIds: string[]
  entities: Record<string, EntityJSON>
  relationships: Relationship[]
  styles: { global: Props }
  annotations: Array<{ note: string; pinned: boolean }>
  constraints: Record<string, MetaConstraint>
  relConstraints: Record<string, RelConstraint>
  sequence: number
}

/**
 * Plain-object view of the live tree, safe to JSON.stringify
 */
export function snapshotToJSON(snapshot: PageSnapshot): PageSnapshotJSON {
  const entries = traverse(snapshot).map((entity): [string, EntityJSON] => {
    const style = snapshot.styles.entities.get(entity.id)
    return [
      entity.id,
      {
        id: entity.id,
        parent: entity.parent,
        display: entity.display,
        props: entity.props,
        children: liveChildren(snapshot, entity.id),
        ...(style ? { style } : {}),
      },
    ]
  })

  return {
    meta: snapshot.meta,
    rootIds: rootIds(snapshot),
    entities: Object.fromEntries(entries),
    relationships: activeRelationships(snapshot),
    styles: { global: snapshot.styles.global },
    annotations: snapshot.annotations.map(({ note, pinned }) => ({ note, pinned })),
    constraints: Object.fromEntries(snapshot.constraints),
    relConstraints: Object.fromEntries(snapshot.relConstraints),
    sequence: snapshot.sequence,
  }
}
