/**
 * Replay Tests
 *
 * Randomised operation logs checked for deterministic replay, tree
 * integrity and a lossless hydration round trip.
 */

import { describe, it, expect } from 'vitest'
import { apply, applyAll, emptySnapshot, replay } from '../../store/reducer'
import { hydrationOperations, snapshotToJSON } from '../../store/selectors'
import { PageStore } from '../../store/store'
import { liveChildren, liveEntity } from '../../store/validator'
import { ROOT, type Cardinality, type Operation, type PageSnapshot } from '../../types'
import { groceryOps, seededRandom } from '../helpers'

// ====================
// Generator
// ====================

const REL_TYPES: Array<[string, Cardinality]> = [
  ['next', 'many_to_one'],
  ['pair', 'one_to_one'],
  ['tag', 'many_to_many'],
]

function generateLog(seed: number, length: number): { ops: Operation[]; final: PageSnapshot } {
  const random = seededRandom(seed)
  const pick = <T>(items: readonly T[]): T => items[Math.floor(random() * items.length)]
  const ids: string[] = []
  let snapshot = emptySnapshot()
  const ops: Operation[] = [{ t: 'entity.create', id: 'page', display: 'page' }]
  snapshot = apply(snapshot, ops[0]).snapshot
  ids.push('page')

  for (let i = 0; i < length; i++) {
    const target = ids.length > 0 ? pick(ids) : 'page'
    const other = ids.length > 0 ? pick(ids) : 'page'
    const roll = random()
    let op: Operation

    if (roll < 0.3) {
      const id = `e${i}`
      ids.push(id)
      op = { t: 'entity.create', id, parent: random() < 0.2 ? undefined : target, p: { n: i } }
    } else if (roll < 0.45) {
      op = { t: 'entity.update', ref: target, p: { n: i, flag: random() < 0.5 } }
    } else if (roll < 0.52) {
      op = { t: 'entity.remove', ref: target }
    } else if (roll < 0.65) {
      op = {
        t: 'entity.move',
        ref: target,
        parent: random() < 0.2 ? undefined : other,
        position: random() < 0.3 ? undefined : Math.floor(random() * 4),
      }
    } else if (roll < 0.75) {
      const children = liveChildren(snapshot, target)
      for (let j = children.length - 1; j > 0; j--) {
        const k = Math.floor(random() * (j + 1))
        ;[children[j], children[k]] = [children[k], children[j]]
      }
      op = { t: 'entity.reorder', ref: target, children }
    } else if (roll < 0.87) {
      const [type, cardinality] = pick(REL_TYPES)
      op = { t: 'rel.set', from: target, to: other, type, cardinality }
    } else if (roll < 0.92) {
      const [type] = pick(REL_TYPES)
      op = { t: 'rel.remove', from: target, to: other, type }
    } else if (roll < 0.96) {
      op = { t: 'style.entity', ref: target, p: { tone: pick(['warm', 'cool']) } }
    } else {
      op = { t: 'meta.update', data: { title: `Draft ${i}` } }
    }

    ops.push(op)
    snapshot = apply(snapshot, op).snapshot
  }

  return { ops, final: snapshot }
}

// ====================
// Invariants
// ====================

function assertTreeInvariants(snapshot: PageSnapshot): void {
  const listedIn = new Map<string, string>()
  for (const [parentId, ids] of snapshot.children) {
    for (const id of ids) {
      expect(listedIn.has(id)).toBe(false)
      listedIn.set(id, parentId)
    }
  }

  let pages = 0
  for (const entity of snapshot.entities.values()) {
    expect(listedIn.get(entity.id)).toBe(entity.parent)
    if (entity.removed) continue

    if (entity.parent !== ROOT) {
      expect(liveEntity(snapshot, entity.parent)).toBeDefined()
    }
    if (entity.display === 'page') {
      pages += 1
      expect(entity.parent).toBe(ROOT)
    }

    let steps = 0
    let current = entity.parent
    while (current !== ROOT) {
      steps += 1
      expect(steps).toBeLessThanOrEqual(snapshot.entities.size)
      current = snapshot.entities.get(current)?.parent ?? ROOT
    }
  }
  expect(pages).toBeLessThanOrEqual(1)

  const seen = new Set<string>()
  for (const r of snapshot.relationships) {
    const key = `${r.from}|${r.to}|${r.type}`
    expect(seen.has(key)).toBe(false)
    seen.add(key)
    expect(snapshot.relCardinalities.get(r.type)).toBe(r.cardinality)
    const sameType = snapshot.relationships.filter((e) => e.type === r.type && e !== r)
    if (r.cardinality === 'many_to_one' || r.cardinality === 'one_to_one') {
      expect(sameType.some((e) => e.from === r.from)).toBe(false)
    }
    if (r.cardinality === 'one_to_one') {
      expect(sameType.some((e) => e.to === r.to)).toBe(false)
    }
  }
}

function withoutSequence(snapshot: PageSnapshot) {
  const { sequence: _sequence, ...rest } = snapshotToJSON(snapshot)
  return rest
}

// ====================
// Tests
// ====================

describe('replay', () => {
  it('rebuilds the fixture from its log', () => {
    const snapshot = replay(groceryOps)
    expect(snapshot.sequence).toBe(5)
    expect(liveChildren(snapshot, 'list')).toEqual(['milk', 'eggs', 'bread'])
  })

  it('returns an empty snapshot for an empty log', () => {
    expect(replay([])).toEqual(emptySnapshot())
  })

  for (const seed of [1, 7, 42, 1234, 99991]) {
    describe(`random log (seed ${seed})`, () => {
      const { ops, final } = generateLog(seed, 400)

      it('replays to the same snapshot every time', () => {
        const first = replay(ops)
        const second = replay(ops)
        expect(first).toEqual(second)
        expect(first).toEqual(final)
      })

      it('commits in place to the same state as the pure reducer', () => {
        const store = new PageStore()
        const { rejected } = store.applyAll(ops)
        expect(store.snapshot).toEqual(final)
        expect(store.sequence).toBe(final.sequence)
        const pure = applyAll(emptySnapshot(), ops)
        expect(rejected.map((r) => r.operation)).toEqual(pure.rejected.map((r) => r.operation))
      })

      it('keeps the tree and relationship invariants', () => {
        assertTreeInvariants(final)
      })

      it('survives a hydration round trip', () => {
        const rebuilt = replay(hydrationOperations(final))
        expect(withoutSequence(rebuilt)).toEqual(withoutSequence(final))
        assertTreeInvariants(rebuilt)
      })

      it('holds the invariants at every prefix', () => {
        let snapshot = emptySnapshot()
        ops.forEach((op, index) => {
          snapshot = apply(snapshot, op).snapshot
          if (index % 50 === 0) {
            assertTreeInvariants(snapshot)
          }
        })
        expect(snapshot).toEqual(final)
      })
    })
  }
})
