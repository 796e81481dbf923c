/**
 * Convergence under chaos
 *
 * Producers write while links are cut at random; once the network settles
 * every replica must hold exactly the server's state.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  TransportError,
  liveChildren,
  snapshotToJSON,
  traverse,
  type Cardinality,
  type EscalateOp,
  type Operation,
  type PageSnapshot,
} from '@pagesync/sdk';
import { SyncCoordinator } from '../../server/typescript/src/sync/coordinator';
import { SyncWebSocketServer } from '../../server/typescript/src/websocket/server';
import {
  ChaosNetwork,
  createPeers,
  seededRandom,
  sleep,
  type ChaosPeer,
} from './network-simulator';

const DOC = 'chaos-doc';
const REL_TYPES: Array<[string, Cardinality | undefined]> = [
  ['next', 'many_to_one'],
  ['pair', 'one_to_one'],
  ['tag', undefined],
];

function view(snapshot: PageSnapshot) {
  const { sequence: _sequence, ...rest } = snapshotToJSON(snapshot);
  return rest;
}

/**
 * Random operations against the server's current state. Some are meant to
 * be rejected.
 */
function operationSource(random: () => number) {
  const pick = <T>(items: readonly T[]): T => items[Math.floor(random() * items.length)];
  let counter = 0;

  return (snapshot: PageSnapshot): Array<Exclude<Operation, EscalateOp>> => {
    const ids = traverse(snapshot).map((entity) => entity.id);
    if (ids.length === 0) {
      return [{ t: 'entity.create', id: 'page', display: 'page' }];
    }
    const target = pick(ids);
    const roll = random();

    if (roll < 0.3) {
      counter += 1;
      return [{ t: 'entity.create', id: `n${counter}`, parent: target, p: { rank: counter } }];
    }
    if (roll < 0.45) {
      return [{ t: 'entity.update', ref: target, p: { v: Math.floor(random() * 100) } }];
    }
    if (roll < 0.55 && target !== 'page') {
      return [{ t: 'entity.remove', ref: target }];
    }
    if (roll < 0.65) {
      return [{ t: 'entity.move', ref: target, parent: pick(ids), position: Math.floor(random() * 3) }];
    }
    if (roll < 0.72) {
      const children = [...liveChildren(snapshot, target)].sort(() => random() - 0.5);
      return [{ t: 'entity.reorder', ref: target, children }];
    }
    if (roll < 0.82) {
      const [type, cardinality] = pick(REL_TYPES);
      return [{ t: 'rel.set', from: target, to: pick(ids), type, ...(cardinality ? { cardinality } : {}) }];
    }
    if (roll < 0.86) {
      return [{ t: 'rel.remove', from: target, to: pick(ids), type: pick(REL_TYPES)[0] }];
    }
    if (roll < 0.9) {
      return [{ t: 'style.entity', ref: target, p: { color: pick(['red', 'blue']) } }];
    }
    if (roll < 0.93) {
      return [{ t: 'meta.update', data: { title: `Title ${counter}` } }];
    }
    counter += 2;
    return [
      { t: 'batch.start' },
      { t: 'entity.create', id: `n${counter - 1}`, parent: target },
      { t: 'entity.create', id: `n${counter}`, parent: `n${counter - 1}` },
      { t: 'batch.end' },
    ];
  };
}

describe('Chaos - Convergence', () => {
  let coordinator: SyncCoordinator;
  let server: SyncWebSocketServer;
  let peers: ChaosPeer[] = [];

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    coordinator = new SyncCoordinator();
    server = new SyncWebSocketServer(coordinator, { heartbeatInterval: 60000 });
  });

  afterEach(async () => {
    peers.forEach((peer) => peer.client.disconnect());
    peers = [];
    await server.close();
    await coordinator.dispose();
    vi.restoreAllMocks();
  });

  async function expectConverged(network: ChaosNetwork) {
    await vi.waitFor(
      () => {
        const expected = view(coordinator.requireDocument(DOC).store.snapshot);
        for (const peer of peers) {
          expect(peer.client.state).toBe('live');
          expect(peer.client.queuedCount).toBe(0);
          expect(view(peer.replica.getConfirmedSnapshot())).toEqual(expected);
        }
        expect(network.inFlight).toBe(0);
      },
      { timeout: 8000, interval: 25 }
    );
  }

  for (const seed of [3, 17, 2024]) {
    it(`replicas converge with the server under random disconnects (seed ${seed})`, async () => {
      const random = seededRandom(seed);
      const network = new ChaosNetwork(server, DOC, { random, maxLatencyMs: 3 });
      const nextOps = operationSource(random);
      const producer = await coordinator.openStream(DOC, { source: 'chaos-producer' });
      peers = createPeers(network, 3);

      let drops = 0;
      for (let round = 0; round < 150; round++) {
        const snapshot = coordinator.requireDocument(DOC).store.snapshot;
        const roll = random();

        if (roll < 0.5) {
          nextOps(snapshot).forEach((op) => producer.push(op));
        } else if (roll < 0.7) {
          const ids = traverse(snapshot).map((entity) => entity.id);
          const peer = peers[Math.floor(random() * peers.length)];
          if (ids.length > 0 && peer.replica.isHydrated()) {
            peer.replica.edit(ids[Math.floor(random() * ids.length)], 'edited', round);
          }
        } else if (roll < 0.9) {
          const peer = peers[Math.floor(random() * peers.length)];
          try {
            nextOps(snapshot).forEach((op) => {
              if (op.t !== 'voice') peer.client.send(op);
            });
          } catch (error) {
            if (!(error instanceof TransportError)) throw error;
          }
        } else if (network.dropRandom()) {
          drops += 1;
        }

        await sleep(Math.floor(random() * 3));
      }
      producer.end();

      expect(drops).toBeGreaterThan(0);
      expect(network.errors).toEqual([]);
      await expectConverged(network);
    });
  }

  it('a peer joining after the chaos hydrates to the same state', async () => {
    const random = seededRandom(99);
    const network = new ChaosNetwork(server, DOC, { random, maxLatencyMs: 2 });
    const nextOps = operationSource(random);
    const producer = await coordinator.openStream(DOC);
    peers = createPeers(network, 2);

    for (let round = 0; round < 80; round++) {
      nextOps(coordinator.requireDocument(DOC).store.snapshot).forEach((op) => producer.push(op));
      if (round % 20 === 10) network.dropRandom();
      await sleep(1);
    }
    producer.end();
    await expectConverged(network);

    peers.push(...createPeers(network, 1));
    await expectConverged(network);
    expect(traverse(peers[2].replica.getConfirmedSnapshot()).length).toBeGreaterThan(1);
  });
});
