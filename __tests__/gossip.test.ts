import { afterEach, beforeAll, describe, it, expect } from 'vitest';
import { Node } from '../node/Node';
import { setLogLevel } from '../node/logger';
import { GossipEvent } from '../node/services/events';
import { PeerId, Topic } from '../shared/ids';
import {
  AlreadyCancelledError,
  NodeShutdownError,
  SubscriptionClosedError,
  ValidationError,
} from '../shared/errors';
import { MemoryNetwork } from '../node/transport/MemoryTransport';
import { bytes, filled, text, waitFor } from './helpers';

const TOPIC = filled(32, 7);

const nodes: Node[] = [];

async function memoryNode(): Promise<Node> {
  const node = await Node.memoryWithOptions({ transport: 'memory' });
  nodes.push(node);
  return node;
}

function introduce(from: Node, to: Node): void {
  from.net().addNodeAddr(to.net().nodeAddr());
}

class Recorder {
  readonly events: GossipEvent[] = [];
  readonly callback = (event: GossipEvent): void => {
    this.events.push(event);
  };

  delivered(): string[] {
    return this.events.flatMap(e => (e.type === 'delivered' ? [text(e.payload)] : []));
  }

  connected(peer: PeerId): boolean {
    return this.events.some(e => e.type === 'peerConnected' && e.peer.equals(peer));
  }

  disconnected(peer: PeerId): boolean {
    return this.events.some(e => e.type === 'peerDisconnected' && e.peer.equals(peer));
  }
}

describe('Gossip', () => {
  beforeAll(() => setLogLevel('off'));

  afterEach(async () => {
    await Promise.all(nodes.splice(0).map(n => n.shutdown()));
    MemoryNetwork.reset();
  });

  it('delivers a broadcast to a neighbour exactly once', async () => {
    const a = await memoryNode();
    const b = await memoryNode();
    const aId = a.net().nodeId();
    const bId = b.net().nodeId();
    introduce(b, a);

    const onA = new Recorder();
    const onB = new Recorder();
    const senderA = a.gossip().subscribe(TOPIC, [], onA.callback);
    b.gossip().subscribe(TOPIC, [aId.toString()], onB.callback);

    await waitFor(() => onA.connected(bId), 3000, 'A to see B');
    await senderA.broadcast(bytes('hello'));

    await waitFor(() => onB.delivered().length > 0, 3000, 'delivery on B');
    const delivered = onB.events.filter(e => e.type === 'delivered');
    expect(delivered).toHaveLength(1);
    const [event] = delivered;
    expect(event.type === 'delivered' && event.origin.equals(aId)).toBe(true);
    expect(onB.delivered()).toEqual(['hello']);
    expect(onA.delivered()).toEqual([]);
  });

  it('forwards swarm messages but keeps neighbour messages one hop', async () => {
    const a = await memoryNode();
    const b = await memoryNode();
    const c = await memoryNode();
    const bId = b.net().nodeId();
    introduce(a, b);
    introduce(c, b);

    const onA = new Recorder();
    const onB = new Recorder();
    const onC = new Recorder();
    b.gossip().subscribe(TOPIC, [], onB.callback);
    const senderA = a.gossip().subscribe(TOPIC, [bId], onA.callback);
    c.gossip().subscribe(TOPIC, [bId], onC.callback);

    await waitFor(() => onA.connected(bId) && onC.connected(bId), 3000, 'line topology');

    await senderA.broadcastNeighbors(bytes('local'));
    await senderA.broadcast(bytes('swarm'));

    await waitFor(() => onB.delivered().length === 2 && onC.delivered().length > 0, 3000, 'deliveries');
    expect(onB.delivered()).toEqual(['local', 'swarm']);
    expect(onC.delivered()).toEqual(['swarm']);
    const forwarded = onC.events.find(e => e.type === 'delivered');
    expect(forwarded?.type === 'delivered' && forwarded.origin.equals(bId)).toBe(true);
  });

  it('tells neighbours when a subscriber leaves', async () => {
    const a = await memoryNode();
    const b = await memoryNode();
    const bId = b.net().nodeId();
    introduce(b, a);

    const onA = new Recorder();
    a.gossip().subscribe(TOPIC, [], onA.callback);
    const senderB = b.gossip().subscribe(TOPIC, [a.net().nodeId()], () => {});

    await waitFor(() => onA.connected(bId), 3000, 'A to see B');
    senderB.cancel();
    await waitFor(() => onA.disconnected(bId), 3000, 'A to see B leave');
  });

  it('rejects a malformed topic or peer id before joining', async () => {
    const a = await memoryNode();
    const gossip = a.gossip();

    let caught: unknown;
    try {
      gossip.subscribe(filled(31, 1), [], () => {});
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ code: 'INVALID_TOPIC' });

    expect(() => gossip.subscribe(TOPIC, ['not-a-peer'], () => {})).toThrow(ValidationError);
  });

  it('accepts a Topic value as well as raw bytes', async () => {
    const a = await memoryNode();
    const sender = a.gossip().subscribe(Topic.fromBytes(TOPIC), [], () => {});
    expect(sender.topic.equals(Topic.fromBytes(TOPIC))).toBe(true);
    sender.cancel();
  });

  describe('Sender', () => {
    it('stops accepting broadcasts once cancelled', async () => {
      const a = await memoryNode();
      const sender = a.gossip().subscribe(TOPIC, [], () => {});
      await sender.broadcast(bytes('fine'));

      sender.cancel();
      expect(sender.isCancelled).toBe(true);
      await expect(sender.broadcast(bytes('late'))).rejects.toBeInstanceOf(SubscriptionClosedError);
      await expect(sender.broadcastNeighbors(bytes('late'))).rejects.toBeInstanceOf(SubscriptionClosedError);
      expect(() => sender.cancel()).toThrow(AlreadyCancelledError);
      expect(await sender.task.done).toBe('cancelled');
    });

    it('is cancelled by node shutdown', async () => {
      const a = await memoryNode();
      const sender = a.gossip().subscribe(TOPIC, [], () => {});
      await a.shutdown();

      expect(sender.isCancelled).toBe(true);
      await expect(sender.broadcast(bytes('late'))).rejects.toBeInstanceOf(SubscriptionClosedError);
      expect(() => a.gossip().subscribe(TOPIC, [], () => {})).toThrow(NodeShutdownError);
    });
  });
});
