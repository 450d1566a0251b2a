import { randomBytes } from 'crypto';
import { PeerId, Topic, bytesEqual, toHex } from '../../shared/ids';
import {
  BroadcastScope,
  GOSSIP_ALPN,
  GossipMessage,
  GossipMsgType,
  decodeGossip,
  encodeGossip,
} from '../../shared/protocol';
import { NodeShutdownError, SubscriptionClosedError, TransportError, errorMessage } from '../../shared/errors';
import { EventChannel } from '../core/EventChannel';
import { IConnection, IEndpoint, ILogger } from '../core/types';
import { GossipEvent } from './events';

export interface GossipOptions {
  /** Events buffered per subscriber before the oldest are dropped. */
  subscriberCapacity?: number;
  /** Message ids remembered for duplicate suppression. */
  seenCapacity?: number;
}

/** The native half of one gossip subscription. */
export interface GossipSubscription {
  readonly topic: Topic;
  readonly events: EventChannel<GossipEvent>;
  readonly isClosed: boolean;
  broadcast(content: Uint8Array, scope: BroadcastScope): void;
  close(): void;
}

interface Neighbor {
  peer: PeerId;
  connections: Set<IConnection>;
}

interface TopicState {
  topic: Topic;
  subscribers: Set<EventChannel<GossipEvent>>;
  neighbors: Map<string, Neighbor>;
  dialing: Set<string>;
}

/**
 * Flood gossip over direct neighbours. Every joined (peer, topic) pair is one
 * connection; swarm messages are re-sent to every other neighbour once,
 * neighbour-scoped messages stop after one hop.
 */
export class GossipService {
  private readonly topics = new Map<string, TopicState>();
  private readonly seen = new Set<string>();
  private readonly subscriberCapacity: number;
  private readonly seenCapacity: number;
  private stopped = false;

  constructor(
    private readonly endpoint: IEndpoint,
    private readonly logger: ILogger,
    options: GossipOptions = {}
  ) {
    this.subscriberCapacity = options.subscriberCapacity ?? 1024;
    this.seenCapacity = options.seenCapacity ?? 8192;
  }

  subscribe(topic: Topic, bootstrap: readonly PeerId[]): GossipSubscription {
    if (this.stopped) throw new NodeShutdownError('gossip is shut down');

    const key = topic.toString();
    let state = this.topics.get(key);
    if (!state) {
      state = { topic, subscribers: new Set(), neighbors: new Map(), dialing: new Set() };
      this.topics.set(key, state);
      this.logger.info(`Joined topic ${key.slice(0, 8)}`);
    }
    const joined = state;

    const events = new EventChannel<GossipEvent>({
      capacity: this.subscriberCapacity,
      lagEvent: () => ({ type: 'lagged' }),
    });
    joined.subscribers.add(events);
    for (const neighbor of joined.neighbors.values()) {
      events.push({ type: 'peerConnected', peer: neighbor.peer });
    }
    for (const peer of bootstrap) this.join(joined, peer);

    let closed = false;
    return {
      topic,
      events,
      get isClosed() {
        return closed || events.isClosed;
      },
      broadcast: (content, scope) => {
        if (closed || events.isClosed) throw new SubscriptionClosedError();
        this.broadcast(joined, content, scope);
      },
      close: () => {
        if (closed) return;
        closed = true;
        events.close();
        this.unsubscribe(joined, events);
      },
    };
  }

  /** Serves one inbound gossip connection until the peer leaves or it closes. */
  async accept(connection: IConnection): Promise<void> {
    const first = await connection.recv();
    if (!first) return;
    const msg = decodeGossip(first);
    if (msg.type !== GossipMsgType.JOIN) {
      throw new TransportError(`expected JOIN from ${connection.remote.short()}, got ${msg.type}`, 'HANDSHAKE_FAILED');
    }
    const state = this.stopped ? undefined : this.topics.get(toHex(msg.topic));
    if (!state) {
      this.logger.debug(`${connection.remote.short()} joined topic ${toHex(msg.topic).slice(0, 8)} we are not on`);
      connection.send(encodeGossip({ type: GossipMsgType.LEAVE, topic: msg.topic }));
      return;
    }
    connection.send(encodeGossip({ type: GossipMsgType.JOINED, topic: state.topic.bytes }));
    await this.serve(state, connection);
  }

  async shutdown(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    for (const state of this.topics.values()) {
      for (const events of state.subscribers) {
        events.push({ type: 'error', message: 'gossip shut down' });
        events.close();
      }
      state.subscribers.clear();
      for (const neighbor of state.neighbors.values()) {
        for (const connection of neighbor.connections) connection.close('shutting down');
      }
    }
    this.topics.clear();
    this.logger.info('Gossip stopped');
  }

  // ─── Membership ───────────────────────────────────────────────────

  private join(state: TopicState, peer: PeerId): void {
    const key = peer.toString();
    if (peer.equals(this.endpoint.peerId) || state.neighbors.has(key) || state.dialing.has(key)) return;
    state.dialing.add(key);
    this.dial(state, peer)
      .catch(err => {
        this.logger.warn(`Could not join ${state.topic.toString().slice(0, 8)} via ${peer.short()}:`, errorMessage(err));
      })
      .finally(() => state.dialing.delete(key));
  }

  private async dial(state: TopicState, peer: PeerId): Promise<void> {
    const connection = await this.endpoint.connect(peer, GOSSIP_ALPN);
    connection.send(encodeGossip({ type: GossipMsgType.JOIN, topic: state.topic.bytes }));

    const reply = await connection.recv();
    if (!reply) {
      throw new TransportError(`${peer.short()} closed before joining`, 'CONNECTION_CLOSED');
    }
    const msg = decodeGossip(reply);
    if (msg.type !== GossipMsgType.JOINED) {
      connection.close('not joined');
      throw new TransportError(`${peer.short()} is not on topic ${state.topic.toString().slice(0, 8)}`, 'HANDSHAKE_FAILED');
    }
    if (this.topics.get(state.topic.toString()) !== state) {
      connection.close('left topic');
      return;
    }
    this.serve(state, connection).catch(err => {
      this.logger.warn(`Gossip connection ${connection.id} to ${peer.short()} failed:`, errorMessage(err));
    });
  }

  private unsubscribe(state: TopicState, events: EventChannel<GossipEvent>): void {
    state.subscribers.delete(events);
    const key = state.topic.toString();
    if (state.subscribers.size > 0 || this.topics.get(key) !== state) return;

    this.topics.delete(key);
    const leave = encodeGossip({ type: GossipMsgType.LEAVE, topic: state.topic.bytes });
    for (const neighbor of state.neighbors.values()) {
      for (const connection of neighbor.connections) {
        this.trySend(connection, leave);
        connection.close('left topic');
      }
    }
    this.logger.info(`Left topic ${key.slice(0, 8)}`);
  }

  private async serve(state: TopicState, connection: IConnection): Promise<void> {
    const peer = connection.remote;
    this.addNeighbor(state, peer, connection);
    try {
      for (;;) {
        const raw = await connection.recv();
        if (!raw) break;
        const msg = decodeGossip(raw);
        if (msg.type === GossipMsgType.LEAVE) break;
        if (msg.type !== GossipMsgType.MESSAGE) {
          this.logger.debug(`Ignoring gossip message ${msg.type} from ${peer.short()}`);
          continue;
        }
        this.receive(state, peer, msg);
      }
    } finally {
      connection.close();
      this.removeNeighbor(state, peer, connection);
    }
  }

  private addNeighbor(state: TopicState, peer: PeerId, connection: IConnection): void {
    const key = peer.toString();
    let neighbor = state.neighbors.get(key);
    if (!neighbor) {
      neighbor = { peer, connections: new Set() };
      state.neighbors.set(key, neighbor);
      this.logger.debug(`Neighbor up ${peer.short()} on ${state.topic.toString().slice(0, 8)}`);
      this.publish(state, { type: 'peerConnected', peer });
    }
    neighbor.connections.add(connection);
  }

  private removeNeighbor(state: TopicState, peer: PeerId, connection: IConnection): void {
    const key = peer.toString();
    const neighbor = state.neighbors.get(key);
    if (!neighbor) return;
    neighbor.connections.delete(connection);
    if (neighbor.connections.size > 0) return;
    state.neighbors.delete(key);
    this.logger.debug(`Neighbor down ${peer.short()} on ${state.topic.toString().slice(0, 8)}`);
    this.publish(state, { type: 'peerDisconnected', peer });
  }

  // ─── Messages ─────────────────────────────────────────────────────

  private broadcast(state: TopicState, content: Uint8Array, scope: BroadcastScope): void {
    const id = new Uint8Array(randomBytes(16));
    this.markSeen(toHex(id));
    const frame = encodeGossip({ type: GossipMsgType.MESSAGE, topic: state.topic.bytes, id, scope, content });
    this.sendToNeighbors(state, frame);
  }

  private receive(state: TopicState, from: PeerId, msg: Extract<GossipMessage, { type: GossipMsgType.MESSAGE }>): void {
    if (!bytesEqual(msg.topic, state.topic.bytes)) {
      this.logger.debug(`Dropping message for foreign topic from ${from.short()}`);
      return;
    }
    if (!this.markSeen(toHex(msg.id))) return;

    this.publish(state, { type: 'delivered', payload: msg.content, origin: from });
    if (msg.scope === BroadcastScope.SWARM) {
      this.sendToNeighbors(state, encodeGossip(msg), from);
    }
  }

  private sendToNeighbors(state: TopicState, frame: Uint8Array, except?: PeerId): void {
    for (const neighbor of state.neighbors.values()) {
      if (except && neighbor.peer.equals(except)) continue;
      const connection = [...neighbor.connections].find(c => c.isOpen);
      if (connection) this.trySend(connection, frame);
    }
  }

  private trySend(connection: IConnection, frame: Uint8Array): void {
    try {
      connection.send(frame);
    } catch (err) {
      this.logger.debug(`Send on ${connection.id} failed:`, errorMessage(err));
    }
  }

  private publish(state: TopicState, event: GossipEvent): void {
    for (const events of state.subscribers) events.push(event);
  }

  /** Returns `false` for an id already seen. */
  private markSeen(id: string): boolean {
    if (this.seen.has(id)) return false;
    this.seen.add(id);
    if (this.seen.size > this.seenCapacity) {
      const oldest = this.seen.values().next();
      if (!oldest.done) this.seen.delete(oldest.value);
    }
    return true;
  }
}
