import { generateKeyPairFromSeed, sign, verify } from '@stablelib/ed25519';
import { randomBytes } from 'crypto';
import { NodeAddr, PeerId, toHex } from '../../shared/ids';
import { DOCS_ALPN } from '../../shared/protocol';
import { SyncMessage, WireEntry, decodeSync, encodeSync } from '../../shared/docsProtocol';
import {
  NodeShutdownError,
  NotFoundError,
  TransportError,
  ValidationError,
  errorMessage,
} from '../../shared/errors';
import { EventChannel } from '../core/EventChannel';
import { WriteQueue } from '../core/WriteQueue';
import { IBlobRepository, IConnection, IDocRepository, IEndpoint, ILogger, StoredEntry } from '../core/types';
import { hashBytes } from './BlobService';
import { DocEntry, DocEvent } from './events';

export interface EntryQuery {
  author?: string;
  keyPrefix?: Uint8Array;
  /** Include tombstones (entries with an empty value). */
  includeEmpty?: boolean;
}

export interface DocEventStream {
  readonly events: EventChannel<DocEvent>;
  close(): void;
}

interface LiveSession {
  peer: PeerId;
  connection: IConnection;
  /** Inserts made before our snapshot went out; flushed right after it. */
  pending: WireEntry[] | null;
}

interface DocState {
  namespace: string;
  subscribers: Set<EventChannel<DocEvent>>;
  live: Map<string, LiveSession>;
  writes: WriteQueue;
  lastTimestamp: number;
  left: boolean;
}

function u32(n: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, n, false);
  return out;
}

function u64(n: number): Uint8Array {
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, BigInt(n), false);
  return out;
}

function fromHex(hex: string): Uint8Array {
  return new Uint8Array(Buffer.from(hex, 'hex'));
}

/** Bytes an author signs for one entry. */
export function signedBytes(entry: Omit<StoredEntry, 'signature'>): Uint8Array {
  const key = fromHex(entry.key);
  return Buffer.concat([
    fromHex(entry.namespace),
    fromHex(entry.author),
    u32(key.length),
    key,
    fromHex(entry.hash),
    u64(entry.size),
    u64(entry.timestamp),
  ]);
}

function isNewer(a: StoredEntry, b: StoredEntry): boolean {
  return a.timestamp > b.timestamp || (a.timestamp === b.timestamp && a.hash > b.hash);
}

function toDocEntry(entry: StoredEntry): DocEntry {
  return {
    namespace: entry.namespace,
    author: entry.author,
    key: fromHex(entry.key),
    hash: entry.hash,
    size: entry.size,
    timestamp: entry.timestamp,
  };
}

/**
 * Replicated key-value documents. Each (author, key) holds the entry with the
 * highest timestamp; entries are signed by their author and carry their
 * content inline on the wire. A sync session swaps full snapshots and then
 * stays open to push new inserts both ways.
 */
export class DocService {
  private readonly docs = new Map<string, DocState>();
  private stopped = false;
  private readonly authorWrites = new WriteQueue();

  constructor(
    private readonly repo: IDocRepository,
    private readonly blobs: IBlobRepository,
    private readonly endpoint: IEndpoint,
    private readonly logger: ILogger
  ) {}

  // ─── Authors ──────────────────────────────────────────────────────

  async createAuthor(): Promise<string> {
    const seed = new Uint8Array(randomBytes(32));
    const author = toHex(generateKeyPairFromSeed(seed).publicKey);
    await this.repo.putAuthor(author, seed);
    this.logger.debug(`Created author ${author.slice(0, 8)}`);
    return author;
  }

  /** The node's default author, created on first use. */
  defaultAuthor(): Promise<string> {
    return this.authorWrites.run(async () => {
      const existing = await this.repo.getDefaultAuthor();
      if (existing) return existing;
      const author = await this.createAuthor();
      await this.repo.setDefaultAuthor(author);
      return author;
    });
  }

  listAuthors(): Promise<string[]> {
    return this.repo.getAuthors();
  }

  // ─── Documents ────────────────────────────────────────────────────

  async createDoc(): Promise<string> {
    this.ensureRunning();
    const namespace = toHex(randomBytes(32));
    await this.repo.createNamespace(namespace);
    this.logger.info(`Created doc ${namespace.slice(0, 8)}`);
    return namespace;
  }

  /** Makes a namespace known locally, e.g. before syncing it from a ticket. */
  async importDoc(namespace: string): Promise<void> {
    this.ensureRunning();
    await this.repo.createNamespace(namespace);
  }

  hasDoc(namespace: string): Promise<boolean> {
    return this.repo.hasNamespace(namespace);
  }

  listDocs(): Promise<string[]> {
    return this.repo.listNamespaces();
  }

  async insert(namespace: string, author: string, key: Uint8Array, value: Uint8Array): Promise<DocEntry> {
    this.ensureRunning();
    if (key.length === 0) throw new ValidationError('document key must not be empty', 'INVALID_KEY');
    await this.requireDoc(namespace);
    const seed = await this.repo.getAuthorSeed(author);
    if (!seed) throw new NotFoundError(`author ${author} is not a local author`);

    const state = this.state(namespace);
    return state.writes.run(async () => {
      const keyHex = toHex(key);
      const previous = (await this.repo.entries(namespace)).find(e => e.author === author && e.key === keyHex);
      const timestamp = Math.max(Date.now() * 1000, state.lastTimestamp + 1, (previous?.timestamp ?? 0) + 1);
      state.lastTimestamp = timestamp;

      const hash = hashBytes(value).toString();
      const unsigned = { namespace, author, key: keyHex, hash, size: value.length, timestamp };
      const entry: StoredEntry = {
        ...unsigned,
        signature: toHex(sign(generateKeyPairFromSeed(seed).secretKey, signedBytes(unsigned))),
      };
      await this.blobs.put(hash, value);
      await this.repo.putEntry(entry);

      const docEntry = toDocEntry(entry);
      this.publish(state, { type: 'insertLocal', entry: docEntry });
      this.pushLive(state, { ...entry, content: Buffer.from(value).toString('base64') });
      return docEntry;
    });
  }

  async getExact(namespace: string, author: string, key: Uint8Array, includeEmpty = false): Promise<DocEntry | undefined> {
    await this.requireDoc(namespace);
    const keyHex = toHex(key);
    const entry = (await this.repo.entries(namespace)).find(e => e.author === author && e.key === keyHex);
    if (!entry || (entry.size === 0 && !includeEmpty)) return undefined;
    return toDocEntry(entry);
  }

  async getMany(namespace: string, query: EntryQuery = {}): Promise<DocEntry[]> {
    await this.requireDoc(namespace);
    const prefix = query.keyPrefix ? toHex(query.keyPrefix) : '';
    return (await this.repo.entries(namespace))
      .filter(e => query.author === undefined || e.author === query.author)
      .filter(e => e.key.startsWith(prefix))
      .filter(e => query.includeEmpty || e.size > 0)
      .sort((a, b) => a.author.localeCompare(b.author) || a.key.localeCompare(b.key))
      .map(toDocEntry);
  }

  subscribe(namespace: string): DocEventStream {
    this.ensureRunning();
    const state = this.state(namespace);
    const events = new EventChannel<DocEvent>();
    state.subscribers.add(events);
    return {
      events,
      close: () => {
        events.close();
        state.subscribers.delete(events);
      },
    };
  }

  // ─── Sync ─────────────────────────────────────────────────────────

  /** Starts a background sync session with every peer not already connected. */
  async startSync(namespace: string, peers: readonly NodeAddr[]): Promise<void> {
    this.ensureRunning();
    await this.requireDoc(namespace);
    const state = this.state(namespace);
    state.left = false;
    for (const addr of peers) {
      const peer = addr.peerId;
      if (peer.equals(this.endpoint.peerId) || state.live.has(peer.toString())) continue;
      this.endpoint.addNodeAddr(addr);
      this.syncWith(state, peer).catch(err => {
        this.logger.warn(`Sync of ${namespace.slice(0, 8)} with ${peer.short()} failed:`, errorMessage(err));
      });
    }
  }

  /** Ends live sync for a document and refuses new sessions until the next `startSync`. */
  async leave(namespace: string): Promise<void> {
    const state = this.docs.get(namespace);
    if (!state) return;
    state.left = true;
    for (const session of state.live.values()) session.connection.close('left document');
  }

  async accept(connection: IConnection): Promise<void> {
    const first = await connection.recv();
    if (!first) return;
    const open = decodeSync(first);
    if (open.type !== 'open') {
      throw new TransportError(`expected open from ${connection.remote.short()}, got ${open.type}`, 'HANDSHAKE_FAILED');
    }
    const known = !this.stopped && (await this.repo.hasNamespace(open.namespace));
    if (!known) {
      connection.send(encodeSync({ type: 'refused', reason: 'unknown document' }));
      return;
    }
    if (this.docs.get(open.namespace)?.left) {
      connection.send(encodeSync({ type: 'refused', reason: 'document left' }));
      return;
    }
    await this.runSession(this.state(open.namespace), connection, false);
  }

  async shutdown(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    for (const state of this.docs.values()) {
      for (const session of state.live.values()) session.connection.close('shutting down');
      for (const events of state.subscribers) events.close();
      state.subscribers.clear();
    }
    this.logger.info('Docs stopped');
  }

  private async syncWith(state: DocState, peer: PeerId): Promise<void> {
    let connection: IConnection;
    try {
      connection = await this.endpoint.connect(peer, DOCS_ALPN);
    } catch (err) {
      this.publish(state, { type: 'syncFinished', peer, error: errorMessage(err) });
      throw err;
    }
    connection.send(encodeSync({ type: 'open', namespace: state.namespace }));
    await this.runSession(state, connection, true);
  }

  private async runSession(state: DocState, connection: IConnection, initiator: boolean): Promise<void> {
    const peer = connection.remote;
    const session: LiveSession = { peer, connection, pending: [] };
    const key = peer.toString();
    const replaced = state.live.get(key);
    state.live.set(key, session);
    if (!replaced) this.publish(state, { type: 'neighborUp', peer });

    let finished = false;
    try {
      if (!initiator) await this.sendSnapshot(state, session);

      const reply = await this.recvSync(connection);
      if (reply.type === 'refused') {
        throw new TransportError(`${peer.short()} refused sync: ${reply.reason}`, 'PROTOCOL_REJECTED');
      }
      if (reply.type !== 'entries') {
        throw new TransportError(`expected entries from ${peer.short()}, got ${reply.type}`, 'HANDSHAKE_FAILED');
      }
      for (const entry of reply.entries) await this.apply(state, entry, peer);

      if (initiator) await this.sendSnapshot(state, session);
      finished = true;
      this.publish(state, { type: 'syncFinished', peer });
      this.logger.debug(`Synced ${state.namespace.slice(0, 8)} with ${peer.short()}`);

      for (;;) {
        const raw = await connection.recv();
        if (!raw) break;
        const msg = decodeSync(raw);
        if (msg.type === 'insert') {
          await this.apply(state, msg.entry, peer);
        } else {
          this.logger.debug(`Ignoring ${msg.type} from ${peer.short()} during live sync`);
        }
      }
    } catch (err) {
      if (!finished) this.publish(state, { type: 'syncFinished', peer, error: errorMessage(err) });
      throw err;
    } finally {
      connection.close();
      if (state.live.get(key) === session) {
        state.live.delete(key);
        this.publish(state, { type: 'neighborDown', peer });
      }
    }
  }

  private async sendSnapshot(state: DocState, session: LiveSession): Promise<void> {
    const entries = await Promise.all(
      (await this.repo.entries(state.namespace)).map(async entry => {
        const content = (await this.blobs.get(entry.hash)) ?? new Uint8Array(0);
        return { ...entry, content: Buffer.from(content).toString('base64') };
      })
    );
    session.connection.send(encodeSync({ type: 'entries', entries: entries.filter(e => e.size === 0 || e.content !== '') }));
    const pending = session.pending ?? [];
    session.pending = null;
    for (const entry of pending) session.connection.send(encodeSync({ type: 'insert', entry }));
  }

  private async recvSync(connection: IConnection): Promise<SyncMessage> {
    const raw = await connection.recv();
    if (!raw) throw new TransportError(`sync connection ${connection.id} closed`, 'CONNECTION_CLOSED');
    return decodeSync(raw);
  }

  private pushLive(state: DocState, entry: WireEntry): void {
    for (const session of state.live.values()) {
      if (session.pending) {
        session.pending.push(entry);
        continue;
      }
      try {
        session.connection.send(encodeSync({ type: 'insert', entry }));
      } catch (err) {
        this.logger.debug(`Live push to ${session.peer.short()} failed:`, errorMessage(err));
      }
    }
  }

  /** Stores a remote entry if it is valid and newer than what we hold. */
  private apply(state: DocState, wire: WireEntry, from: PeerId): Promise<boolean> {
    return state.writes.run(async () => {
      const { content: encoded, ...entry } = wire;
      const content = new Uint8Array(Buffer.from(encoded, 'base64'));
      if (!this.isValid(state, entry, content)) {
        this.logger.warn(`Dropping invalid entry from ${from.short()} in ${state.namespace.slice(0, 8)}`);
        return false;
      }
      const existing = (await this.repo.entries(state.namespace)).find(
        e => e.author === entry.author && e.key === entry.key
      );
      if (existing && !isNewer(entry, existing)) return false;

      await this.blobs.put(entry.hash, content);
      await this.repo.putEntry(entry);
      this.publish(state, { type: 'insertRemote', from, entry: toDocEntry(entry) });
      this.publish(state, { type: 'contentReady', hash: entry.hash });
      return true;
    });
  }

  private isValid(state: DocState, entry: StoredEntry, content: Uint8Array): boolean {
    if (entry.namespace !== state.namespace) return false;
    if (entry.size !== content.length || hashBytes(content).toString() !== entry.hash) return false;
    return verify(fromHex(entry.author), signedBytes(entry), fromHex(entry.signature));
  }

  private publish(state: DocState, event: DocEvent): void {
    for (const events of state.subscribers) events.push(event);
  }

  private state(namespace: string): DocState {
    let state = this.docs.get(namespace);
    if (!state) {
      state = {
        namespace,
        subscribers: new Set(),
        live: new Map(),
        writes: new WriteQueue(),
        lastTimestamp: 0,
        left: false,
      };
      this.docs.set(namespace, state);
    }
    return state;
  }

  private async requireDoc(namespace: string): Promise<void> {
    if (!(await this.repo.hasNamespace(namespace))) {
      throw new NotFoundError(`document ${namespace} not found`);
    }
  }

  private ensureRunning(): void {
    if (this.stopped) throw new NodeShutdownError('docs are shut down');
  }
}
