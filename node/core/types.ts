import { NodeAddr, PeerId } from '../../shared/ids';
import { IEventEmitter, EventMap } from '../../shared/events';

export interface ILogger {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

// ─── Raw transport ─────────────────────────────────────────────────

export interface SocketEvents extends EventMap {
  frame: [data: Uint8Array];
  close: [];
}

/** A message-oriented duplex below the handshake: one `send` is one frame. */
export interface IFrameSocket extends IEventEmitter<SocketEvents> {
  readonly id: string;
  readonly isOpen: boolean;
  send(data: Uint8Array): void;
  close(): void;
}

export interface ITransport {
  /** Starts listening; resolves with the addresses peers can dial. */
  bind(onSocket: (socket: IFrameSocket) => void): Promise<string[]>;
  dial(address: string): Promise<IFrameSocket>;
  /** Whether this transport can dial the given address. */
  supports(address: string): boolean;
  close(): Promise<void>;
}

// ─── Authenticated connections ─────────────────────────────────────

export interface IConnection {
  readonly id: string;
  readonly remote: PeerId;
  readonly alpn: Uint8Array;
  readonly isOpen: boolean;
  send(data: Uint8Array): void;
  /** Next message, or `null` once the connection is closed and drained. */
  recv(): Promise<Uint8Array | null>;
  close(reason?: string): void;
  closed(): Promise<void>;
}

export interface IEndpoint {
  readonly peerId: PeerId;
  readonly isClosed: boolean;
  nodeAddr(): NodeAddr;
  online(): Promise<void>;
  /** Accept connections for exactly these tags. May be called once. */
  listen(tags: readonly Uint8Array[], onConnection: (connection: IConnection) => void): void;
  connect(peer: PeerId, alpn: Uint8Array): Promise<IConnection>;
  addNodeAddr(addr: NodeAddr): void;
  knownAddresses(peer: PeerId): string[];
  close(): Promise<void>;
}

// ─── Protocols ─────────────────────────────────────────────────────

export interface IProtocolHandler {
  accept(connection: IConnection): Promise<void>;
  shutdown(): Promise<void>;
}

export interface IProtocolCreator {
  create(endpoint: IEndpoint): IProtocolHandler;
}

// ─── Foreign callbacks ─────────────────────────────────────────────

export interface IEventCallback<E> {
  onEvent(event: E): void | Promise<void>;
}

export type EventCallback<E> = IEventCallback<E> | ((event: E) => void | Promise<void>);

// ─── Storage ───────────────────────────────────────────────────────

export interface TagInfo {
  name: Uint8Array;
  hash: string;
}

export interface IBlobRepository {
  put(hash: string, data: Uint8Array): Promise<void>;
  get(hash: string): Promise<Uint8Array | undefined>;
  has(hash: string): Promise<boolean>;
  list(): Promise<string[]>;
  setTag(name: Uint8Array, hash: string): Promise<void>;
  deleteTag(name: Uint8Array): Promise<void>;
  listTags(): Promise<TagInfo[]>;
}

export interface StoredEntry {
  namespace: string;
  author: string;
  key: string;
  hash: string;
  size: number;
  timestamp: number;
  signature: string;
}

export interface IDocRepository {
  createNamespace(namespace: string): Promise<void>;
  hasNamespace(namespace: string): Promise<boolean>;
  listNamespaces(): Promise<string[]>;
  /** All entries of a namespace, one per (author, key). */
  entries(namespace: string): Promise<StoredEntry[]>;
  putEntry(entry: StoredEntry): Promise<void>;
  getAuthors(): Promise<string[]>;
  /** Secret key seeds of local authors, keyed by author id (hex). */
  putAuthor(author: string, seed: Uint8Array): Promise<void>;
  getAuthorSeed(author: string): Promise<Uint8Array | undefined>;
  getDefaultAuthor(): Promise<string | undefined>;
  setDefaultAuthor(author: string): Promise<void>;
}
