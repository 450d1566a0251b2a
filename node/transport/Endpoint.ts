import { generateKeyPairFromSeed, KeyPair, sign, verify } from '@stablelib/ed25519';
import { randomBytes } from 'crypto';
import { NodeAddr, PeerId, bytesEqual, toHex } from '../../shared/ids';
import {
  Frame,
  FrameType,
  alpnToString,
  decodeFrame,
  encodeFrame,
  handshakeTranscript,
} from '../../shared/protocol';
import { TransportError, errorMessage } from '../../shared/errors';
import { EventChannel } from '../core/EventChannel';
import { withTimeout } from '../core/timeout';
import { IConnection, IEndpoint, IFrameSocket, ILogger, ITransport } from '../core/types';
import { Connection } from './Connection';

export interface EndpointOptions {
  /** 32-byte ed25519 seed identifying this node. */
  secretKey: Uint8Array;
  transport: ITransport;
  logger: ILogger;
  handshakeTimeoutMs?: number;
  /** Bound on `transport.dial` for each candidate address. */
  dialTimeoutMs?: number;
}

/**
 * Authenticated, tag-negotiating endpoint over a raw frame transport.
 *
 * Handshake (dialer D, listener L):
 *   D -> L  HELLO  { tag, D's key, challenge_D }
 *   L -> D  ACCEPT { L's key, sig_L(challenge_D || tag), challenge_L }  or  REJECT { reason }
 *   D -> L  AUTH   { sig_D(challenge_L || tag) }
 * Tags the listener does not serve are refused with REJECT before any
 * connection object exists.
 */
export class Endpoint implements IEndpoint {
  readonly peerId: PeerId;
  private readonly keyPair: KeyPair;
  private readonly transport: ITransport;
  private readonly logger: ILogger;
  private readonly handshakeTimeoutMs: number;
  private readonly dialTimeoutMs: number;
  private addresses: string[] = [];
  private readonly addressBook = new Map<string, Set<string>>();
  private acceptedTags: Map<string, Uint8Array> | null = null;
  private onConnection: ((connection: IConnection) => void) | null = null;
  private readonly connections = new Set<IConnection>();
  private closed = false;
  private closing: Promise<void> | null = null;

  private constructor(options: EndpointOptions) {
    this.keyPair = generateKeyPairFromSeed(options.secretKey);
    this.peerId = PeerId.fromBytes(this.keyPair.publicKey);
    this.transport = options.transport;
    this.logger = options.logger;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? 10_000;
    this.dialTimeoutMs = options.dialTimeoutMs ?? 10_000;
  }

  static async bind(options: EndpointOptions): Promise<Endpoint> {
    if (options.secretKey.length !== 32) {
      throw new TransportError('secret key must be 32 bytes', 'BIND_FAILED');
    }
    const endpoint = new Endpoint(options);
    endpoint.addresses = await endpoint.transport.bind(socket => endpoint.handleInbound(socket));
    endpoint.logger.info(`Endpoint ${endpoint.peerId.short()} bound at ${endpoint.addresses.join(', ')}`);
    return endpoint;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  nodeAddr(): NodeAddr {
    return { peerId: this.peerId, addresses: [...this.addresses] };
  }

  /** Resolves once the endpoint is reachable; bound endpoints already are. */
  async online(): Promise<void> {
    if (this.closed) throw new TransportError('endpoint is closed', 'ENDPOINT_CLOSED');
  }

  listen(tags: readonly Uint8Array[], onConnection: (connection: IConnection) => void): void {
    if (this.acceptedTags) throw new Error('endpoint is already listening');
    this.acceptedTags = new Map(tags.map(tag => [toHex(tag), tag.slice()]));
    this.onConnection = onConnection;
  }

  addNodeAddr(addr: NodeAddr): void {
    if (addr.peerId.equals(this.peerId)) return;
    const key = addr.peerId.toString();
    const known = this.addressBook.get(key) ?? new Set<string>();
    addr.addresses.forEach(a => known.add(a));
    this.addressBook.set(key, known);
  }

  knownAddresses(peer: PeerId): string[] {
    return [...(this.addressBook.get(peer.toString()) ?? [])];
  }

  async connect(peer: PeerId, alpn: Uint8Array): Promise<IConnection> {
    if (this.closed) throw new TransportError('endpoint is closed', 'ENDPOINT_CLOSED');
    if (peer.equals(this.peerId)) {
      throw new TransportError('cannot connect to self', 'DIAL_FAILED');
    }
    const candidates = this.knownAddresses(peer).filter(a => this.transport.supports(a));
    if (candidates.length === 0) {
      throw new TransportError(`no known address for peer ${peer.short()}`, 'UNKNOWN_PEER');
    }

    let lastError: unknown;
    for (const address of candidates) {
      try {
        const socket = await this.dial(address);
        return await withTimeout(
          this.dialHandshake(socket, peer, alpn),
          this.handshakeTimeoutMs,
          () => {
            socket.close();
            return new TransportError(`handshake with ${peer.short()} timed out`, 'HANDSHAKE_FAILED');
          }
        );
      } catch (err) {
        if (err instanceof TransportError && err.code === 'PROTOCOL_REJECTED') throw err;
        this.logger.debug(`Dial ${address} failed:`, errorMessage(err));
        lastError = err;
      }
    }
    if (lastError instanceof TransportError) throw lastError;
    throw new TransportError(`could not reach peer ${peer.short()}: ${errorMessage(lastError)}`, 'DIAL_FAILED', {
      cause: lastError,
    });
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closed = true;
      for (const connection of this.connections) connection.close('endpoint closed');
      this.connections.clear();
      this.closing = this.transport.close();
    }
    return this.closing;
  }

  // ─── Handshake ────────────────────────────────────────────────────

  private frameChannel(socket: IFrameSocket): EventChannel<Uint8Array> {
    const frames = new EventChannel<Uint8Array>();
    socket.on('frame', data => frames.push(data));
    socket.on('close', () => frames.close());
    return frames;
  }

  private async nextFrame(frames: EventChannel<Uint8Array>): Promise<Frame> {
    const next = await frames.next();
    if (next.done) throw new TransportError('socket closed during handshake', 'HANDSHAKE_FAILED');
    return decodeFrame(next.value);
  }

  private async dialHandshake(socket: IFrameSocket, expected: PeerId, alpn: Uint8Array): Promise<IConnection> {
    const frames = this.frameChannel(socket);
    const challenge = new Uint8Array(randomBytes(32));
    socket.send(encodeFrame({ type: FrameType.HELLO, alpn, peerId: this.keyPair.publicKey, challenge }));

    const reply = await this.nextFrame(frames);
    if (reply.type === FrameType.REJECT) {
      socket.close();
      throw new TransportError(`peer ${expected.short()} rejected ${alpnToString(alpn)}: ${reply.reason}`, 'PROTOCOL_REJECTED');
    }
    if (reply.type !== FrameType.ACCEPT) {
      socket.close();
      throw new TransportError(`unexpected handshake frame ${reply.type}`, 'HANDSHAKE_FAILED');
    }
    if (!bytesEqual(reply.peerId, expected.bytes)) {
      socket.close();
      throw new TransportError(`peer at address is not ${expected.short()}`, 'HANDSHAKE_FAILED');
    }
    if (!verify(reply.peerId, handshakeTranscript(challenge, alpn), reply.signature)) {
      socket.close();
      throw new TransportError(`invalid handshake signature from ${expected.short()}`, 'HANDSHAKE_FAILED');
    }

    const signature = sign(this.keyPair.secretKey, handshakeTranscript(reply.challenge, alpn));
    socket.send(encodeFrame({ type: FrameType.AUTH, signature }));
    return this.track(new Connection(socket, frames, expected, alpn, this.logger));
  }

  private handleInbound(socket: IFrameSocket): void {
    if (this.closed) {
      socket.close();
      return;
    }
    withTimeout(this.acceptHandshake(socket), this.handshakeTimeoutMs, () => {
      return new TransportError('inbound handshake timed out', 'HANDSHAKE_FAILED');
    })
      .then(connection => {
        if (!connection) return;
        const deliver = this.onConnection;
        if (this.closed || !deliver) {
          connection.close('endpoint closed');
          return;
        }
        deliver(connection);
      })
      .catch(err => {
        this.logger.warn(`Inbound handshake on socket ${socket.id} failed:`, errorMessage(err));
        socket.close();
      });
  }

  private async acceptHandshake(socket: IFrameSocket): Promise<IConnection | null> {
    const frames = this.frameChannel(socket);
    const hello = await this.nextFrame(frames);
    if (hello.type !== FrameType.HELLO) {
      throw new TransportError(`expected HELLO, got frame ${hello.type}`, 'HANDSHAKE_FAILED');
    }

    const tag = this.acceptedTags?.get(toHex(hello.alpn));
    if (!tag) {
      const reason = `unsupported protocol ${alpnToString(hello.alpn)}`;
      this.logger.info(`Rejecting connection from ${toHex(hello.peerId).slice(0, 8)}: ${reason}`);
      socket.send(encodeFrame({ type: FrameType.REJECT, reason }));
      socket.close();
      return null;
    }

    const remote = PeerId.fromBytes(hello.peerId);
    const challenge = new Uint8Array(randomBytes(32));
    socket.send(
      encodeFrame({
        type: FrameType.ACCEPT,
        peerId: this.keyPair.publicKey,
        signature: sign(this.keyPair.secretKey, handshakeTranscript(hello.challenge, tag)),
        challenge,
      })
    );

    const auth = await this.nextFrame(frames);
    if (auth.type !== FrameType.AUTH) {
      throw new TransportError(`expected AUTH, got frame ${auth.type}`, 'HANDSHAKE_FAILED');
    }
    if (!verify(hello.peerId, handshakeTranscript(challenge, tag), auth.signature)) {
      throw new TransportError(`invalid signature from ${remote.short()}`, 'HANDSHAKE_FAILED');
    }
    this.logger.debug(`Accepted ${alpnToString(tag)} connection from ${remote.short()}`);
    return this.track(new Connection(socket, frames, remote, tag, this.logger));
  }

  /** A socket that arrives after the timeout is closed at once. */
  private dial(address: string): Promise<IFrameSocket> {
    let expired = false;
    const dialing = this.transport.dial(address);
    dialing
      .then(socket => {
        if (expired) socket.close();
      })
      .catch(err => {
        if (expired) this.logger.debug(`Late dial of ${address} failed:`, errorMessage(err));
      });
    return withTimeout(dialing, this.dialTimeoutMs, () => {
      expired = true;
      return new TransportError(`dial ${address} timed out after ${this.dialTimeoutMs}ms`, 'DIAL_FAILED');
    });
  }

  private track(connection: IConnection): IConnection {
    this.connections.add(connection);
    connection
      .closed()
      .then(() => this.connections.delete(connection))
      .catch(err => this.logger.error('connection bookkeeping failed:', err));
    return connection;
  }
}
