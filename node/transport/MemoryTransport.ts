import { randomBytes } from 'crypto';
import { TypedEventEmitter } from '../../shared/events';
import { TransportError } from '../../shared/errors';
import { IFrameSocket, ITransport, SocketEvents } from '../core/types';

const SCHEME = 'memory://';

/**
 * One end of an in-process socket pair. Frames and the close notification
 * are delivered on the microtask queue, in send order.
 */
class MemorySocket extends TypedEventEmitter<SocketEvents> implements IFrameSocket {
  readonly id = randomBytes(4).toString('hex');
  peer: MemorySocket | null = null;
  private open = true;

  get isOpen(): boolean {
    return this.open;
  }

  send(data: Uint8Array): void {
    const peer = this.peer;
    if (!this.open || !peer) {
      throw new TransportError(`socket ${this.id} is not open`, 'CONNECTION_CLOSED');
    }
    const copy = data.slice();
    queueMicrotask(() => {
      if (peer.open) peer.emit('frame', copy);
    });
  }

  close(): void {
    if (!this.open) return;
    this.open = false;
    queueMicrotask(() => this.emit('close'));
    const peer = this.peer;
    if (peer) queueMicrotask(() => peer.remoteClosed());
  }

  private remoteClosed(): void {
    if (!this.open) return;
    this.open = false;
    this.emit('close');
  }
}

/**
 * Process-local network: listeners registered by address, dialled without
 * touching the OS network stack.
 */
export class MemoryNetwork {
  private static listeners = new Map<string, (socket: IFrameSocket) => void>();

  static register(address: string, onSocket: (socket: IFrameSocket) => void): void {
    this.listeners.set(address, onSocket);
  }

  static unregister(address: string): void {
    this.listeners.delete(address);
  }

  static connect(address: string): IFrameSocket {
    const onSocket = this.listeners.get(address);
    if (!onSocket) {
      throw new TransportError(`nothing listening on ${address}`, 'DIAL_FAILED');
    }
    const local = new MemorySocket();
    const remote = new MemorySocket();
    local.peer = remote;
    remote.peer = local;
    onSocket(remote);
    return local;
  }

  static reset(): void {
    this.listeners.clear();
  }
}

export class MemoryTransport implements ITransport {
  private address: string | null = null;
  private readonly sockets = new Set<IFrameSocket>();

  constructor(private readonly name: string = randomBytes(6).toString('hex')) {}

  async bind(onSocket: (socket: IFrameSocket) => void): Promise<string[]> {
    const address = `${SCHEME}${this.name}`;
    MemoryNetwork.register(address, socket => {
      this.track(socket);
      onSocket(socket);
    });
    this.address = address;
    return [address];
  }

  supports(address: string): boolean {
    return address.startsWith(SCHEME);
  }

  async dial(address: string): Promise<IFrameSocket> {
    const socket = MemoryNetwork.connect(address);
    this.track(socket);
    return socket;
  }

  async close(): Promise<void> {
    if (this.address) MemoryNetwork.unregister(this.address);
    this.address = null;
    for (const socket of this.sockets) socket.close();
    this.sockets.clear();
  }

  private track(socket: IFrameSocket): void {
    this.sockets.add(socket);
    socket.once('close', () => this.sockets.delete(socket));
  }
}
