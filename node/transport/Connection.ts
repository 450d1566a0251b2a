import { randomBytes } from 'crypto';
import { alpnToString, decodeFrame, encodeFrame, FrameType } from '../../shared/protocol';
import { PeerId } from '../../shared/ids';
import { TransportError } from '../../shared/errors';
import { EventChannel } from '../core/EventChannel';
import { IConnection, IFrameSocket, ILogger } from '../core/types';

/**
 * An authenticated, tag-bound connection. Takes over the raw frame channel
 * the handshake was read from, so frames that arrived during the handshake
 * are not lost.
 */
export class Connection implements IConnection {
  readonly id: string;
  private readonly inbox = new EventChannel<Uint8Array>();
  private open = true;
  private readonly whenClosed: Promise<void>;
  private resolveClosed: () => void = () => {};

  constructor(
    private readonly socket: IFrameSocket,
    frames: EventChannel<Uint8Array>,
    readonly remote: PeerId,
    readonly alpn: Uint8Array,
    private readonly logger: ILogger
  ) {
    this.id = randomBytes(4).toString('hex');
    this.whenClosed = new Promise(resolve => {
      this.resolveClosed = resolve;
    });
    this.pump(frames).catch(err => {
      this.logger.warn(`Connection ${this.id} dropped on bad frame:`, err);
      this.socket.close();
      this.markClosed();
    });
  }

  get isOpen(): boolean {
    return this.open;
  }

  get protocol(): string {
    return alpnToString(this.alpn);
  }

  send(data: Uint8Array): void {
    if (!this.open || !this.socket.isOpen) {
      throw new TransportError(`connection ${this.id} is closed`, 'CONNECTION_CLOSED');
    }
    this.socket.send(encodeFrame({ type: FrameType.DATA, payload: data }));
  }

  async recv(): Promise<Uint8Array | null> {
    const next = await this.inbox.next();
    return next.done ? null : next.value;
  }

  close(reason = 'closed'): void {
    if (!this.open) return;
    if (this.socket.isOpen) {
      try {
        this.socket.send(encodeFrame({ type: FrameType.CLOSE, reason }));
      } catch (err) {
        this.logger.debug(`Connection ${this.id}: close frame not sent:`, err);
      }
      this.socket.close();
    }
    this.markClosed();
  }

  closed(): Promise<void> {
    return this.whenClosed;
  }

  private markClosed(): void {
    if (!this.open) return;
    this.open = false;
    this.inbox.close();
    this.resolveClosed();
  }

  private async pump(frames: EventChannel<Uint8Array>): Promise<void> {
    for await (const raw of frames) {
      const frame = decodeFrame(raw);
      if (frame.type === FrameType.DATA) {
        this.inbox.push(frame.payload);
      } else if (frame.type === FrameType.CLOSE) {
        this.logger.debug(`Connection ${this.id} closed by ${this.remote.short()}: ${frame.reason}`);
        this.socket.close();
        break;
      } else {
        this.logger.warn(`Unexpected frame type ${frame.type} on connection ${this.id}`);
        this.socket.close();
        break;
      }
    }
    this.markClosed();
  }
}
