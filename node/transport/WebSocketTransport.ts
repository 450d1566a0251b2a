import WebSocket, { WebSocketServer } from 'ws';
import { randomBytes } from 'crypto';
import { TypedEventEmitter } from '../../shared/events';
import { TransportError, errorMessage } from '../../shared/errors';
import { IFrameSocket, ILogger, ITransport, SocketEvents } from '../core/types';

function toBytes(data: WebSocket.RawData): Uint8Array {
  if (Buffer.isBuffer(data)) {
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  // Fragmented message
  return new Uint8Array(Buffer.concat(data));
}

export class WebSocketSocket extends TypedEventEmitter<SocketEvents> implements IFrameSocket {
  public readonly id: string;

  constructor(private ws: WebSocket, logger: ILogger) {
    super();
    this.id = randomBytes(4).toString('hex');
    ws.on('message', (data: WebSocket.RawData) => this.emit('frame', toBytes(data)));
    ws.on('close', () => this.emit('close'));
    ws.on('error', err => logger.warn(`WebSocket ${this.id} error:`, err));
  }

  send(data: Uint8Array): void {
    if (this.ws.readyState !== WebSocket.OPEN) {
      throw new TransportError(`socket ${this.id} is not open`, 'CONNECTION_CLOSED');
    }
    this.ws.send(data);
  }

  close(): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close();
    }
  }

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }
}

export class WebSocketTransport implements ITransport {
  private wss: WebSocketServer | null = null;
  private readonly outbound = new Set<WebSocket>();

  constructor(
    private host: string,
    private port: number,
    private logger: ILogger
  ) {}

  bind(onSocket: (socket: IFrameSocket) => void): Promise<string[]> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ host: this.host, port: this.port });
      const onBindError = (err: Error) => {
        reject(new TransportError(`failed to bind ${this.host}:${this.port}: ${err.message}`, 'BIND_FAILED', { cause: err }));
      };
      wss.once('error', onBindError);
      wss.once('listening', () => {
        wss.off('error', onBindError);
        wss.on('error', err => this.logger.warn('WebSocket server error:', errorMessage(err)));
        const address = wss.address();
        const port = typeof address === 'string' ? this.port : address.port;
        this.logger.info(`WebSocket transport listening on ${this.host}:${port}`);
        resolve([`ws://${this.host}:${port}`]);
      });
      wss.on('connection', (ws: WebSocket) => onSocket(new WebSocketSocket(ws, this.logger)));
      this.wss = wss;
    });
  }

  supports(address: string): boolean {
    return address.startsWith('ws://') || address.startsWith('wss://');
  }

  dial(address: string): Promise<IFrameSocket> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(address);
      ws.binaryType = 'nodebuffer';
      const onError = (err: Error) => {
        reject(new TransportError(`failed to dial ${address}: ${errorMessage(err)}`, 'DIAL_FAILED', { cause: err }));
      };
      ws.once('error', onError);
      ws.once('open', () => {
        ws.off('error', onError);
        this.outbound.add(ws);
        ws.once('close', () => this.outbound.delete(ws));
        resolve(new WebSocketSocket(ws, this.logger));
      });
    });
  }

  close(): Promise<void> {
    for (const ws of this.outbound) ws.terminate();
    this.outbound.clear();
    const wss = this.wss;
    this.wss = null;
    if (!wss) return Promise.resolve();
    for (const client of wss.clients) client.terminate();
    return new Promise(resolve => wss.close(() => resolve()));
  }
}
