import { SHA256, hash as sha256 } from '@stablelib/sha256';
import { createReadStream, createWriteStream, promises as fs } from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { Hash, NodeAddr, PeerId, toHex } from '../../shared/ids';
import { BLOBS_ALPN, BlobMessage, BlobMsgType, decodeBlob, encodeBlob } from '../../shared/protocol';
import { NotFoundError, TransportError, errorMessage } from '../../shared/errors';
import { CancellationToken } from '../core/CancellationToken';
import { EventChannel } from '../core/EventChannel';
import { IBlobRepository, IConnection, IEndpoint, ILogger, TagInfo } from '../core/types';
import { AddProgress, DownloadProgress, ProvideEvent } from './events';

const utf8 = new TextEncoder();

export interface BlobServiceOptions {
  chunkSize?: number;
}

export interface AddOutcome {
  hash: Hash;
  size: number;
  tag: Uint8Array;
}

export function hashBytes(data: Uint8Array): Hash {
  return Hash.fromBytes(sha256(data));
}

/**
 * Content-addressed blob store plus whole-blob transfer. A transfer is one
 * GET answered by FOUND, a run of CHUNKs and END (or NOT_FOUND).
 */
export class BlobService {
  private readonly chunkSize: number;

  constructor(
    private readonly repo: IBlobRepository,
    private readonly endpoint: IEndpoint,
    private readonly logger: ILogger,
    options: BlobServiceOptions = {}
  ) {
    this.chunkSize = options.chunkSize ?? 16 * 1024;
  }

  addBytes(data: Uint8Array, tag?: Uint8Array): Promise<AddOutcome> {
    return this.store(hashBytes(data), data, tag);
  }

  /**
   * Imports the file at `filePath`, hashing it while it streams in. Progress
   * is pushed to the returned channel, which closes after `allDone` or `abort`.
   */
  addFromPath(filePath: string, tag: Uint8Array | undefined, token: CancellationToken): EventChannel<AddProgress> {
    const progress = new EventChannel<AddProgress>();
    this.importFile(filePath, tag, progress, token)
      .catch(err => {
        this.logger.warn(`Import of ${filePath} aborted:`, errorMessage(err));
        progress.push({ type: 'abort', error: errorMessage(err) });
      })
      .finally(() => progress.close());
    return progress;
  }

  /** Streams the blob into `dest`, creating parent directories as needed. */
  async writeToPath(hash: Hash, dest: string): Promise<void> {
    const data = await this.readToBytes(hash);
    await fs.mkdir(path.dirname(dest), { recursive: true });
    await pipeline(Readable.from(this.chunks(data)), createWriteStream(dest));
    this.logger.debug(`Wrote blob ${hash.toString().slice(0, 8)} to ${dest}`);
  }

  async readToBytes(hash: Hash): Promise<Uint8Array> {
    const data = await this.repo.get(hash.toString());
    if (!data) throw new NotFoundError(`blob ${hash.toString()} not found`);
    return data;
  }

  has(hash: Hash): Promise<boolean> {
    return this.repo.has(hash.toString());
  }

  async list(): Promise<Hash[]> {
    return (await this.repo.list()).map(h => Hash.parse(h));
  }

  async size(hash: Hash): Promise<number> {
    return (await this.readToBytes(hash)).length;
  }

  listTags(): Promise<TagInfo[]> {
    return this.repo.listTags();
  }

  deleteTag(name: Uint8Array): Promise<void> {
    return this.repo.deleteTag(name);
  }

  /**
   * Fetches `hash` from `node`. Progress is pushed to the returned channel,
   * which closes after `allDone` or `abort`.
   */
  download(hash: Hash, node: NodeAddr, token: CancellationToken): EventChannel<DownloadProgress> {
    const progress = new EventChannel<DownloadProgress>();
    this.endpoint.addNodeAddr(node);
    this.fetch(hash, node.peerId, progress, token)
      .catch(err => {
        this.logger.warn(`Download of ${hash.toString().slice(0, 8)} aborted:`, errorMessage(err));
        progress.push({ type: 'abort', error: errorMessage(err) });
      })
      .finally(() => progress.close());
    return progress;
  }

  /** Answers GET requests on one connection until the requester closes it. */
  async serve(connection: IConnection, emit: (event: ProvideEvent) => void): Promise<void> {
    const connectionId = connection.id;
    emit({ type: 'clientConnected', connectionId, peer: connection.remote });

    for (;;) {
      const raw = await connection.recv();
      if (!raw) return;
      const request = decodeBlob(raw);
      if (request.type !== BlobMsgType.GET) {
        throw new TransportError(`expected GET from ${connection.remote.short()}, got ${request.type}`, 'HANDSHAKE_FAILED');
      }

      const hash = toHex(request.hash);
      const data = await this.repo.get(hash);
      if (!data) {
        this.logger.debug(`${connection.remote.short()} asked for unknown blob ${hash.slice(0, 8)}`);
        connection.send(encodeBlob({ type: BlobMsgType.NOT_FOUND }));
        continue;
      }

      emit({ type: 'transferStarted', connectionId, hash, size: data.length });
      try {
        connection.send(encodeBlob({ type: BlobMsgType.FOUND, size: data.length }));
        for (let offset = 0; offset < data.length; offset += this.chunkSize) {
          const chunk = data.subarray(offset, offset + this.chunkSize);
          connection.send(encodeBlob({ type: BlobMsgType.CHUNK, offset, data: chunk }));
        }
        connection.send(encodeBlob({ type: BlobMsgType.END }));
      } catch (err) {
        emit({ type: 'transferAborted', connectionId, hash, error: errorMessage(err) });
        throw err;
      }
      emit({ type: 'transferCompleted', connectionId, hash, bytesSent: data.length });
    }
  }

  private async importFile(
    filePath: string,
    tag: Uint8Array | undefined,
    progress: EventChannel<AddProgress>,
    token: CancellationToken
  ): Promise<void> {
    const { size } = await fs.stat(filePath);
    progress.push({ type: 'found', name: filePath, size });

    const hasher = new SHA256();
    const parts: Buffer[] = [];
    let offset = 0;
    const stream = createReadStream(filePath, { highWaterMark: this.chunkSize, signal: token.signal });
    for await (const chunk of stream) {
      if (!Buffer.isBuffer(chunk)) throw new Error(`unexpected chunk reading ${filePath}`);
      hasher.update(chunk);
      parts.push(chunk);
      offset += chunk.length;
      progress.push({ type: 'progress', offset });
    }

    const hash = Hash.fromBytes(hasher.digest());
    const added = await this.store(hash, new Uint8Array(Buffer.concat(parts)), tag);
    progress.push({ type: 'done', hash: hash.toString() });
    progress.push({ type: 'allDone', hash: hash.toString(), size: added.size, tag: added.tag });
  }

  private async store(hash: Hash, data: Uint8Array, tag?: Uint8Array): Promise<AddOutcome> {
    const name = tag ?? utf8.encode(`auto-${hash.toString().slice(0, 16)}`);
    await this.repo.put(hash.toString(), data);
    await this.repo.setTag(name, hash.toString());
    this.logger.debug(`Added blob ${hash.toString().slice(0, 8)} (${data.length} bytes)`);
    return { hash, size: data.length, tag: name.slice() };
  }

  private *chunks(data: Uint8Array): Generator<Uint8Array> {
    for (let offset = 0; offset < data.length; offset += this.chunkSize) {
      yield data.subarray(offset, offset + this.chunkSize);
    }
  }

  private async fetch(
    hash: Hash,
    peer: PeerId,
    progress: EventChannel<DownloadProgress>,
    token: CancellationToken
  ): Promise<void> {
    const started = Date.now();
    const key = hash.toString();

    const local = await this.repo.get(key);
    if (local) {
      progress.push({ type: 'found', hash: key, size: local.length });
      progress.push({ type: 'done', hash: key });
      progress.push({ type: 'allDone', bytesRead: 0, elapsedMs: Date.now() - started });
      return;
    }

    const connection = await this.endpoint.connect(peer, BLOBS_ALPN);
    const detach = token.onCancel(() => connection.close('cancelled'));
    try {
      connection.send(encodeBlob({ type: BlobMsgType.GET, hash: hash.bytes }));

      const header = await this.next(connection);
      if (header.type === BlobMsgType.NOT_FOUND) {
        throw new NotFoundError(`${peer.short()} does not have blob ${key}`);
      }
      if (header.type !== BlobMsgType.FOUND) {
        throw new TransportError(`unexpected blob message ${header.type}`, 'HANDSHAKE_FAILED');
      }
      progress.push({ type: 'found', hash: key, size: header.size });

      const data = new Uint8Array(header.size);
      let received = 0;
      for (;;) {
        const msg = await this.next(connection);
        if (msg.type === BlobMsgType.END) break;
        if (msg.type !== BlobMsgType.CHUNK || msg.offset !== received || received + msg.data.length > data.length) {
          throw new TransportError(`malformed transfer of ${key.slice(0, 8)} at offset ${received}`, 'CONNECTION_CLOSED');
        }
        data.set(msg.data, received);
        received += msg.data.length;
        progress.push({ type: 'progress', offset: received });
      }

      if (received !== data.length) {
        throw new TransportError(`transfer ended after ${received} of ${data.length} bytes`, 'CONNECTION_CLOSED');
      }
      if (!hashBytes(data).equals(hash)) {
        throw new Error(`content of ${key.slice(0, 8)} does not match its hash`);
      }
      await this.repo.put(key, data);
      progress.push({ type: 'done', hash: key });
      progress.push({ type: 'allDone', bytesRead: received, elapsedMs: Date.now() - started });
      this.logger.debug(`Downloaded blob ${key.slice(0, 8)} from ${peer.short()}`);
    } finally {
      detach();
      connection.close();
    }
  }

  private async next(connection: IConnection): Promise<BlobMessage> {
    const raw = await connection.recv();
    if (!raw) throw new TransportError(`connection ${connection.id} closed mid-transfer`, 'CONNECTION_CLOSED');
    return decodeBlob(raw);
  }
}
