import { Hash, NodeAddr } from '../../shared/ids';
import { BlobTicket } from '../../shared/tickets';
import { NotFoundError } from '../../shared/errors';
import { startBridge } from '../bridge/EventBridge';
import { CancellationToken } from '../core/CancellationToken';
import { EventCallback, IEndpoint, ILogger } from '../core/types';
import { AddOutcome, BlobService } from '../services/BlobService';
import { AddProgress, DownloadProgress } from '../services/events';

const utf8 = new TextEncoder();

export function toHash(hash: Hash | string): Hash {
  return typeof hash === 'string' ? Hash.parse(hash) : hash;
}

export class Blobs {
  constructor(
    private service: BlobService,
    private endpoint: IEndpoint,
    private nodeToken: CancellationToken,
    private logger: ILogger
  ) {}

  addBytes(data: Uint8Array, tag?: Uint8Array | string): Promise<AddOutcome> {
    return this.service.addBytes(data, typeof tag === 'string' ? utf8.encode(tag) : tag);
  }

  /**
   * Imports a file, reporting `found`, `progress`, `done` and `allDone` (or
   * `abort`) to `callback`. Resolves once the last event was handled.
   */
  async addFromPath(
    filePath: string,
    callback: EventCallback<AddProgress>,
    options: { tag?: Uint8Array | string; token?: CancellationToken } = {}
  ): Promise<void> {
    const tag = typeof options.tag === 'string' ? utf8.encode(options.tag) : options.tag;
    const scope = this.nodeToken.child();
    const detach = options.token?.onCancel(() => scope.cancel());
    try {
      const progress = this.service.addFromPath(filePath, tag, scope);
      const task = startBridge(progress, callback, scope, { name: `add ${filePath}`, logger: this.logger });
      await task.done;
    } finally {
      detach?.();
      scope.cancel();
    }
  }

  writeToPath(hash: Hash | string, dest: string): Promise<void> {
    return this.service.writeToPath(toHash(hash), dest);
  }

  readToBytes(hash: Hash | string): Promise<Uint8Array> {
    return this.service.readToBytes(toHash(hash));
  }

  has(hash: Hash | string): Promise<boolean> {
    return this.service.has(toHash(hash));
  }

  list(): Promise<Hash[]> {
    return this.service.list();
  }

  size(hash: Hash | string): Promise<number> {
    return this.service.size(toHash(hash));
  }

  /**
   * Fetches `hash` from `node`, reporting progress to `callback`. Resolves once
   * the last progress event was handled, including after an `abort`, or when
   * `token` is cancelled.
   */
  async download(
    hash: Hash | string,
    node: NodeAddr,
    callback: EventCallback<DownloadProgress>,
    token?: CancellationToken
  ): Promise<void> {
    const target = toHash(hash);
    const scope = this.nodeToken.child();
    const detach = token?.onCancel(() => scope.cancel());
    try {
      const progress = this.service.download(target, node, scope);
      const task = startBridge(progress, callback, scope, {
        name: `download ${target.toString().slice(0, 8)}`,
        logger: this.logger,
      });
      await task.done;
    } finally {
      detach?.();
      scope.cancel();
    }
  }

  async share(hash: Hash | string): Promise<BlobTicket> {
    const target = toHash(hash);
    if (!(await this.service.has(target))) {
      throw new NotFoundError(`blob ${target.toString()} not found`);
    }
    return new BlobTicket(target, this.endpoint.nodeAddr());
  }
}
