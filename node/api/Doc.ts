import { Hash, NodeAddr } from '../../shared/ids';
import { DocTicket } from '../../shared/tickets';
import { startBridge } from '../bridge/EventBridge';
import { CancellationToken } from '../core/CancellationToken';
import { EventCallback, IEndpoint, ILogger } from '../core/types';
import { DocService, EntryQuery } from '../services/DocService';
import { DocEntry, DocEvent } from '../services/events';
import { Subscription } from './Subscription';

const utf8 = new TextEncoder();

function toKey(key: Uint8Array | string): Uint8Array {
  return typeof key === 'string' ? utf8.encode(key) : key;
}

/** Handle to one replicated document. */
export class Doc {
  constructor(
    private readonly namespace: string,
    private readonly service: DocService,
    private readonly endpoint: IEndpoint,
    private readonly nodeToken: CancellationToken,
    private readonly logger: ILogger
  ) {}

  id(): string {
    return this.namespace;
  }

  async setBytes(author: string, key: Uint8Array | string, value: Uint8Array): Promise<Hash> {
    const entry = await this.service.insert(this.namespace, author, toKey(key), value);
    return Hash.parse(entry.hash);
  }

  getExact(author: string, key: Uint8Array | string, includeEmpty = false): Promise<DocEntry | undefined> {
    return this.service.getExact(this.namespace, author, toKey(key), includeEmpty);
  }

  getMany(query: EntryQuery = {}): Promise<DocEntry[]> {
    return this.service.getMany(this.namespace, query);
  }

  /** Writes an empty value, which replicates as a tombstone. */
  async delete(author: string, key: Uint8Array | string): Promise<void> {
    await this.service.insert(this.namespace, author, toKey(key), new Uint8Array(0));
  }

  subscribe(callback: EventCallback<DocEvent>): Subscription {
    const stream = this.service.subscribe(this.namespace);
    const token = this.nodeToken.child();
    token.onCancel(() => stream.close());
    const task = startBridge(stream.events, callback, token, {
      name: `doc ${this.namespace.slice(0, 8)}`,
      logger: this.logger,
    });
    return new Subscription(token, task);
  }

  startSync(peers: readonly NodeAddr[]): Promise<void> {
    return this.service.startSync(this.namespace, peers);
  }

  leave(): Promise<void> {
    return this.service.leave(this.namespace);
  }

  /** A ticket for this document pointing at this node; re-enables sync if it was left. */
  async share(): Promise<DocTicket> {
    await this.service.startSync(this.namespace, []);
    return new DocTicket(new Uint8Array(Buffer.from(this.namespace, 'hex')), [this.endpoint.nodeAddr()]);
  }
}
