import { toHex } from '../../shared/ids';
import { DocTicket } from '../../shared/tickets';
import { ValidationError } from '../../shared/errors';
import { CancellationToken } from '../core/CancellationToken';
import { EventCallback, IEndpoint, ILogger } from '../core/types';
import { DocService } from '../services/DocService';
import { DocEvent } from '../services/events';
import { Doc } from './Doc';
import { Subscription } from './Subscription';

export class Docs {
  constructor(
    private service: DocService,
    private endpoint: IEndpoint,
    private nodeToken: CancellationToken,
    private logger: ILogger
  ) {}

  async create(): Promise<Doc> {
    return this.handle(await this.service.createDoc());
  }

  /** The document with this id, or `undefined` if it is not stored locally. */
  async open(id: string): Promise<Doc | undefined> {
    if (!/^[0-9a-f]{64}$/.test(id)) {
      throw new ValidationError('invalid document id: expected 64 hex characters', 'INVALID_KEY');
    }
    return (await this.service.hasDoc(id)) ? this.handle(id) : undefined;
  }

  /** Imports the ticket's document and starts syncing it with the ticket's nodes. */
  async join(ticket: DocTicket | string): Promise<Doc> {
    const parsed = this.parseTicket(ticket);
    const id = toHex(parsed.namespace);
    await this.service.importDoc(id);
    await this.service.startSync(id, parsed.nodes);
    return this.handle(id);
  }

  /**
   * Like {@link join}, but `callback` is subscribed before any sync session
   * starts, so it sees the first `neighborUp` and every remote insert.
   */
  async joinAndSubscribe(
    ticket: DocTicket | string,
    callback: EventCallback<DocEvent>
  ): Promise<{ doc: Doc; subscription: Subscription }> {
    const parsed = this.parseTicket(ticket);
    const id = toHex(parsed.namespace);
    await this.service.importDoc(id);
    const doc = this.handle(id);
    const subscription = doc.subscribe(callback);
    try {
      await doc.startSync(parsed.nodes);
    } catch (err) {
      subscription.cancel();
      throw err;
    }
    return { doc, subscription };
  }

  list(): Promise<string[]> {
    return this.service.listDocs();
  }

  private parseTicket(ticket: DocTicket | string): DocTicket {
    const parsed = typeof ticket === 'string' ? DocTicket.parse(ticket) : ticket;
    if (parsed.namespace.length !== 32) {
      throw new ValidationError('document ticket namespace must be 32 bytes', 'INVALID_TICKET');
    }
    return parsed;
  }

  private handle(id: string): Doc {
    return new Doc(id, this.service, this.endpoint, this.nodeToken, this.logger);
  }
}
