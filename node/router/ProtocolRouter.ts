import { alpnToString } from '../../shared/protocol';
import { errorMessage } from '../../shared/errors';
import { EventMap, TypedEventEmitter } from '../../shared/events';
import { settlesWithin } from '../core/timeout';
import { IConnection, IEndpoint, ILogger } from '../core/types';
import { ProtocolRegistry } from './ProtocolRegistry';

export type ConnectionState = 'accepted' | 'dispatched' | 'completed' | 'failed' | 'rejected';
export type ConnectionOutcome = Extract<ConnectionState, 'completed' | 'failed' | 'rejected'>;

export interface ConnectionRecord {
  id: string;
  remote: string;
  protocol: string;
  state: ConnectionState;
  error?: string;
}

export interface RouterEvents extends EventMap {
  connection: [record: ConnectionRecord];
}

export interface RouterOptions {
  /** Grace period for each handler's shutdown and for draining connections. */
  shutdownTimeoutMs?: number;
}

/**
 * Owns the endpoint's accept side and hands every authenticated connection to
 * the handler registered for its tag. Each connection runs on its own task; a
 * failing handler only fails its own connection.
 */
export class ProtocolRouter extends TypedEventEmitter<RouterEvents> {
  private readonly inFlight = new Map<string, Promise<ConnectionOutcome>>();
  private readonly shutdownTimeoutMs: number;
  private started = false;
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly endpoint: IEndpoint,
    private readonly registry: ProtocolRegistry,
    private readonly logger: ILogger,
    options: RouterOptions = {}
  ) {
    super();
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 5000;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.endpoint.listen(this.registry.tags(), connection => {
      this.dispatch(connection).catch(err => this.logger.error('dispatch failed:', err));
    });
    const names = this.registry.registrations().map(r => r.name);
    this.logger.info(`Router accepting ${names.join(', ')}`);
  }

  get isShutdown(): boolean {
    return this.stopping !== null;
  }

  get activeConnections(): number {
    return this.inFlight.size;
  }

  dispatch(connection: IConnection): Promise<ConnectionOutcome> {
    const record: ConnectionRecord = {
      id: connection.id,
      remote: connection.remote.toString(),
      protocol: alpnToString(connection.alpn),
      state: 'accepted',
    };

    const registration = this.registry.get(connection.alpn);
    if (this.stopping || !registration) {
      const reason = this.stopping ? 'shutting down' : `no handler for ${record.protocol}`;
      this.logger.warn(`Dropping connection ${connection.id}: ${reason}`);
      connection.close(reason);
      return Promise.resolve(this.finish(record, 'rejected'));
    }

    record.state = 'dispatched';
    const task = this.run(record, connection, registration.handler.accept.bind(registration.handler));
    this.inFlight.set(record.id, task);
    return task;
  }

  /** Idempotent; later calls return the first call's promise. */
  shutdown(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.runShutdown();
    }
    return this.stopping;
  }

  private async run(
    record: ConnectionRecord,
    connection: IConnection,
    accept: (connection: IConnection) => Promise<void>
  ): Promise<ConnectionOutcome> {
    try {
      await accept(connection);
      connection.close();
      return this.finish(record, 'completed');
    } catch (err) {
      record.error = errorMessage(err);
      this.logger.error(`Error handling ${record.protocol} connection ${connection.id}:`, err);
      connection.close('handler failed');
      return this.finish(record, 'failed');
    } finally {
      this.inFlight.delete(record.id);
    }
  }

  private finish(record: ConnectionRecord, outcome: ConnectionOutcome): ConnectionOutcome {
    record.state = outcome;
    this.emit('connection', { ...record });
    return outcome;
  }

  private async runShutdown(): Promise<void> {
    this.logger.info('Router shutting down');
    const grace = this.shutdownTimeoutMs;

    for (const { name, handler } of this.registry.registrations()) {
      const stopped = Promise.resolve()
        .then(() => handler.shutdown())
        .catch(err => this.logger.error(`${name} handler shutdown failed:`, err));
      if (!(await settlesWithin(stopped, grace))) {
        this.logger.warn(`${name} handler did not shut down within ${grace}ms`);
      }
    }

    await this.endpoint.close();

    const drained = await settlesWithin(Promise.allSettled([...this.inFlight.values()]), grace);
    if (!drained) {
      this.logger.warn(`${this.inFlight.size} connection(s) still running after shutdown; dropped`);
    }
    this.logger.info('Router shut down');
  }
}
