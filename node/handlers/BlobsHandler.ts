import { IConnection, IProtocolHandler, ILogger } from '../core/types';
import { EventChannel } from '../core/EventChannel';
import { BlobService } from '../services/BlobService';
import { ProvideEvent } from '../services/events';

export class BlobsHandler implements IProtocolHandler {
  private readonly connections = new Set<IConnection>();

  /** `events`, when given, receives the provider side of every transfer. */
  constructor(
    private blobs: BlobService,
    private events: EventChannel<ProvideEvent> | null,
    private logger: ILogger
  ) {}

  async accept(connection: IConnection): Promise<void> {
    this.connections.add(connection);
    try {
      await this.blobs.serve(connection, event => {
        this.events?.push(event);
      });
    } finally {
      this.connections.delete(connection);
    }
  }

  async shutdown(): Promise<void> {
    for (const connection of this.connections) connection.close('shutting down');
    this.connections.clear();
    this.events?.close();
    this.logger.debug('Blobs handler stopped');
  }
}
