import { IConnection, IProtocolHandler, ILogger } from '../core/types';
import { GossipService } from '../services/GossipService';

export class GossipHandler implements IProtocolHandler {
  constructor(
    private gossip: GossipService,
    private logger: ILogger
  ) {}

  async accept(connection: IConnection): Promise<void> {
    this.logger.debug(`Gossip connection ${connection.id} from ${connection.remote.short()}`);
    await this.gossip.accept(connection);
  }

  async shutdown(): Promise<void> {
    await this.gossip.shutdown();
  }
}
