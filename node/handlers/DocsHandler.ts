import { IConnection, IProtocolHandler, ILogger } from '../core/types';
import { DocService } from '../services/DocService';

export class DocsHandler implements IProtocolHandler {
  constructor(
    private docs: DocService,
    private logger: ILogger
  ) {}

  async accept(connection: IConnection): Promise<void> {
    this.logger.debug(`Sync connection ${connection.id} from ${connection.remote.short()}`);
    await this.docs.accept(connection);
  }

  async shutdown(): Promise<void> {
    await this.docs.shutdown();
  }
}
