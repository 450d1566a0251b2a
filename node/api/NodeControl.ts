import { IEndpoint } from '../core/types';

export class NodeControl {
  constructor(
    private readonly endpointRef: IEndpoint,
    private readonly stop: () => Promise<void>
  ) {}

  shutdown(): Promise<void> {
    return this.stop();
  }

  endpoint(): IEndpoint {
    return this.endpointRef;
  }
}
