import { AlreadyCancelledError } from '../../shared/errors';
import { BridgeTask } from '../bridge/EventBridge';
import { CancellationToken } from '../core/CancellationToken';

/** Handle to a bridged event stream without an outward half. */
export class Subscription {
  constructor(
    private readonly token: CancellationToken,
    readonly task: BridgeTask
  ) {}

  get isCancelled(): boolean {
    return this.token.isCancelled;
  }

  cancel(): void {
    if (!this.token.cancel()) {
      throw new AlreadyCancelledError('subscription already cancelled');
    }
  }
}
