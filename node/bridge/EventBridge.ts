import { CancellationToken } from '../core/CancellationToken';
import { EventCallback, ILogger } from '../core/types';

export type BridgeExit = 'cancelled' | 'ended' | 'failed';

export interface BridgeStats {
  delivered: number;
  failed: number;
}

export interface BridgeTask {
  readonly name: string;
  /** Settles once the pump has stopped; never rejects. */
  readonly done: Promise<BridgeExit>;
  stats(): BridgeStats;
}

export interface BridgeOptions {
  name: string;
  logger: ILogger;
}

const CANCELLED = Symbol('cancelled');

export function toCallback<E>(callback: EventCallback<E>): (event: E) => void | Promise<void> {
  return typeof callback === 'function' ? callback : event => callback.onEvent(event);
}

/**
 * Pumps `stream` into `callback` one event at a time on a background task
 * until `token` is cancelled or the stream ends. Returns immediately.
 *
 * The callback is awaited before the next event is pulled. A callback
 * failure is logged and counted and the pump carries on. A cancellation that
 * is observable at the same time as a ready event wins, so no event is
 * delivered after teardown.
 */
export function startBridge<E>(
  stream: AsyncIterable<E>,
  callback: EventCallback<E>,
  token: CancellationToken,
  { name, logger }: BridgeOptions
): BridgeTask {
  const invoke = toCallback(callback);
  const counters: BridgeStats = { delivered: 0, failed: 0 };
  const iterator = stream[Symbol.asyncIterator]();
  const cancelled = token.cancelled().then((): typeof CANCELLED => CANCELLED);

  const pump = async (): Promise<BridgeExit> => {
    for (;;) {
      if (token.isCancelled) return 'cancelled';
      const next = await Promise.race([cancelled, iterator.next()]);
      if (next === CANCELLED || token.isCancelled) return 'cancelled';
      if (next.done) return 'ended';

      try {
        await invoke(next.value);
        counters.delivered++;
      } catch (err) {
        counters.failed++;
        logger.warn(`cb error, ${name}:`, err);
      }
    }
  };

  const run = async (): Promise<BridgeExit> => {
    await Promise.resolve();
    logger.debug(`${name} receiver task started`);
    let exit: BridgeExit;
    try {
      exit = await pump();
    } catch (err) {
      logger.error(`${name} event stream failed:`, err);
      exit = 'failed';
    }
    try {
      await iterator.return?.();
    } catch (err) {
      logger.warn(`${name} failed to release event stream:`, err);
    }
    logger.debug(`${name} receiver task ${exit === 'cancelled' ? 'cancelled' : 'stopped'} (${exit})`);
    return exit;
  };

  return {
    name,
    done: run(),
    stats: () => ({ ...counters }),
  };
}
