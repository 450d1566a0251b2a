import { describe, it, expect, vi } from 'vitest';
import { startBridge } from '../node/bridge/EventBridge';
import { CancellationToken } from '../node/core/CancellationToken';
import { EventChannel } from '../node/core/EventChannel';
import { ILogger } from '../node/core/types';
import { silentLogger } from './helpers';

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function channelOf(...events: string[]): EventChannel<string> {
  const channel = new EventChannel<string>();
  events.forEach(e => channel.push(e));
  return channel;
}

describe('startBridge()', () => {
  it('returns before the first callback runs', async () => {
    const seen: string[] = [];
    const channel = channelOf('E1');
    channel.close();
    const task = startBridge(channel, e => void seen.push(e), new CancellationToken(), {
      name: 'test',
      logger: silentLogger,
    });
    expect(seen).toEqual([]);
    expect(await task.done).toBe('ended');
    expect(seen).toEqual(['E1']);
  });

  it('delivers events in order, once each, one callback at a time', async () => {
    const seen: string[] = [];
    let running = 0;
    let maxRunning = 0;
    const delays: Record<string, number> = { E1: 30, E2: 0, E3: 10 };
    const channel = channelOf('E1', 'E2', 'E3');
    channel.close();

    const task = startBridge(
      channel,
      async e => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await sleep(delays[e] ?? 0);
        seen.push(e);
        running--;
      },
      new CancellationToken(),
      { name: 'test', logger: silentLogger }
    );

    expect(await task.done).toBe('ended');
    expect(seen).toEqual(['E1', 'E2', 'E3']);
    expect(maxRunning).toBe(1);
    expect(task.stats()).toEqual({ delivered: 3, failed: 0 });
  });

  it('logs a failing callback and keeps going', async () => {
    const warn = vi.fn();
    const logger: ILogger = { ...silentLogger, warn };
    const seen: string[] = [];
    const failure = new Error('boom');
    const channel = channelOf('E1', 'E2', 'E3');
    channel.close();

    const task = startBridge(
      channel,
      e => {
        if (e === 'E2') throw failure;
        seen.push(e);
      },
      new CancellationToken(),
      { name: 'test', logger }
    );

    expect(await task.done).toBe('ended');
    expect(seen).toEqual(['E1', 'E3']);
    expect(task.stats()).toEqual({ delivered: 2, failed: 1 });
    expect(warn).toHaveBeenCalledWith('cb error, test:', failure);
  });

  it('accepts an object with onEvent', async () => {
    const onEvent = vi.fn();
    const channel = channelOf('E1');
    channel.close();
    const task = startBridge(channel, { onEvent }, new CancellationToken(), { name: 'test', logger: silentLogger });
    await task.done;
    expect(onEvent).toHaveBeenCalledWith('E1');
  });

  it('delivers nothing after cancellation, even with buffered events', async () => {
    const token = new CancellationToken();
    const seen: string[] = [];
    const channel = channelOf('E1', 'E2', 'E3');

    const task = startBridge(
      channel,
      e => {
        seen.push(e);
        token.cancel();
      },
      token,
      { name: 'test', logger: silentLogger }
    );

    expect(await task.done).toBe('cancelled');
    expect(seen).toEqual(['E1']);
    expect(channel.isClosed).toBe(true);
  });

  it('never invokes the callback when cancelled right after start', async () => {
    const token = new CancellationToken();
    const callback = vi.fn();
    const task = startBridge(channelOf('E1', 'E2'), callback, token, { name: 'test', logger: silentLogger });
    token.cancel();
    expect(await task.done).toBe('cancelled');
    expect(callback).not.toHaveBeenCalled();
  });

  it('stops a pump that is waiting for events', async () => {
    const token = new CancellationToken();
    const channel = new EventChannel<string>();
    const callback = vi.fn();
    const task = startBridge(channel, callback, token, { name: 'test', logger: silentLogger });
    await sleep(10);
    token.cancel();
    expect(await task.done).toBe('cancelled');
    channel.push('late');
    await sleep(10);
    expect(callback).not.toHaveBeenCalled();
  });

  it('reports a stream that throws as failed', async () => {
    const error = vi.fn();
    const broken: AsyncIterable<string> = {
      [Symbol.asyncIterator]: () => ({
        next: () => Promise.reject(new Error('stream broke')),
      }),
    };
    const task = startBridge(broken, vi.fn(), new CancellationToken(), {
      name: 'test',
      logger: { ...silentLogger, error },
    });
    expect(await task.done).toBe('failed');
    expect(error).toHaveBeenCalledTimes(1);
  });
});
