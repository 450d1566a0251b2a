import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeAll, describe, it, expect, vi } from 'vitest';
import {
  IConnection,
  IEndpoint,
  IProtocolCreator,
  IProtocolHandler,
  Node,
  NodeShutdownError,
  ValidationError,
  alpn,
  parseNodeOptions,
  setLogLevel,
} from '../node/lib';
import { GOSSIP_ALPN } from '../shared/protocol';
import { MemoryNetwork } from '../node/transport/MemoryTransport';
import { bytes, filled, text } from './helpers';

const ECHO = alpn('/test-echo/1');

class EchoHandler implements IProtocolHandler {
  shutdown = vi.fn(async () => {});

  async accept(connection: IConnection): Promise<void> {
    for (;;) {
      const data = await connection.recv();
      if (!data) return;
      connection.send(data);
    }
  }
}

/** Hands out one EchoHandler and remembers the endpoint it was created for. */
class EchoCreator implements IProtocolCreator {
  endpoint: IEndpoint | null = null;
  readonly handler = new EchoHandler();

  create(endpoint: IEndpoint): IProtocolHandler {
    this.endpoint = endpoint;
    return this.handler;
  }
}

function catchSync(run: () => unknown): unknown {
  try {
    run();
  } catch (err) {
    return err;
  }
  return undefined;
}

const nodes: Node[] = [];

async function memoryNode(creator?: IProtocolCreator): Promise<Node> {
  const protocols = creator ? new Map([[ECHO, creator]]) : undefined;
  const node = await Node.memoryWithOptions({ transport: 'memory', protocols });
  nodes.push(node);
  return node;
}

describe('parseNodeOptions()', () => {
  it('fills in defaults', () => {
    expect(parseNodeOptions({})).toEqual({
      enableDocs: false,
      bindAddr: '127.0.0.1:0',
      transport: 'websocket',
      shutdownTimeoutMs: 5000,
    });
  });

  it('rejects unknown keys', () => {
    const input = { enableDocs: true, gcIntervalMs: 1000 };
    const err = catchSync(() => parseNodeOptions(input));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ code: 'INVALID_OPTIONS' });
    expect(err instanceof Error && err.message).toMatch(/^invalid node options: options: Unrecognized key/);
  });

  it('names the offending option', () => {
    expect(() => parseNodeOptions({ bindAddr: 'localhost' })).toThrow(
      'invalid node options: bindAddr: bindAddr must be host:port'
    );
    expect(() => parseNodeOptions({ bindAddr: '127.0.0.1:70000' })).toThrow('bindAddr: port out of range');
    expect(() => parseNodeOptions({ secretKey: filled(16, 1) })).toThrow('secretKey: secretKey must be 32 bytes');
    expect(() => parseNodeOptions({ gcIntervalMillis: 0 })).toThrow(ValidationError);
  });

  it('accepts a gc interval without acting on it', () => {
    expect(parseNodeOptions({ gcIntervalMillis: 60_000 }).gcIntervalMillis).toBe(60_000);
  });
});

describe('Node', () => {
  beforeAll(() => setLogLevel('off'));

  afterEach(async () => {
    await Promise.all(nodes.splice(0).map(n => n.shutdown()));
    MemoryNetwork.reset();
  });

  it('derives its id from the secret key', async () => {
    const secretKey = filled(32, 3);
    const first = await Node.memoryWithOptions({ transport: 'memory', secretKey });
    const second = await Node.memoryWithOptions({ transport: 'memory', secretKey });
    nodes.push(first, second);
    expect(first.net().nodeId().equals(second.net().nodeId())).toBe(true);
    await expect(first.net().waitOnline()).resolves.toBeUndefined();
  });

  it('routes caller protocols next to the built-in ones', async () => {
    const serverSide = new EchoCreator();
    const clientSide = new EchoCreator();
    const server = await memoryNode(serverSide);
    await memoryNode(clientSide);

    const endpoint = clientSide.endpoint;
    expect(endpoint).not.toBeNull();
    if (!endpoint) return;
    endpoint.addNodeAddr(server.net().nodeAddr());
    const connection = await endpoint.connect(server.net().nodeId(), ECHO);
    connection.send(bytes('marco'));
    const reply = await connection.recv();
    expect(reply && text(reply)).toBe('marco');
    connection.close();

    expect(serverSide.endpoint).toBe(server.node().endpoint());
    await server.shutdown();
    expect(serverSide.handler.shutdown).toHaveBeenCalledTimes(1);
  });

  it('closes its endpoint when a protocol clashes with a built-in one', async () => {
    const first = new EchoCreator();
    const clash = new EchoCreator();
    const protocols = new Map<Uint8Array, IProtocolCreator>([
      [ECHO, first],
      [GOSSIP_ALPN, clash],
    ]);

    let caught: unknown;
    try {
      await Node.memoryWithOptions({ transport: 'memory', protocols });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ code: 'DUPLICATE_PROTOCOL' });
    expect(first.endpoint?.isClosed).toBe(true);
  });

  it('closes its endpoint when a protocol creator throws', async () => {
    const first = new EchoCreator();
    const broken: IProtocolCreator = {
      create: () => {
        throw new Error('creator exploded');
      },
    };
    const protocols = new Map<Uint8Array, IProtocolCreator>([
      [ECHO, first],
      [alpn('/test-broken/1'), broken],
    ]);

    await expect(Node.memoryWithOptions({ transport: 'memory', protocols })).rejects.toThrow('creator exploded');
    expect(first.endpoint?.isClosed).toBe(true);
  });

  it('shuts down once', async () => {
    const node = await memoryNode();
    const first = node.shutdown();
    const second = node.node().shutdown();
    expect(second).toBe(first);
    await first;

    expect(node.isShutdown).toBe(true);
    expect(node.node().endpoint().isClosed).toBe(true);
    expect(() => node.gossip().subscribe(filled(32, 1), [], () => {})).toThrow(NodeShutdownError);
  });

  it('remembers known addresses of remote peers', async () => {
    const a = await memoryNode();
    const b = await memoryNode();
    const bId = b.net().nodeId();

    expect(a.net().remoteInfo(bId)).toBeUndefined();
    a.net().addNodeAddr(b.net().nodeAddr());
    expect(a.net().remoteInfo(bId.toString())).toEqual({ peerId: bId, addresses: b.net().nodeAddr().addresses });
  });

  describe('persistent identity', () => {
    let root: string;

    afterEach(async () => {
      await fs.rm(root, { recursive: true, force: true });
    });

    it('keeps its peer id across restarts', async () => {
      root = await fs.mkdtemp(path.join(os.tmpdir(), 'meshnode-node-'));
      const first = await Node.persistentWithOptions(root, { transport: 'memory' });
      const id = first.net().nodeId().toString();
      await first.shutdown();

      const second = await Node.persistentWithOptions(root, { transport: 'memory' });
      nodes.push(second);
      expect(second.net().nodeId().toString()).toBe(id);
      expect((await fs.readFile(path.join(root, 'secret.key'), 'utf8')).trim()).toMatch(/^[0-9a-f]{64}$/);
    });

    it('refuses a corrupt key file', async () => {
      root = await fs.mkdtemp(path.join(os.tmpdir(), 'meshnode-node-'));
      await fs.writeFile(path.join(root, 'secret.key'), 'not a key');

      let caught: unknown;
      try {
        await Node.persistentWithOptions(root, { transport: 'memory' });
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught).toMatchObject({ code: 'INVALID_KEY' });
    });
  });
});
