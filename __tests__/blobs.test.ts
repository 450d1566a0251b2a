import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeAll, beforeEach, describe, it, expect } from 'vitest';
import { Node } from '../node/Node';
import { setLogLevel } from '../node/logger';
import { CancellationToken } from '../node/core/CancellationToken';
import { AddProgress, DownloadProgress, ProvideEvent } from '../node/services/events';
import { hashBytes } from '../node/services/BlobService';
import { FsBlobRepository } from '../node/repositories/FsBlobRepository';
import { MemoryNetwork } from '../node/transport/MemoryTransport';
import { BlobTicket } from '../shared/tickets';
import { NotFoundError } from '../shared/errors';
import { bytes, text, waitFor } from './helpers';

const HELLO_WORLD_SHA256 = 'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9';

const nodes: Node[] = [];

async function memoryNode(blobEvents?: (event: ProvideEvent) => void): Promise<Node> {
  const node = await Node.memoryWithOptions({ transport: 'memory', blobEvents });
  nodes.push(node);
  return node;
}

function patterned(length: number): Uint8Array {
  const data = new Uint8Array(length);
  for (let i = 0; i < length; i++) data[i] = (i * 31) % 251;
  return data;
}

describe('Blobs', () => {
  beforeAll(() => setLogLevel('off'));

  afterEach(async () => {
    await Promise.all(nodes.splice(0).map(n => n.shutdown()));
    MemoryNetwork.reset();
  });

  it('stores bytes under their sha256 hash', async () => {
    const blobs = (await memoryNode()).blobs();
    const added = await blobs.addBytes(bytes('hello world'));

    expect(added.hash.toString()).toBe(HELLO_WORLD_SHA256);
    expect(added.size).toBe(11);
    expect(text(added.tag)).toBe('auto-b94d27b9934d3e08');
    expect(text(await blobs.readToBytes(HELLO_WORLD_SHA256))).toBe('hello world');
    expect(await blobs.has(added.hash)).toBe(true);
    expect(await blobs.size(added.hash)).toBe(11);
    expect((await blobs.list()).map(h => h.toString())).toEqual([HELLO_WORLD_SHA256]);
  });

  it('reports an unknown blob as not found', async () => {
    const blobs = (await memoryNode()).blobs();
    const missing = 'ab'.repeat(32);

    expect(await blobs.has(missing)).toBe(false);
    await expect(blobs.readToBytes(missing)).rejects.toBeInstanceOf(NotFoundError);
    await expect(blobs.share(missing)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('names blobs with tags that can be deleted', async () => {
    const node = await memoryNode();
    await node.blobs().addBytes(bytes('hello world'), 'greeting');
    await node.blobs().addBytes(bytes('bye'), bytes('farewell'));

    const tags = await node.tags().list();
    expect(tags.map(t => text(t.name)).sort()).toEqual(['farewell', 'greeting']);
    expect(tags.find(t => text(t.name) === 'greeting')?.hash).toBe(HELLO_WORLD_SHA256);

    await node.tags().delete('greeting');
    expect((await node.tags().list()).map(t => text(t.name))).toEqual(['farewell']);
    expect(await node.blobs().has(HELLO_WORLD_SHA256)).toBe(true);
  });

  it('shares a ticket naming the blob and this node', async () => {
    const node = await memoryNode();
    const { hash } = await node.blobs().addBytes(bytes('hello world'));

    const ticket = BlobTicket.parse((await node.blobs().share(hash)).toString());
    expect(ticket.hash.equals(hash)).toBe(true);
    expect(ticket.node.peerId.equals(node.net().nodeId())).toBe(true);
    expect(ticket.node.addresses).toEqual(node.net().nodeAddr().addresses);
  });

  it('downloads a blob from a provider with progress', async () => {
    const provided: ProvideEvent[] = [];
    const provider = await memoryNode(event => {
      provided.push(event);
    });
    const fetcher = await memoryNode();
    const data = patterned(40_000);
    const { hash } = await provider.blobs().addBytes(data);

    const progress: DownloadProgress[] = [];
    await fetcher.blobs().download(hash, provider.net().nodeAddr(), event => {
      progress.push(event);
    });

    expect(progress.map(e => e.type)).toEqual(['found', 'progress', 'progress', 'progress', 'done', 'allDone']);
    expect(progress[0]).toEqual({ type: 'found', hash: hash.toString(), size: 40_000 });
    expect(progress.flatMap(e => (e.type === 'progress' ? [e.offset] : []))).toEqual([16_384, 32_768, 40_000]);
    expect(progress[5]).toMatchObject({ type: 'allDone', bytesRead: 40_000 });
    expect(await fetcher.blobs().readToBytes(hash)).toEqual(data);

    await waitFor(() => provided.some(e => e.type === 'transferCompleted'), 3000, 'provider events');
    expect(provided.map(e => e.type)).toEqual(['clientConnected', 'transferStarted', 'transferCompleted']);
    expect(provided[2]).toMatchObject({ hash: hash.toString(), bytesSent: 40_000 });
  });

  it('finishes at once when the blob is already local', async () => {
    const node = await memoryNode();
    const { hash } = await node.blobs().addBytes(bytes('hello world'));

    const progress: DownloadProgress[] = [];
    await node.blobs().download(hash, node.net().nodeAddr(), event => {
      progress.push(event);
    });

    expect(progress.map(e => e.type)).toEqual(['found', 'done', 'allDone']);
    expect(progress[2]).toMatchObject({ bytesRead: 0 });
  });

  it('aborts when the provider does not have the blob', async () => {
    const provider = await memoryNode();
    const fetcher = await memoryNode();
    const missing = 'cd'.repeat(32);

    const progress: DownloadProgress[] = [];
    await fetcher.blobs().download(missing, provider.net().nodeAddr(), event => {
      progress.push(event);
    });

    expect(progress).toEqual([
      {
        type: 'abort',
        error: `${provider.net().nodeId().short()} does not have blob ${missing}`,
      },
    ]);
    expect(await fetcher.blobs().has(missing)).toBe(false);
  });

  it('delivers nothing for a download cancelled up front', async () => {
    const provider = await memoryNode();
    const fetcher = await memoryNode();
    const { hash } = await provider.blobs().addBytes(bytes('hello world'));
    const token = new CancellationToken();
    token.cancel();

    const progress: DownloadProgress[] = [];
    await fetcher.blobs().download(
      hash,
      provider.net().nodeAddr(),
      event => {
        progress.push(event);
      },
      token
    );
    expect(progress).toEqual([]);
  });

  describe('persistent storage', () => {
    let root: string;

    afterEach(async () => {
      await fs.rm(root, { recursive: true, force: true });
    });

    it('keeps blobs and tags across restarts', async () => {
      root = await fs.mkdtemp(path.join(os.tmpdir(), 'meshnode-blobs-'));
      const first = await Node.persistentWithOptions(root, { transport: 'memory' });
      await first.blobs().addBytes(bytes('hello world'), 'greeting');
      await first.shutdown();

      const second = await Node.persistentWithOptions(root, { transport: 'memory' });
      nodes.push(second);
      expect(text(await second.blobs().readToBytes(HELLO_WORLD_SHA256))).toBe('hello world');
      const tags = await second.tags().list();
      expect(tags.map(t => [text(t.name), t.hash])).toEqual([['greeting', HELLO_WORLD_SHA256]]);
    });

    it('accepts concurrent writes of the same content', async () => {
      root = await fs.mkdtemp(path.join(os.tmpdir(), 'meshnode-blobs-'));
      const repo = await new FsBlobRepository(root).open();
      const data = patterned(1024 * 1024);
      const hash = hashBytes(data).toString();

      await Promise.all([repo.put(hash, data), repo.put(hash, data), repo.put(hash, data)]);
      expect(await repo.list()).toEqual([hash]);
      expect(await fs.readdir(path.join(root, 'blobs'))).toEqual([hash]);
      expect(await repo.get(hash)).toEqual(data);

      const node = await Node.persistentWithOptions(root, { transport: 'memory' });
      nodes.push(node);
      const added = await Promise.all([
        node.blobs().addBytes(bytes('hello world'), 'a'),
        node.blobs().addBytes(bytes('hello world'), 'b'),
      ]);
      expect(added.map(a => a.hash.toString())).toEqual([HELLO_WORLD_SHA256, HELLO_WORLD_SHA256]);
      const tags = await node.tags().list();
      expect(tags.map(t => [text(t.name), t.hash])).toEqual([
        ['a', HELLO_WORLD_SHA256],
        ['b', HELLO_WORLD_SHA256],
      ]);
    });
  });

  describe('files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'meshnode-files-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('imports a file with progress', async () => {
      const data = patterned(40000);
      const source = path.join(dir, 'input.bin');
      await fs.writeFile(source, data);
      const node = await memoryNode();
      const blobs = node.blobs();

      const progress: AddProgress[] = [];
      await blobs.addFromPath(
        source,
        event => {
          progress.push(event);
        },
        { tag: 'upload' }
      );

      const hash = hashBytes(data).toString();
      expect(progress[0]).toEqual({ type: 'found', name: source, size: 40000 });
      const offsets = progress.flatMap(e => (e.type === 'progress' ? [e.offset] : []));
      expect(offsets[offsets.length - 1]).toBe(40000);
      expect(offsets).toEqual([...offsets].sort((x, y) => x - y));
      expect(progress.slice(-2).map(e => e.type)).toEqual(['done', 'allDone']);
      const last = progress[progress.length - 1];
      expect(last.type === 'allDone' && [last.hash, last.size, text(last.tag)]).toEqual([hash, 40000, 'upload']);

      expect(await blobs.readToBytes(hash)).toEqual(data);
      const tags = await node.tags().list();
      expect(tags.map(t => [text(t.name), t.hash])).toEqual([['upload', hash]]);
    });

    it('aborts the import of a missing file', async () => {
      const blobs = (await memoryNode()).blobs();
      const progress: AddProgress[] = [];
      await blobs.addFromPath(path.join(dir, 'missing.bin'), event => {
        progress.push(event);
      });

      expect(progress.map(e => e.type)).toEqual(['abort']);
      const abort = progress[0];
      expect(abort.type === 'abort' && abort.error).toContain('ENOENT');
      expect(await blobs.list()).toEqual([]);
    });

    it('writes a blob out to a path', async () => {
      const blobs = (await memoryNode()).blobs();
      const data = patterned(40000);
      const added = await blobs.addBytes(data);
      const dest = path.join(dir, 'nested', 'out.bin');

      await blobs.writeToPath(added.hash, dest);
      expect(new Uint8Array(await fs.readFile(dest))).toEqual(data);
      await expect(blobs.writeToPath('ab'.repeat(32), dest)).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
