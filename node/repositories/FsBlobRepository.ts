import { randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { toHex } from '../../shared/ids';
import { IBlobRepository, TagInfo } from '../core/types';
import { WriteQueue } from '../core/WriteQueue';
import { isNotFound, readJsonFile, writeJsonFile } from './jsonFile';

const tagsSchema = z.array(z.object({ name: z.string(), hash: z.string() }));

/**
 * Blobs as one file per hash under `<root>/blobs`, tags in `<root>/tags.json`.
 */
export class FsBlobRepository implements IBlobRepository {
  private readonly blobDir: string;
  private readonly tagsFile: string;
  private readonly tagWrites = new WriteQueue();

  constructor(root: string) {
    this.blobDir = path.join(root, 'blobs');
    this.tagsFile = path.join(root, 'tags.json');
  }

  async open(): Promise<this> {
    await fs.mkdir(this.blobDir, { recursive: true });
    return this;
  }

  async put(hash: string, data: Uint8Array): Promise<void> {
    const file = this.blobPath(hash);
    if (await this.has(hash)) return;
    const tmp = `${file}.${randomBytes(6).toString('hex')}.tmp`;
    try {
      await fs.writeFile(tmp, data);
      await fs.rename(tmp, file);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  }

  async get(hash: string): Promise<Uint8Array | undefined> {
    try {
      return new Uint8Array(await fs.readFile(this.blobPath(hash)));
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  async has(hash: string): Promise<boolean> {
    try {
      await fs.access(this.blobPath(hash));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async list(): Promise<string[]> {
    const names = await fs.readdir(this.blobDir);
    return names.filter(n => /^[0-9a-f]{64}$/.test(n)).sort();
  }

  setTag(name: Uint8Array, hash: string): Promise<void> {
    const key = toHex(name);
    return this.tagWrites.run(async () => {
      const tags = (await this.readTags()).filter(t => t.name !== key);
      tags.push({ name: key, hash });
      await writeJsonFile(this.tagsFile, tags);
    });
  }

  deleteTag(name: Uint8Array): Promise<void> {
    const key = toHex(name);
    return this.tagWrites.run(async () => {
      const tags = await this.readTags();
      const kept = tags.filter(t => t.name !== key);
      if (kept.length !== tags.length) await writeJsonFile(this.tagsFile, kept);
    });
  }

  async listTags(): Promise<TagInfo[]> {
    const tags = await this.readTags();
    return tags
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(t => ({ name: new Uint8Array(Buffer.from(t.name, 'hex')), hash: t.hash }));
  }

  private readTags(): Promise<z.infer<typeof tagsSchema>> {
    return readJsonFile(this.tagsFile, tagsSchema, []);
  }

  private blobPath(hash: string): string {
    if (!/^[0-9a-f]{64}$/.test(hash)) throw new Error(`not a blob hash: ${hash}`);
    return path.join(this.blobDir, hash);
  }
}
