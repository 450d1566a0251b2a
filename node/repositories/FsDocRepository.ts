import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { IDocRepository, StoredEntry } from '../core/types';
import { WriteQueue } from '../core/WriteQueue';
import { readJsonFile, writeJsonFile } from './jsonFile';

const entrySchema = z.object({
  namespace: z.string(),
  author: z.string(),
  key: z.string(),
  hash: z.string(),
  size: z.number(),
  timestamp: z.number(),
  signature: z.string(),
});

const authorsSchema = z.object({
  default: z.string().optional(),
  authors: z.record(z.string()),
});

type AuthorsFile = z.infer<typeof authorsSchema>;

/**
 * One JSON file per namespace under `<root>/docs`, authors and their secret
 * seeds in `<root>/authors.json`.
 */
export class FsDocRepository implements IDocRepository {
  private readonly docDir: string;
  private readonly authorsFile: string;
  private readonly writes = new WriteQueue();

  constructor(root: string) {
    this.docDir = path.join(root, 'docs');
    this.authorsFile = path.join(root, 'authors.json');
  }

  async open(): Promise<this> {
    await fs.mkdir(this.docDir, { recursive: true });
    return this;
  }

  createNamespace(namespace: string): Promise<void> {
    return this.writes.run(async () => {
      if (await this.hasNamespace(namespace)) return;
      await writeJsonFile(this.docPath(namespace), []);
    });
  }

  async hasNamespace(namespace: string): Promise<boolean> {
    return (await this.listNamespaces()).includes(namespace);
  }

  async listNamespaces(): Promise<string[]> {
    const names = await fs.readdir(this.docDir);
    return names
      .filter(n => /^[0-9a-f]{64}\.json$/.test(n))
      .map(n => n.slice(0, -'.json'.length))
      .sort();
  }

  entries(namespace: string): Promise<StoredEntry[]> {
    return readJsonFile(this.docPath(namespace), z.array(entrySchema), []);
  }

  putEntry(entry: StoredEntry): Promise<void> {
    return this.writes.run(async () => {
      const entries = (await this.entries(entry.namespace)).filter(
        e => !(e.author === entry.author && e.key === entry.key)
      );
      entries.push(entry);
      await writeJsonFile(this.docPath(entry.namespace), entries);
    });
  }

  async getAuthors(): Promise<string[]> {
    return Object.keys((await this.readAuthors()).authors).sort();
  }

  putAuthor(author: string, seed: Uint8Array): Promise<void> {
    return this.writes.run(async () => {
      const file = await this.readAuthors();
      file.authors[author] = Buffer.from(seed).toString('hex');
      await writeJsonFile(this.authorsFile, file);
    });
  }

  async getAuthorSeed(author: string): Promise<Uint8Array | undefined> {
    const seed = (await this.readAuthors()).authors[author];
    return seed === undefined ? undefined : new Uint8Array(Buffer.from(seed, 'hex'));
  }

  async getDefaultAuthor(): Promise<string | undefined> {
    return (await this.readAuthors()).default;
  }

  setDefaultAuthor(author: string): Promise<void> {
    return this.writes.run(async () => {
      const file = await this.readAuthors();
      file.default = author;
      await writeJsonFile(this.authorsFile, file);
    });
  }

  private readAuthors(): Promise<AuthorsFile> {
    return readJsonFile(this.authorsFile, authorsSchema, { authors: {} });
  }

  private docPath(namespace: string): string {
    if (!/^[0-9a-f]{64}$/.test(namespace)) throw new Error(`not a namespace id: ${namespace}`);
    return path.join(this.docDir, `${namespace}.json`);
  }
}
