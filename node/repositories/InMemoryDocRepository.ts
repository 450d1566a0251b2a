import { IDocRepository, StoredEntry } from '../core/types';

export class InMemoryDocRepository implements IDocRepository {
  private namespaces = new Map<string, Map<string, StoredEntry>>();
  private authors = new Map<string, Uint8Array>();
  private defaultAuthor: string | undefined;

  async createNamespace(namespace: string): Promise<void> {
    if (!this.namespaces.has(namespace)) this.namespaces.set(namespace, new Map());
  }

  async hasNamespace(namespace: string): Promise<boolean> {
    return this.namespaces.has(namespace);
  }

  async listNamespaces(): Promise<string[]> {
    return [...this.namespaces.keys()].sort();
  }

  async entries(namespace: string): Promise<StoredEntry[]> {
    return [...(this.namespaces.get(namespace)?.values() ?? [])].map(e => ({ ...e }));
  }

  async putEntry(entry: StoredEntry): Promise<void> {
    let entries = this.namespaces.get(entry.namespace);
    if (!entries) {
      entries = new Map();
      this.namespaces.set(entry.namespace, entries);
    }
    entries.set(`${entry.author}/${entry.key}`, { ...entry });
  }

  async getAuthors(): Promise<string[]> {
    return [...this.authors.keys()].sort();
  }

  async putAuthor(author: string, seed: Uint8Array): Promise<void> {
    this.authors.set(author, seed.slice());
  }

  async getAuthorSeed(author: string): Promise<Uint8Array | undefined> {
    return this.authors.get(author)?.slice();
  }

  async getDefaultAuthor(): Promise<string | undefined> {
    return this.defaultAuthor;
  }

  async setDefaultAuthor(author: string): Promise<void> {
    this.defaultAuthor = author;
  }
}
