import { toHex } from '../../shared/ids';
import { IBlobRepository, TagInfo } from '../core/types';

export class InMemoryBlobRepository implements IBlobRepository {
  private blobs = new Map<string, Uint8Array>();
  private tags = new Map<string, TagInfo>();

  async put(hash: string, data: Uint8Array): Promise<void> {
    this.blobs.set(hash, data.slice());
  }

  async get(hash: string): Promise<Uint8Array | undefined> {
    return this.blobs.get(hash)?.slice();
  }

  async has(hash: string): Promise<boolean> {
    return this.blobs.has(hash);
  }

  async list(): Promise<string[]> {
    return [...this.blobs.keys()].sort();
  }

  async setTag(name: Uint8Array, hash: string): Promise<void> {
    this.tags.set(toHex(name), { name: name.slice(), hash });
  }

  async deleteTag(name: Uint8Array): Promise<void> {
    this.tags.delete(toHex(name));
  }

  async listTags(): Promise<TagInfo[]> {
    return [...this.tags.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([, tag]) => ({ name: tag.name.slice(), hash: tag.hash }));
  }
}
