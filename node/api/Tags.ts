import { TagInfo } from '../core/types';
import { BlobService } from '../services/BlobService';

const utf8 = new TextEncoder();

export class Tags {
  constructor(private service: BlobService) {}

  list(): Promise<TagInfo[]> {
    return this.service.listTags();
  }

  delete(name: Uint8Array | string): Promise<void> {
    return this.service.deleteTag(typeof name === 'string' ? utf8.encode(name) : name);
  }
}
