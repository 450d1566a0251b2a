import { DocService } from '../services/DocService';

export class Authors {
  constructor(private service: DocService) {}

  default(): Promise<string> {
    return this.service.defaultAuthor();
  }

  create(): Promise<string> {
    return this.service.createAuthor();
  }

  list(): Promise<string[]> {
    return this.service.listAuthors();
  }
}
