import type { DocsLinker } from '@lectern/types';

export class ConfigDocsLinker implements DocsLinker {
  constructor(
    private docsRoot: string,
    private lang: string,
  ) {}

  getDocsUrl(path: string): string {
    const root = this.docsRoot.replace(/\/+$/, '');
    return `${root}/${this.lang}/${path.replace(/^\/+/, '')}`;
  }
}
