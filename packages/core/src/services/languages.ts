import type { LanguageCatalog, Translation } from '@lectern/types';

export class StaticLanguageCatalog implements LanguageCatalog {
  private translations: readonly Translation[];

  constructor(translations: readonly Translation[]) {
    this.translations = translations.map((t) => ({ ...t }));
  }

  listInstalledTranslations(): Translation[] {
    return this.translations.map((t) => ({ ...t }));
  }
}
