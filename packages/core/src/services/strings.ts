import { z } from 'zod';
import type { StringResolver } from '@lectern/types';
import en from '../lang/en.json' with { type: 'json' };

type StringTable = Record<string, Record<string, string>>;

const EN_STRINGS: StringTable = z.record(z.string(), z.record(z.string(), z.string())).parse(en);

export class JsonStringResolver implements StringResolver {
  constructor(private table: StringTable = EN_STRINGS) {}

  getString(identifier: string, component: string): string {
    return this.table[component]?.[identifier] ?? `[[${identifier},${component}]]`;
  }
}
