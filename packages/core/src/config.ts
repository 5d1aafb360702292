import { homedir } from 'node:os';
import { join } from 'node:path';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import { createChildLogger } from './logger.js';

const log = createChildLogger('config');

const TranslationSchema = z.object({ code: z.string().min(1), name: z.string().min(1) });

const LecternConfigSchema = z.object({
  port: z.number().int().positive(),
  dataDir: z.string().min(1),
  /** Base URL of the end-user documentation, without the language segment. */
  docsRoot: z.string().url(),
  docsLang: z.string().min(1),
  /** Hard ceiling the server itself accepts for uploads, in bytes. */
  uploadLimitBytes: z.number().int().positive(),
  languages: z.array(TranslationSchema).min(1),
});

export type LecternConfig = z.infer<typeof LecternConfigSchema>;

const rawPort = process.env['PORT'];
const parsedPort = rawPort !== undefined ? Number(rawPort) : NaN;
const DEFAULT_CONFIG: LecternConfig = {
  port: Number.isInteger(parsedPort) && parsedPort > 0 ? parsedPort : 31416,
  dataDir: process.env['LECTERN_DATA_DIR'] ?? join(homedir(), '.lectern'),
  docsRoot: 'https://docs.example.com/editor',
  docsLang: 'en',
  uploadLimitBytes: 104_857_600,
  languages: [{ code: 'en', name: 'English (en)' }],
};

export function getDataDir(): string {
  const dir = DEFAULT_CONFIG.dataDir;
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  return dir;
}

export function getConfig(): LecternConfig {
  const configPath = join(getDataDir(), 'config.json');
  if (!existsSync(configPath)) return DEFAULT_CONFIG;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    log.warn({ err, configPath }, 'config.json is not valid JSON; using defaults');
    return DEFAULT_CONFIG;
  }

  const parsed = LecternConfigSchema.partial().safeParse(raw);
  if (!parsed.success) {
    log.warn({ configPath, issues: parsed.error.issues }, 'config.json failed validation; using defaults');
    return DEFAULT_CONFIG;
  }
  return { ...DEFAULT_CONFIG, ...parsed.data };
}

export function saveConfig(config: Partial<LecternConfig>): void {
  const configPath = join(getDataDir(), 'config.json');
  const merged = { ...getConfig(), ...config };
  writeFileSync(configPath, JSON.stringify(merged, null, 2));
}
