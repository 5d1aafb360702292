import pino from 'pino';
import { mkdirSync, readdirSync, statSync, unlinkSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';

const KEEP_DAYS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;
const FILE_PREFIX = 'lectern.';

const LEVELS: readonly pino.Level[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export interface LogSettings {
  level: pino.Level;
  /** Where daily files go; null when logging is silenced. */
  dir: string | null;
  echoToStdout: boolean;
}

function resolveLevel(raw: string | undefined): pino.Level {
  const wanted = raw?.trim().toLowerCase();
  return LEVELS.find((level) => level === wanted) ?? 'info';
}

export function resolveLogSettings(env: NodeJS.ProcessEnv): LogSettings {
  const dataDir = env['LECTERN_DATA_DIR'] ?? join(homedir(), '.lectern');
  return {
    level: resolveLevel(env['LOG_LEVEL']),
    dir: env['NODE_ENV'] === 'test' ? null : join(dataDir, 'logs'),
    echoToStdout: env['NODE_ENV'] !== 'production',
  };
}

/** Deletes daily files older than the retention window; a file that cannot be removed is reported and kept. */
function pruneLogs(dir: string): void {
  const oldest = Date.now() - KEEP_DAYS * DAY_MS;
  for (const name of readdirSync(dir)) {
    if (!name.startsWith(FILE_PREFIX)) continue;
    const path = join(dir, name);
    try {
      if (statSync(path).mtimeMs < oldest) unlinkSync(path);
    } catch (err) {
      process.stderr.write(`could not prune ${path}: ${String(err)}\n`);
    }
  }
}

function openDailyFile(dir: string): pino.DestinationStream {
  const day = new Date().toISOString().slice(0, 10);
  // Unbuffered, so the last lines before a crash are on disk.
  return pino.destination({ dest: join(dir, `${FILE_PREFIX}${day}.log`), append: true, minLength: 0 });
}

function createRootLogger(settings: LogSettings): pino.Logger {
  if (settings.dir === null) return pino({ level: 'silent' });

  mkdirSync(settings.dir, { recursive: true });
  pruneLogs(settings.dir);

  const streams: pino.StreamEntry[] = [{ stream: openDailyFile(settings.dir), level: settings.level }];
  if (settings.echoToStdout) streams.push({ stream: process.stdout, level: settings.level });

  return pino(
    {
      level: settings.level,
      timestamp: pino.stdTimeFunctions.isoTime,
      base: { pid: process.pid },
      formatters: { level: (label) => ({ level: label.toUpperCase() }) },
    },
    pino.multistream(streams),
  );
}

const settings = resolveLogSettings(process.env);

export const logger = createRootLogger(settings);

if (settings.dir !== null) {
  logger.debug({ level: settings.level, dir: settings.dir }, 'logging to daily files');
}

export function createChildLogger(name: string): pino.Logger {
  return logger.child({ module: name });
}
