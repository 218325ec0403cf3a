import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { AppConfig } from '../models/config.model';
import { normalizeConfig } from '../validators/config.validator';
import { PrinterPalError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ConfigStore {
  readonly path: string;
  /** Read from disk (writing defaults when the file is missing) */
  load(): Promise<AppConfig>;
  /** Last loaded or saved config */
  current(): AppConfig;
  /** Read-modify-write against the on-disk copy, serialized with other writes */
  update(mutate: (current: AppConfig) => unknown): Promise<AppConfig>;
}

async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${uuidv4()}.tmp`;
  try {
    await fs.writeFile(tmp, `${JSON.stringify(data, null, 2)}\n`, { encoding: 'utf-8', mode: 0o640 });
    await fs.rename(tmp, filePath);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
}

export function createConfigStore(filePath: string): ConfigStore {
  let cached: AppConfig | null = null;
  let queue: Promise<unknown> = Promise.resolve();

  /** Run writes one after another, whether or not the previous one failed */
  function serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = queue.then(task, task);
    queue = run.catch(() => undefined);
    return run;
  }

  async function readFromDisk(): Promise<AppConfig> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        const defaults = normalizeConfig({});
        await writeJsonAtomic(filePath, defaults);
        logger.info({ path: filePath }, 'Config file created with defaults');
        return defaults;
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new PrinterPalError(`Config file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    return normalizeConfig(data);
  }

  async function persist(input: unknown): Promise<AppConfig> {
    const normalized = normalizeConfig(input);
    await writeJsonAtomic(filePath, normalized);
    cached = normalized;
    logger.info({ path: filePath }, 'Config saved');
    return normalized;
  }

  return {
    path: filePath,

    load() {
      return serialize(async () => {
        cached = await readFromDisk();
        return cached;
      });
    },

    current() {
      if (!cached) {
        throw new PrinterPalError('Config not loaded');
      }
      return cached;
    },

    update(mutate) {
      return serialize(async () => persist(mutate(await readFromDisk())));
    },
  };
}
