import { promises as fs } from 'fs';
import { join, dirname } from 'path';
import { randomUUID } from 'crypto';
import { logger } from '../core/logger';
import { config } from '../core/config';
import { StorageUnavailableError } from '../core/errors';
import { getDelayWithJitter, sleep } from './backoff';
import { incrementFsRetries } from './metrics';

// Generic retry wrapper with exponential backoff and jitter
export async function withFsRetry<T>(
  operation: () => Promise<T>,
  operationName: string,
  context: Record<string, unknown> = {}
): Promise<T> {
  const attempts = config.FS_RETRY_TIMES + 1;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      logger.warn({
        ...context,
        operationName,
        attempt,
        error,
      }, `${operationName} attempt failed`);

      if (attempt < attempts) {
        const delay = getDelayWithJitter(attempt, { baseMs: config.FS_RETRY_BASE_MS, jitterMs: config.FS_RETRY_BASE_MS });
        incrementFsRetries();
        await sleep(delay);
      }
    }
  }

  logger.error({ ...context, operationName, attempts }, `${operationName} failed after all retries`);
  const reason = lastError instanceof Error ? lastError.message : String(lastError);
  throw new StorageUnavailableError(
    `${operationName} failed after ${attempts} attempts: ${reason}`,
    { operationName, attempts, ...context },
    { cause: lastError }
  );
}

// JSON file read with retry; the caller validates the shape
export async function readJsonFile(filePath: string): Promise<unknown> {
  return withFsRetry(
    async () => {
      const data = await fs.readFile(filePath, 'utf8');
      const parsed: unknown = JSON.parse(data);
      return parsed;
    },
    'File read',
    { filePath }
  );
}

// Atomic JSON file write: temp file in the same directory, then rename
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  return withFsRetry(
    async () => {
      const jsonData = JSON.stringify(data, null, 2);
      const tempPath = join(dirname(filePath), `.${randomUUID()}.tmp`);

      try {
        await fs.writeFile(tempPath, jsonData, 'utf8');
        await fs.rename(tempPath, filePath);
        logger.debug({ filePath }, 'File written atomically');
      } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
      }
    },
    'Atomic file write',
    { filePath }
  );
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function ensureDir(dirPath: string): Promise<void> {
  return withFsRetry(
    async () => {
      await fs.mkdir(dirPath, { recursive: true });
    },
    'Directory creation',
    { dirPath }
  );
}
