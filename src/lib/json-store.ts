import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

const TRANSIENT_PARSE_RETRIES = 3;
const TRANSIENT_PARSE_RETRY_DELAY_MS = 15;

const pathLocks = new Map<string, Promise<void>>();
let tmpCounter = 0;

function isErrnoCode(error: unknown, code: string): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === code
  );
}

export function isMissingFileError(error: unknown): boolean {
  return isErrnoCode(error, 'ENOENT');
}

/**
 * Serializes async work per absolute file path. Work on different paths runs
 * concurrently; work on the same path runs in call order.
 */
export async function withPathLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  const lockKey = path.resolve(filePath);
  const previous = pathLocks.get(lockKey) ?? Promise.resolve();
  const run = previous.then(fn, fn);
  const settled = run.then(
    () => undefined,
    () => undefined
  );
  pathLocks.set(lockKey, settled);

  try {
    return await run;
  } finally {
    if (pathLocks.get(lockKey) === settled) {
      pathLocks.delete(lockKey);
    }
  }
}

export async function readJsonFile<T>(filePath: string, defaultValue: T): Promise<T> {
  for (let attempt = 0; attempt <= TRANSIENT_PARSE_RETRIES; attempt += 1) {
    try {
      const content = await readFile(filePath, 'utf8');

      if (content.trim().length === 0 && attempt < TRANSIENT_PARSE_RETRIES) {
        await new Promise((resolve) => setTimeout(resolve, TRANSIENT_PARSE_RETRY_DELAY_MS));
        continue;
      }

      return JSON.parse(content) as T;
    } catch (error) {
      if (isMissingFileError(error)) {
        return defaultValue;
      }

      if (
        error instanceof SyntaxError &&
        error.message.includes('Unexpected end of JSON input') &&
        attempt < TRANSIENT_PARSE_RETRIES
      ) {
        await new Promise((resolve) => setTimeout(resolve, TRANSIENT_PARSE_RETRY_DELAY_MS));
        continue;
      }

      throw error;
    }
  }

  return defaultValue;
}

export async function writeJsonFile<T>(filePath: string, value: T): Promise<number> {
  await mkdir(path.dirname(filePath), { recursive: true });

  tmpCounter += 1;
  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.${tmpCounter}.tmp`;
  const content = JSON.stringify(value, null, 2);
  try {
    await writeFile(tmpPath, content, 'utf8');
    await rename(tmpPath, filePath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }

  return Buffer.byteLength(content, 'utf8');
}

export async function removeJsonFile(filePath: string): Promise<boolean> {
  try {
    await rm(filePath);
    return true;
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw error;
  }
}

export async function updateJsonFile<T>(
  filePath: string,
  defaultValue: T,
  mutator: (current: T) => T
): Promise<T> {
  return withPathLock(filePath, async () => {
    const current = await readJsonFile(filePath, defaultValue);
    const next = mutator(current);
    await writeJsonFile(filePath, next);
    return next;
  });
}
