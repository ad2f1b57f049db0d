import { existsSync, mkdirSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

/**
 * Write `content` to `<path>.tmp` in the target directory, then rename it
 * over `path`. Readers see the old or the new file, never a partial one.
 * The temp file is removed before the error is rethrown.
 */
export function atomicWriteFileSync(path: string, content: string): void {
  const tmpPath = `${path}.tmp`;

  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(tmpPath, content, 'utf-8');
    renameSync(tmpPath, path);
  } catch (error) {
    if (existsSync(tmpPath)) {
      rmSync(tmpPath, { force: true });
    }
    throw error;
  }
}
