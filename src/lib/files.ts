import { readdir, unlink } from 'node:fs/promises';
import path from 'node:path';

/**
 * Removes the regular files directly inside `dir`. A missing directory counts
 * as empty.
 */
export async function removeFiles(dir: string): Promise<number> {
  const entries = await readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
    if (isMissing(error)) {
      return null;
    }
    throw error;
  });
  if (!entries) {
    return 0;
  }

  let removed = 0;
  for (const entry of entries) {
    if (entry.isFile()) {
      await unlink(path.join(dir, entry.name));
      removed += 1;
    }
  }
  return removed;
}

export function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
