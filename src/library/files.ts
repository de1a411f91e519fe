import * as fs from 'fs/promises';
import type { Stats } from 'fs';

/**
 * Stat a path, returning undefined when it does not exist.
 */
export async function statOrUndefined(target: string): Promise<Stats | undefined> {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}
