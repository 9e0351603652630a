import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { ContactFinderError } from '../utils/errors.js';

/**
 * Write an export, creating parent directories. Any filesystem failure
 * becomes EXPORT_FAILURE; the store is not touched either way.
 */
export async function writeExport(path: string, content: string): Promise<string> {
  const target = resolve(path);
  try {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, 'utf-8');
    return target;
  } catch (error) {
    throw new ContactFinderError(
      'EXPORT_FAILURE',
      `Could not write ${target}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}
