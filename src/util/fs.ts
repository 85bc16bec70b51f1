import { readFile, access } from 'node:fs/promises';
import { constants } from 'node:fs';

/**
 * Read a JSON file and parse it.
 */
export async function readJSON(filePath: string): Promise<unknown> {
  const content = await readFile(filePath, 'utf-8');
  return JSON.parse(content);
}

/**
 * Check if a file or directory exists.
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}
