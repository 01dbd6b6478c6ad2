import fs from 'fs/promises';
import path from 'path';
import { FilesystemError, describeError } from '../errors.js';

/**
 * Resolve a remote child's local path. Names that would escape the parent
 * directory are rejected.
 */
export function childPath(dir: string, name: string): string {
  if (name === '' || name === '.' || name === '..' || /[/\\\0]/.test(name)) {
    throw new FilesystemError(path.join(dir, name), `Refusing to write unsafe item name "${name}"`);
  }
  return path.join(dir, name);
}

/**
 * mkdir -p. An existing directory is not an error.
 */
export async function ensureDirectory(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (error) {
    throw new FilesystemError(dir, `Could not create directory ${dir}: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Create or truncate `filePath` and write `data` in full
 */
export async function writeFileContent(filePath: string, data: Buffer): Promise<void> {
  try {
    await fs.writeFile(filePath, data);
  } catch (error) {
    throw new FilesystemError(filePath, `Could not write ${filePath}: ${describeError(error)}`, { cause: error });
  }
}
