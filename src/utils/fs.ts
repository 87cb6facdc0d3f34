import { promises as fs, constants as fsConstants } from 'fs';
import { dirname, basename, join } from 'path';
import { randomBytes } from 'crypto';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a path is a file
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Replace the content of a file through a temporary sibling file: write, fsync,
 * rename. The file keeps its permission bits. If anything fails the temporary
 * file is removed and the original file is left untouched.
 */
export async function writeTextFileAtomic(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  const tempPath = join(dirname(path), `.${basename(path)}.${randomBytes(6).toString('hex')}.tmp`);
  let handle: fs.FileHandle | undefined;
  try {
    const mode = (await isFile(path)) ? (await fs.stat(path)).mode & 0o7777 : undefined;
    handle = await fs.open(tempPath, 'w');
    if (mode !== undefined) {
      await handle.chmod(mode);
    }
    await handle.writeFile(content, encoding);
    await handle.sync();
    await handle.close();
    handle = undefined;
    await fs.rename(tempPath, path);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    if (handle) {
      await handle.close().catch((closeError: unknown) => {
        logger.debug(`Failed to close temporary file: ${tempPath}`, closeError);
      });
    }
    await fs.rm(tempPath, { force: true });
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Remove a file or directory recursively; missing paths are ignored
 */
export async function remove(path: string): Promise<void> {
  try {
    await fs.rm(path, { recursive: true, force: true });
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to remove: ${path}`, { path, error });
  }
}

/**
 * List files in a directory (non-recursive)
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && !isJunk(entry.name))
      .map(entry => entry.name)
      .sort();
  } catch (error) {
    throw new FileSystemError(`Failed to list files in directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * List directories in a directory (non-recursive)
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name)
      .sort();
  } catch (error) {
    throw new FileSystemError(`Failed to list directories in directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * Find a file in a directory by its stem, e.g. `README` matches `README.md`.
 */
export async function findFileByStem(
  dirPath: string,
  stem: string,
  options: { caseSensitive?: boolean } = {}
): Promise<string | null> {
  if (!(await isDirectory(dirPath))) {
    return null;
  }
  const caseSensitive = options.caseSensitive ?? true;
  const wanted = caseSensitive ? stem : stem.toLowerCase();
  for (const name of await listFiles(dirPath)) {
    const fileStem = name.includes('.') ? name.slice(0, name.indexOf('.')) : name;
    if ((caseSensitive ? fileStem : fileStem.toLowerCase()) === wanted) {
      return join(dirPath, name);
    }
  }
  return null;
}

/**
 * Read JSON file and parse it
 */
export async function readJsonFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  try {
    return JSON.parse(content) as unknown;
  } catch (error) {
    throw new FileSystemError(`Failed to parse JSON file: ${path}`, { path, error });
  }
}

/**
 * Write object to JSON file
 */
export async function writeJsonFile(path: string, data: unknown, indent: number = 2): Promise<void> {
  await writeTextFile(path, JSON.stringify(data, null, indent) + '\n');
}
