import { mkdir, open, opendir } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { dirname } from 'path';

/**
 * Write UTF-8 text, creating parent directories first.
 * The file handle is closed on every path, including write failures.
 */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const handle = await open(filePath, 'w');
  try {
    await handle.writeFile(content, 'utf-8');
  } finally {
    await handle.close();
  }
}

/**
 * Probe a directory by opening and closing it
 */
export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    const dir = await opendir(dirPath);
    await dir.close();
    return true;
  } catch (error) {
    if (isMissingPath(error)) return false;
    throw error;
  }
}

/**
 * Probe a regular file by opening it read-only and closing it
 */
export async function fileExists(filePath: string): Promise<boolean> {
  let handle: FileHandle | undefined;
  try {
    handle = await open(filePath, 'r');
    return (await handle.stat()).isFile();
  } catch (error) {
    if (isMissingPath(error) || isDirectory(error)) return false;
    throw error;
  } finally {
    await handle?.close();
  }
}

function isMissingPath(error: unknown): boolean {
  const code = (error as NodeJS.ErrnoException).code;
  return code === 'ENOENT' || code === 'ENOTDIR';
}

function isDirectory(error: unknown): boolean {
  return (error as NodeJS.ErrnoException).code === 'EISDIR';
}
