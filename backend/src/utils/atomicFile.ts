import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';

/**
 * Read a text document, returning null when it does not exist.
 */
export async function readTextIfExists(pathname: string): Promise<string | null> {
  try {
    return await readFile(pathname, 'utf8');
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

/**
 * Replace a document in one step: write a temp file beside it, then rename.
 * A reader never observes a half-written document.
 */
export async function writeTextAtomic(pathname: string, contents: string): Promise<void> {
  await mkdir(dirname(pathname), { recursive: true });
  const tmp = `${pathname}.tmp.${process.pid}`;
  try {
    await writeFile(tmp, contents, { encoding: 'utf8', mode: 0o600 });
    await rename(tmp, pathname);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
