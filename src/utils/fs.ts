import { access, mkdir, readFile, readdir, rm, writeFile } from 'fs/promises';
import { constants } from 'fs';
import { dirname, join } from 'path';

/**
 * Thin async filesystem helpers shared by the build host
 */

export async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  return readFile(path, { encoding });
}

export async function readBytes(path: string): Promise<Buffer> {
  return readFile(path);
}

export async function writeBytes(path: string, bytes: Buffer): Promise<void> {
  await ensureDir(dirname(path));
  await writeFile(path, bytes);
}

export async function remove(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Yield every regular file below `dir`; `skip` is asked about each entry name
 * (files and directories) relative to `dir`.
 */
export async function* walkFiles(
  dir: string,
  skip: (relativePath: string, isDirectory: boolean) => boolean = () => false,
  base = ''
): AsyncGenerator<string> {
  const entries = await readdir(join(dir, base), { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const relativePath = base ? `${base}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      if (!skip(relativePath, true)) {
        yield* walkFiles(dir, skip, relativePath);
      }
    } else if (entry.isFile() && !skip(relativePath, false)) {
      yield relativePath;
    }
  }
}
