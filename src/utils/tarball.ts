import * as tar from 'tar';
import { createHash } from 'crypto';
import { basename, dirname } from 'path';
import type { Logger } from '../types/index.js';
import { FileSystemError } from './errors.js';
import { readBytes, remove } from './fs.js';

/**
 * Tarball utilities for packaging a written build directory
 */

export interface ArchiveInfo {
  path: string;
  size: number;
  checksum: string;
}

/**
 * Create a gzipped tarball of `buildDir`, entries prefixed with the directory's own name.
 */
export async function createDistArchive(buildDir: string, archivePath: string, logger: Logger): Promise<ArchiveInfo> {
  logger.debug(`Creating archive ${archivePath} from ${buildDir}`);

  try {
    await remove(archivePath);
    await tar.create(
      {
        gzip: true,
        file: archivePath,
        cwd: dirname(buildDir),
        portable: true
      },
      [basename(buildDir)]
    );

    const buffer = await readBytes(archivePath);
    const checksum = createHash('sha256').update(buffer).digest('hex');

    logger.debug(`Archive created: ${buffer.length} bytes, checksum: ${checksum}`);

    return {
      path: archivePath,
      size: buffer.length,
      checksum
    };
  } catch (error) {
    logger.error('Failed to create archive', { error: String(error), archivePath });
    throw new FileSystemError(`Failed to create archive: ${error}`, { archivePath });
  }
}

/**
 * Entry paths inside an archive, in archive order.
 */
export async function listArchiveEntries(archivePath: string): Promise<string[]> {
  const entries: string[] = [];
  await tar.list({
    file: archivePath,
    onReadEntry: entry => {
      entries.push(entry.path);
    }
  });
  return entries;
}
