/**
 * Free-space probe backed by fs.statfs.
 */

import { statfs } from 'node:fs/promises';
import * as path from 'node:path';
import type { DiskSpaceGuard } from '../types/collaborators.js';

const BYTES_PER_GB = 1024 ** 3;

/**
 * Free space available to unprivileged users under `dir`, in GB.
 */
export async function freeSpaceGb(dir: string): Promise<number> {
  const stats = await statfs(path.resolve(dir));
  return (stats.bavail * stats.bsize) / BYTES_PER_GB;
}

/**
 * DiskSpaceGuard using the local filesystem. A threshold of 0 disables the
 * check. The directory must exist; a missing one is checked at its nearest
 * existing ancestor.
 */
export class StatfsDiskSpaceGuard implements DiskSpaceGuard {
  constructor(private readonly probe: (dir: string) => Promise<number> = freeSpaceGb) {}

  async freeSpaceBelow(thresholdGb: number, dir: string): Promise<boolean> {
    if (thresholdGb <= 0) {
      return false;
    }
    const free = await this.probeNearestExisting(path.resolve(dir));
    return free < thresholdGb;
  }

  private async probeNearestExisting(dir: string): Promise<number> {
    try {
      return await this.probe(dir);
    } catch (error) {
      const parent = path.dirname(dir);
      if (parent === dir || !isMissingPath(error)) {
        throw error;
      }
      return this.probeNearestExisting(parent);
    }
  }
}

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
