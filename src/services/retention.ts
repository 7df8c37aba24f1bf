import { promises as fs } from 'fs';
import { join } from 'path';
import { storageConfig } from '@/config';
import { LotPaths } from '@/types';
import { logger } from '@/utils/logger';

export interface SweepResult {
  kept: string[];
  deleted: string[];
}

const isMissing = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export const removeFileIfPresent = async (filePath: string): Promise<boolean> => {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (error) {
    if (isMissing(error)) return false;
    throw error;
  }
};

/**
 * Keeps the `keep` most recently modified files in `folder` and deletes the
 * rest. Files that disappear mid-sweep and missing folders are not errors.
 */
export const sweepFolder = async (folder: string, keep: number = storageConfig.retentionKeep): Promise<SweepResult> => {
  let names: string[];
  try {
    const entries = await fs.readdir(folder, { withFileTypes: true });
    names = entries.filter(entry => entry.isFile()).map(entry => entry.name);
  } catch (error) {
    if (isMissing(error)) return { kept: [], deleted: [] };
    throw error;
  }

  const files: { path: string; name: string; mtimeMs: number }[] = [];
  for (const name of names) {
    const path = join(folder, name);
    try {
      const stats = await fs.stat(path);
      files.push({ path, name, mtimeMs: stats.mtimeMs });
    } catch (error) {
      if (!isMissing(error)) throw error;
    }
  }

  files.sort((a, b) => b.mtimeMs - a.mtimeMs || b.name.localeCompare(a.name));

  const limit = Math.max(0, keep);
  const kept = files.slice(0, limit).map(file => file.path);
  const deleted: string[] = [];

  for (const file of files.slice(limit)) {
    if (await removeFileIfPresent(file.path)) {
      deleted.push(file.path);
    }
  }

  if (deleted.length) {
    logger.debug('Retention sweep', { folder, kept: kept.length, deleted: deleted.length });
  }
  return { kept, deleted };
};

export const sweepLot = async (paths: LotPaths, keep: number = storageConfig.retentionKeep): Promise<number> => {
  let deleted = 0;
  for (const folder of [paths.framesDir, paths.overlaysDir, paths.mapsDir]) {
    deleted += (await sweepFolder(folder, keep)).deleted.length;
  }
  return deleted;
};
