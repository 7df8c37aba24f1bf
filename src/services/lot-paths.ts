import { promises as fs } from 'fs';
import { join, resolve } from 'path';
import { storageConfig } from '@/config';
import { LotPaths } from '@/types';
import { logger } from '@/utils/logger';

// <dataRoot>/lot<id>/{lot_config.json, frames/latest.jpg, overlays/, maps/}
export const getLotPaths = (lotId: number, dataRoot: string = storageConfig.dataRoot): LotPaths => {
  const root = resolve(dataRoot, `lot${lotId}`);
  const framesDir = join(root, 'frames');
  return {
    root,
    configPath: join(root, 'lot_config.json'),
    framesDir,
    overlaysDir: join(root, 'overlays'),
    mapsDir: join(root, 'maps'),
    latestFramePath: join(framesDir, 'latest.jpg'),
  };
};

export const ensureLotDirectories = async (paths: LotPaths): Promise<void> => {
  for (const dir of [paths.framesDir, paths.overlaysDir, paths.mapsDir]) {
    await fs.mkdir(dir, { recursive: true });
  }
};

export const removeLotDirectories = async (paths: LotPaths): Promise<void> => {
  await fs.rm(paths.root, { recursive: true, force: true });
  logger.info('Lot data removed', { root: paths.root });
};
