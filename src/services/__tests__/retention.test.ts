import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { getLotPaths, ensureLotDirectories } from '../lot-paths';
import { removeFileIfPresent, sweepFolder, sweepLot } from '../retention';

const BASE_TIME = 1_700_000_000;

describe('retention', () => {
  let dir: string;

  const writeAt = async (name: string, secondsAfterBase: number, folder = dir): Promise<string> => {
    const filePath = join(folder, name);
    await fs.writeFile(filePath, name);
    await fs.utimes(filePath, BASE_TIME + secondsAfterBase, BASE_TIME + secondsAfterBase);
    return filePath;
  };

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'retention-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('sweepFolder', () => {
    it('should keep the newest files and delete the rest', async () => {
      for (let i = 0; i < 7; i++) {
        await writeAt(`overlay_${i}.jpg`, i);
      }

      const result = await sweepFolder(dir, 5);

      expect(result.deleted.sort()).toEqual([join(dir, 'overlay_0.jpg'), join(dir, 'overlay_1.jpg')]);
      expect((await fs.readdir(dir)).sort()).toEqual([
        'overlay_2.jpg', 'overlay_3.jpg', 'overlay_4.jpg', 'overlay_5.jpg', 'overlay_6.jpg',
      ]);
      expect(result.kept[0]).toBe(join(dir, 'overlay_6.jpg'));
    });

    it('should leave folders at or under the limit untouched', async () => {
      await writeAt('a.jpg', 0);
      await writeAt('b.jpg', 1);

      const result = await sweepFolder(dir, 5);

      expect(result.deleted).toEqual([]);
      expect(result.kept).toEqual([join(dir, 'b.jpg'), join(dir, 'a.jpg')]);
    });

    it('should break modification time ties by name', async () => {
      await writeAt('map_a.jpg', 3);
      await writeAt('map_b.jpg', 3);

      const result = await sweepFolder(dir, 1);

      expect(result.kept).toEqual([join(dir, 'map_b.jpg')]);
      expect(result.deleted).toEqual([join(dir, 'map_a.jpg')]);
    });

    it('should ignore sub-directories', async () => {
      await fs.mkdir(join(dir, 'nested'));
      await writeAt('a.jpg', 0);

      const result = await sweepFolder(dir, 0);

      expect(result.deleted).toEqual([join(dir, 'a.jpg')]);
      expect(await fs.readdir(dir)).toEqual(['nested']);
    });

    it('should treat a missing folder as empty', async () => {
      expect(await sweepFolder(join(dir, 'missing'), 5)).toEqual({ kept: [], deleted: [] });
    });
  });

  describe('removeFileIfPresent', () => {
    it('should report whether a file was removed', async () => {
      const filePath = await writeAt('frame.jpg', 0);

      expect(await removeFileIfPresent(filePath)).toBe(true);
      expect(await removeFileIfPresent(filePath)).toBe(false);
    });
  });

  describe('sweepLot', () => {
    it('should sweep frames, overlays and maps independently', async () => {
      const paths = getLotPaths(4, dir);
      await ensureLotDirectories(paths);
      for (let i = 0; i < 3; i++) {
        await writeAt(`frame_${i}.jpg`, i, paths.framesDir);
        await writeAt(`overlay_${i}.jpg`, i, paths.overlaysDir);
      }
      await writeAt('map_0.jpg', 0, paths.mapsDir);

      expect(await sweepLot(paths, 2)).toBe(2);
      expect(await fs.readdir(paths.mapsDir)).toEqual(['map_0.jpg']);
      expect((await fs.readdir(paths.overlaysDir)).sort()).toEqual(['overlay_1.jpg', 'overlay_2.jpg']);
    });
  });
});
