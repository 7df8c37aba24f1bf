import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import sharp from 'sharp';
import { DetectionBox, LotPaths, OccupancyConfig, OccupancyRecord, StoredOccupancyRecord } from '@/types';
import { DetectWorker, DetectWorkerDeps } from '../detect-worker';
import { FrameSlot } from '../frame-slot';
import { ensureLotDirectories, getLotPaths } from '../lot-paths';
import { saveStallConfig } from '../stall-config';

const occupancy: OccupancyConfig = {
  vehicleClasses: [2, 3, 5, 7],
  minBoxArea: 800,
  shrinkMargin: 0,
  footprintFraction: 1,
  overlapFraction: 0.3,
  smoothingWindow: 3,
  geometry: 'polygon',
};

const carInStallOne: DetectionBox = { x1: 10, y1: 10, x2: 90, y2: 90, classId: 2, confidence: 0.9 };

describe('DetectWorker', () => {
  let dir: string;
  let paths: LotPaths;
  let slot: FrameSlot;
  let frame: Buffer;
  let detect: jest.Mock<Promise<DetectionBox[]>, [Buffer, number]>;
  let write: jest.Mock<Promise<StoredOccupancyRecord>, [OccupancyRecord]>;
  let deps: DetectWorkerDeps;

  beforeAll(async () => {
    frame = await sharp({
      create: { width: 200, height: 100, channels: 3, background: { r: 90, g: 90, b: 90 } },
    }).jpeg().toBuffer();
  });

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'detect-'));
    paths = getLotPaths(1, dir);
    await ensureLotDirectories(paths);
    await saveStallConfig(paths.configPath, {
      stalls: [
        { id: 1, lane: 1, points: [[0, 0], [100, 0], [100, 100], [0, 100]] },
        { id: 2, lane: 1, points: [[100, 0], [200, 0], [200, 100], [100, 100]] },
      ],
    });
    slot = new FrameSlot(paths.latestFramePath);

    detect = jest.fn<Promise<DetectionBox[]>, [Buffer, number]>().mockResolvedValue([carInStallOne]);
    write = jest.fn(async (record: OccupancyRecord): Promise<StoredOccupancyRecord> => ({ ...record, id: 1 }));
    deps = {
      lotId: 1,
      paths,
      slot,
      detector: { detect },
      renderer: {
        renderOverlay: jest.fn(async () => join(paths.overlaysDir, 'overlay_1.jpg')),
        renderMap: jest.fn(async () => join(paths.mapsDir, 'map_1.jpg')),
      },
      store: { write },
      occupancy,
      confidence: 0.2,
      retentionKeep: 5,
      timings: { detectIntervalMs: 5, detectPollMs: 5 },
    };
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should stay idle until a frame is published', async () => {
    const worker = new DetectWorker(deps);

    expect(await worker.runCycle()).toEqual({ status: 'idle' });
    expect(detect).not.toHaveBeenCalled();
  });

  it('should detect, evaluate and store a new frame', async () => {
    const worker = new DetectWorker(deps);
    await slot.publish(frame);

    const outcome = await worker.runCycle();

    expect(outcome.status).toBe('processed');
    expect(detect).toHaveBeenCalledWith(frame, 0.2);
    expect(write).toHaveBeenCalledWith(expect.objectContaining({
      lotId: 1,
      stallStatus: { '1': true, '2': false },
      occupiedCount: 1,
      freeCount: 1,
      framePath: paths.latestFramePath,
      overlayPath: join(paths.overlaysDir, 'overlay_1.jpg'),
      mapPath: join(paths.mapsDir, 'map_1.jpg'),
    }));
  });

  it('should not process the same frame twice', async () => {
    const worker = new DetectWorker(deps);
    await slot.publish(frame);

    await worker.runCycle();
    expect(await worker.runCycle()).toEqual({ status: 'idle' });

    await slot.publish(frame);
    expect((await worker.runCycle()).status).toBe('processed');
    expect(detect).toHaveBeenCalledTimes(2);
  });

  it('should not store a result once stopped mid-cycle', async () => {
    const worker = new DetectWorker(deps);
    const controller = new AbortController();
    detect.mockImplementationOnce(async () => {
      controller.abort();
      return [carInStallOne];
    });
    await slot.publish(frame);

    expect(await worker.runCycle(controller.signal)).toEqual({ status: 'skipped', reason: 'stopped' });
    expect(write).not.toHaveBeenCalled();
  });

  it('should store smoothed rather than raw occupancy', async () => {
    const worker = new DetectWorker(deps);
    detect
      .mockResolvedValueOnce([carInStallOne])
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce([]);

    for (let i = 0; i < 3; i++) {
      await slot.publish(frame);
      await worker.runCycle();
    }

    expect(write.mock.calls.map(([record]) => record.stallStatus['1'])).toEqual([true, true, false]);
    expect(write.mock.calls.map(([record]) => record.occupiedCount)).toEqual([1, 1, 0]);
  });

  it('should skip frames that cannot be decoded', async () => {
    const worker = new DetectWorker(deps);
    await slot.publish(Buffer.from('not a jpeg'));

    expect(await worker.runCycle()).toEqual({ status: 'skipped', reason: 'undecodable frame' });
    expect(detect).not.toHaveBeenCalled();
    expect(write).not.toHaveBeenCalled();
  });

  it('should store an empty status for a lot without stalls', async () => {
    await saveStallConfig(paths.configPath, { stalls: [] });
    const worker = new DetectWorker(deps);
    await slot.publish(frame);

    await worker.runCycle();

    expect(write).toHaveBeenCalledWith(expect.objectContaining({ stallStatus: {}, occupiedCount: 0, freeCount: 0 }));
  });

  it('should prune old renders after each processed frame', async () => {
    for (let i = 0; i < 7; i++) {
      const filePath = join(paths.overlaysDir, `overlay_${i}.jpg`);
      await fs.writeFile(filePath, 'x');
      await fs.utimes(filePath, 1_700_000_000 + i, 1_700_000_000 + i);
    }
    const worker = new DetectWorker(deps);
    await slot.publish(frame);

    await worker.runCycle();

    expect((await fs.readdir(paths.overlaysDir)).sort()).toEqual([
      'overlay_2.jpg', 'overlay_3.jpg', 'overlay_4.jpg', 'overlay_5.jpg', 'overlay_6.jpg',
    ]);
  });

  it('should keep running after a failed cycle and stop when aborted', async () => {
    const controller = new AbortController();
    detect.mockImplementation(async () => {
      controller.abort();
      throw new Error('detector down');
    });
    const worker = new DetectWorker(deps);
    await slot.publish(frame);

    await expect(worker.run(controller.signal)).resolves.toBeUndefined();
    expect(detect).toHaveBeenCalledTimes(1);
    expect(write).not.toHaveBeenCalled();
    expect(worker.lastActivityAt()).toBeInstanceOf(Date);
  });

  it('should start a new worker with empty smoothing history', async () => {
    const first = new DetectWorker(deps);
    await slot.publish(frame);
    await first.runCycle();

    const second = new DetectWorker(deps);

    expect(first.smoother.depth('1')).toBe(1);
    expect(second.smoother.depth('1')).toBe(0);
  });
});
