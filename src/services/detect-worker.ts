import sharp from 'sharp';
import { LotPaths, OccupancyConfig, PipelineConfig, StoredOccupancyRecord } from '@/types';
import { errorMessage, sleep } from '@/utils';
import { lotLogger } from '@/utils/logger';
import { Detector } from './detector';
import { FrameSlot } from './frame-slot';
import { evaluateOccupancy } from './occupancy-engine';
import { PipelineWorker } from './pipeline-worker';
import { FrameSize, Renderer } from './renderer';
import { ResultStore } from './result-store';
import { sweepLot } from './retention';
import { loadStallConfig } from './stall-config';
import { TemporalSmoother } from './temporal-smoother';

export type DetectTimings = Pick<PipelineConfig, 'detectIntervalMs' | 'detectPollMs'>;

export interface DetectWorkerDeps {
  lotId: number;
  paths: LotPaths;
  slot: FrameSlot;
  detector: Detector;
  renderer: Pick<Renderer, 'renderOverlay' | 'renderMap'>;
  store: Pick<ResultStore, 'write'>;
  occupancy: OccupancyConfig;
  confidence: number;
  retentionKeep: number;
  timings: DetectTimings;
}

export type DetectCycleOutcome =
  | { status: 'idle' }
  | { status: 'skipped'; reason: string }
  | { status: 'processed'; record: StoredOccupancyRecord };

export const readFrameSize = async (frame: Buffer): Promise<FrameSize | null> => {
  try {
    const { width, height } = await sharp(frame).metadata();
    return width && height ? { width, height } : null;
  } catch {
    return null;
  }
};

/**
 * Per-lot detect loop. Consumes whatever frame is currently in the slot
 * (latest wins; intermediate frames may never be processed) and owns the
 * smoothing state, so a fresh worker always starts with empty history.
 */
export class DetectWorker implements PipelineWorker {
  readonly role = 'detect' as const;
  readonly smoother: TemporalSmoother;
  private lastVersion = 0;
  private lastActivity: Date | null = null;
  private readonly log: ReturnType<typeof lotLogger>;

  constructor(private readonly deps: DetectWorkerDeps) {
    this.smoother = new TemporalSmoother(deps.occupancy.smoothingWindow);
    this.log = lotLogger(deps.lotId, 'detect');
  }

  lastActivityAt(): Date | null {
    return this.lastActivity;
  }

  /**
   * One detect pass over the current slot frame. When `signal` aborts while
   * the pass is running, nothing is written to the store.
   */
  async runCycle(signal?: AbortSignal): Promise<DetectCycleOutcome> {
    const { lotId, paths, slot, detector, renderer, store } = this.deps;

    const snapshot = slot.current();
    if (!snapshot || snapshot.version === this.lastVersion) {
      return { status: 'idle' };
    }
    this.lastVersion = snapshot.version;

    const frame = await slot.read();
    const size = await readFrameSize(frame);
    if (!size) {
      this.log.warn('Skipping undecodable frame', { version: snapshot.version, bytes: frame.length });
      return { status: 'skipped', reason: 'undecodable frame' };
    }

    const stalls = await loadStallConfig(paths.configPath);
    const boxes = await detector.detect(frame, this.deps.confidence);
    const raw = evaluateOccupancy(stalls, boxes, this.deps.occupancy);
    const smoothed = this.smoother.apply(raw.status);

    const overlayPath = await renderer.renderOverlay(frame, size, stalls, smoothed, raw, paths.overlaysDir);
    const mapPath = await renderer.renderMap(stalls, smoothed, paths.mapsDir);

    if (signal?.aborted) {
      this.log.info('Detect stopped before the result was stored', { version: snapshot.version });
      return { status: 'skipped', reason: 'stopped' };
    }

    const occupiedCount = Object.values(smoothed).filter(Boolean).length;
    const record = await store.write({
      lotId,
      timestamp: new Date(),
      stallStatus: smoothed,
      occupiedCount,
      freeCount: stalls.length - occupiedCount,
      framePath: snapshot.path,
      overlayPath,
      mapPath,
    });

    await sweepLot(paths, this.deps.retentionKeep);

    this.log.info('Frame processed', {
      version: snapshot.version,
      boxes: boxes.length,
      candidates: raw.candidates.length,
      rawOccupied: raw.occupiedCount,
      occupied: occupiedCount,
      stalls: stalls.length,
      recordId: record.id,
    });

    return { status: 'processed', record };
  }

  async run(signal: AbortSignal): Promise<void> {
    const { detectIntervalMs, detectPollMs } = this.deps.timings;
    this.log.info('Detect started', { intervalMs: detectIntervalMs });

    while (!signal.aborted) {
      let wait = detectIntervalMs;
      try {
        const outcome = await this.runCycle(signal);
        if (outcome.status !== 'processed') wait = detectPollMs;
      } catch (error) {
        this.log.error('Detection cycle failed', { error: errorMessage(error) });
      }
      this.lastActivity = new Date();
      await sleep(wait, signal);
    }

    this.log.info('Detect stopped');
  }
}
