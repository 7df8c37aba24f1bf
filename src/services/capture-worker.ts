import { Lot, PipelineConfig } from '@/types';
import { errorMessage, sleep } from '@/utils';
import { FrameSourceError } from '@/utils/errors';
import { lotLogger } from '@/utils/logger';
import { FrameSlot } from './frame-slot';
import { createFrameSource, FrameSource, FrameSourceOptions, prepareFrame } from './frame-source';
import { PipelineWorker } from './pipeline-worker';

export type CaptureTimings = Pick<PipelineConfig, 'captureIntervalMs' | 'captureBackoffMs' | 'fetchTimeoutMs'>;

export interface CaptureWorkerDeps {
  lotId: number;
  slot: FrameSlot;
  /** Current settings for the lot, read fresh on every cycle. */
  readLot: (lotId: number) => Promise<Lot | null>;
  timings: CaptureTimings;
  createSource?: (descriptor: string, options: FrameSourceOptions) => FrameSource;
}

export class CaptureWorker implements PipelineWorker {
  readonly role = 'capture' as const;
  private source: FrameSource | null = null;
  private lastActivity: Date | null = null;
  private readonly log: ReturnType<typeof lotLogger>;
  private readonly createSource: (descriptor: string, options: FrameSourceOptions) => FrameSource;

  constructor(private readonly deps: CaptureWorkerDeps) {
    this.log = lotLogger(deps.lotId, 'capture');
    this.createSource = deps.createSource ?? createFrameSource;
  }

  lastActivityAt(): Date | null {
    return this.lastActivity;
  }

  // A changed descriptor swaps the source; an unchanged one keeps a stream open
  private async sourceFor(descriptor: string): Promise<FrameSource> {
    if (this.source && this.source.descriptor === descriptor.trim()) {
      return this.source;
    }
    if (this.source) {
      this.log.info('Stream source changed, reopening', { from: this.source.descriptor, to: descriptor });
      await this.source.close();
      this.source = null;
    }
    this.source = this.createSource(descriptor, { timeoutMs: this.deps.timings.fetchTimeoutMs });
    this.log.info('Frame source opened', { kind: this.source.kind, descriptor: this.source.descriptor });
    return this.source;
  }

  /**
   * One capture attempt. Returns false on failure so the loop backs off;
   * never throws.
   */
  async cycle(): Promise<boolean> {
    try {
      const lot = await this.deps.readLot(this.deps.lotId);
      if (!lot) {
        throw new FrameSourceError(`Lot ${this.deps.lotId} is no longer registered`);
      }

      const source = await this.sourceFor(lot.streamSource);
      const frame = await prepareFrame(await source.next(), lot.flip);
      const snapshot = await this.deps.slot.publish(frame);

      this.log.debug('Frame published', { version: snapshot.version, bytes: frame.length, flip: lot.flip });
      return true;
    } catch (error) {
      this.log.warn('Frame capture failed, backing off', { error: errorMessage(error) });
      return false;
    }
  }

  async run(signal: AbortSignal): Promise<void> {
    const { captureIntervalMs, captureBackoffMs } = this.deps.timings;
    this.log.info('Capture started', { intervalMs: captureIntervalMs });

    try {
      while (!signal.aborted) {
        const ok = await this.cycle();
        this.lastActivity = new Date();
        await sleep(ok ? captureIntervalMs : captureBackoffMs, signal);
      }
    } finally {
      if (this.source) {
        await this.source.close();
        this.source = null;
      }
      this.log.info('Capture stopped');
    }
  }
}
