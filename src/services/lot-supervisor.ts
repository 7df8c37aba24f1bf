/**
 * Lot Supervisor
 *
 * Owns the running pipelines: for each lot a FrameSlot plus one capture task
 * and one detect task. Tasks are cancelled through their AbortController;
 * a task whose loop ends while its controller is still live counts as a
 * crash and is relaunched after `restartBackoffMs`. The watchdog relaunches
 * tasks that have gone quiet for longer than `stallTimeoutMs`.
 */

import { EventEmitter } from 'events';
import { detectorConfig, occupancyConfig, pipelineConfig, storageConfig } from '@/config';
import { Lot, LotPaths, PipelineConfig, PipelineStatus, TaskStatus, WorkerRole } from '@/types';
import { errorMessage, sleep } from '@/utils';
import { LotStartupError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { CaptureWorker } from './capture-worker';
import { DetectWorker } from './detect-worker';
import { HttpDetector } from './detector';
import { FrameSlot } from './frame-slot';
import { resolveSourceKind } from './frame-source';
import { ensureLotDirectories, getLotPaths } from './lot-paths';
import { lotRepository } from './lot-repository';
import { PipelineWorker } from './pipeline-worker';
import { Renderer } from './renderer';
import { resultStore } from './result-store';
import { ensureStallConfig } from './stall-config';

export interface PipelineContext {
  lotId: number;
  paths: LotPaths;
  slot: FrameSlot;
}

export interface PipelineFactory {
  createCapture(ctx: PipelineContext): PipelineWorker;
  createDetect(ctx: PipelineContext): PipelineWorker;
}

export type SupervisorOptions = Pick<
  PipelineConfig,
  'settleDelayMs' | 'restartBackoffMs' | 'stallTimeoutMs' | 'watchdogIntervalMs'
> & { dataRoot: string };

export interface LotSupervisorDeps {
  lots: { getById(lotId: number): Promise<Lot | null> };
  factory: PipelineFactory;
  options: SupervisorOptions;
}

export interface StartAllResult {
  started: number[];
  skipped: number[];
  failed: { lotId: number; error: string }[];
}

interface TaskHandle {
  role: WorkerRole;
  worker: PipelineWorker;
  controller: AbortController;
  launchedAt: Date;
  restarts: number;
  running: boolean;
}

interface Pipeline {
  ctx: PipelineContext;
  controller: AbortController;
  startedAt: Date;
  capture: TaskHandle;
  detect: TaskHandle | null;
}

export class LotSupervisor extends EventEmitter {
  private readonly pipelines = new Map<number, Pipeline>();
  private readonly pending = new Map<number, Promise<boolean>>();
  private readonly cancelled = new Set<number>();
  private watchdog: NodeJS.Timeout | null = null;

  constructor(private readonly deps: LotSupervisorDeps) {
    super();
  }

  isRunning(lotId: number): boolean {
    return this.pipelines.has(lotId) || this.pending.has(lotId);
  }

  /**
   * Start the lot's pipeline. Resolves `false` when it is already running or
   * starting, rejects with LotStartupError when the lot cannot be started.
   * A start that follows a stop of a still-pending start runs once the
   * cancelled one has settled.
   */
  async start(lotId: number): Promise<boolean> {
    if (this.pipelines.has(lotId)) {
      logger.warn('Pipeline already running', { lotId });
      return false;
    }
    const inFlight = this.pending.get(lotId);
    if (inFlight) {
      if (this.cancelled.has(lotId)) {
        // A stop arrived after this start began; the latest request wins
        logger.info('Pipeline start queued behind a cancelled start', { lotId });
        return inFlight.catch(() => false).then(() => this.start(lotId));
      }
      return inFlight.then(() => false);
    }

    this.cancelled.delete(lotId);
    const launching = this.launch(lotId);
    this.pending.set(lotId, launching);
    try {
      return await launching;
    } finally {
      this.pending.delete(lotId);
      this.cancelled.delete(lotId);
    }
  }

  private async launch(lotId: number): Promise<boolean> {
    const lot = await this.deps.lots.getById(lotId);
    if (!lot) {
      throw new LotStartupError(lotId, 'lot is not registered');
    }

    try {
      resolveSourceKind(lot.streamSource);
    } catch (error) {
      throw new LotStartupError(lotId, errorMessage(error));
    }

    const paths = getLotPaths(lotId, this.deps.options.dataRoot);
    await ensureLotDirectories(paths);
    await ensureStallConfig(paths.configPath);

    if (this.cancelled.has(lotId)) {
      logger.info('Pipeline start cancelled', { lotId });
      return false;
    }

    const ctx: PipelineContext = { lotId, paths, slot: new FrameSlot(paths.latestFramePath) };
    const pipeline: Pipeline = {
      ctx,
      controller: new AbortController(),
      startedAt: new Date(),
      capture: this.launchTask(ctx, 'capture', 0),
      detect: null,
    };
    this.pipelines.set(lotId, pipeline);

    // Give capture a chance to publish a first frame before detect polls
    await sleep(this.deps.options.settleDelayMs, pipeline.controller.signal);
    if (this.pipelines.get(lotId) !== pipeline) {
      return false;
    }

    pipeline.detect = this.launchTask(ctx, 'detect', 0);

    logger.info('Pipeline started', { lotId, name: lot.name, source: lot.streamSource });
    this.emit('started', lotId);
    return true;
  }

  private launchTask(ctx: PipelineContext, role: WorkerRole, restarts: number): TaskHandle {
    const worker = role === 'capture' ? this.deps.factory.createCapture(ctx) : this.deps.factory.createDetect(ctx);
    const handle: TaskHandle = {
      role,
      worker,
      controller: new AbortController(),
      launchedAt: new Date(),
      restarts,
      running: true,
    };

    worker
      .run(handle.controller.signal)
      .then(
        () => this.handleExit(ctx.lotId, handle, undefined),
        (error: unknown) => this.handleExit(ctx.lotId, handle, error)
      )
      .catch(error => {
        logger.error('Pipeline task relaunch failed', { lotId: ctx.lotId, role, error: errorMessage(error) });
      });

    return handle;
  }

  private async handleExit(lotId: number, handle: TaskHandle, reason: unknown): Promise<void> {
    handle.running = false;
    if (handle.controller.signal.aborted) return;

    logger.error('Pipeline task exited unexpectedly, relaunching', {
      lotId,
      role: handle.role,
      restarts: handle.restarts,
      error: reason === undefined ? undefined : errorMessage(reason),
    });
    this.emit('crashed', lotId, handle.role);

    const pipeline = this.pipelines.get(lotId);
    if (!pipeline) return;
    await sleep(this.deps.options.restartBackoffMs, pipeline.controller.signal);
    this.relaunch(lotId, pipeline, handle);
  }

  // Replaces `handle` with a fresh task, unless the pipeline or role moved on meanwhile
  private relaunch(lotId: number, pipeline: Pipeline, handle: TaskHandle): boolean {
    if (this.pipelines.get(lotId) !== pipeline || pipeline[handle.role] !== handle) {
      return false;
    }
    handle.controller.abort();
    pipeline[handle.role] = this.launchTask(pipeline.ctx, handle.role, handle.restarts + 1);
    this.emit('restarted', lotId, handle.role);
    return true;
  }

  /**
   * Stop the lot's pipeline. Tasks are aborted without waiting for in-flight
   * work; folders and history are left alone.
   */
  stop(lotId: number): boolean {
    if (this.pending.has(lotId)) {
      this.cancelled.add(lotId);
      logger.info('Pipeline stop requested during start', { lotId });
    }

    const pipeline = this.pipelines.get(lotId);
    if (!pipeline) {
      return false;
    }

    this.pipelines.delete(lotId);
    pipeline.controller.abort();
    pipeline.capture.controller.abort();
    pipeline.detect?.controller.abort();

    logger.info('Pipeline stopped', { lotId });
    this.emit('stopped', lotId);
    return true;
  }

  async startAll(lotIds: number[]): Promise<StartAllResult> {
    const result: StartAllResult = { started: [], skipped: [], failed: [] };
    const outcomes = await Promise.allSettled(lotIds.map(lotId => this.start(lotId)));

    outcomes.forEach((outcome, index) => {
      const lotId = lotIds[index];
      if (outcome.status === 'rejected') {
        result.failed.push({ lotId, error: errorMessage(outcome.reason) });
        logger.error('Failed to start lot pipeline', { lotId, error: errorMessage(outcome.reason) });
      } else if (outcome.value) {
        result.started.push(lotId);
      } else {
        result.skipped.push(lotId);
      }
    });

    logger.info('Lot pipelines started', {
      started: result.started.length,
      skipped: result.skipped.length,
      failed: result.failed.length,
    });
    return result;
  }

  stopAll(): number {
    let stopped = 0;
    for (const lotId of [...this.pipelines.keys()]) {
      if (this.stop(lotId)) stopped++;
    }
    for (const lotId of this.pending.keys()) {
      this.cancelled.add(lotId);
    }
    return stopped;
  }

  /**
   * Relaunch every task whose last loop iteration (or launch, if it has not
   * finished one) is older than `stallTimeoutMs`. Returns the relaunched tasks.
   */
  checkStalled(now: Date = new Date()): { lotId: number; role: WorkerRole }[] {
    const relaunched: { lotId: number; role: WorkerRole }[] = [];

    for (const [lotId, pipeline] of this.pipelines) {
      for (const handle of [pipeline.capture, pipeline.detect]) {
        if (!handle || !handle.running) continue;

        const lastSeen = handle.worker.lastActivityAt() ?? handle.launchedAt;
        const idleMs = now.getTime() - lastSeen.getTime();
        if (idleMs <= this.deps.options.stallTimeoutMs) continue;

        logger.warn('Pipeline task stalled, relaunching', { lotId, role: handle.role, idleMs });
        if (this.relaunch(lotId, pipeline, handle)) {
          relaunched.push({ lotId, role: handle.role });
        }
      }
    }

    return relaunched;
  }

  startWatchdog(): void {
    if (this.watchdog) return;
    this.watchdog = setInterval(() => this.checkStalled(), this.deps.options.watchdogIntervalMs);
    this.watchdog.unref();
    logger.info('Pipeline watchdog started', { intervalMs: this.deps.options.watchdogIntervalMs });
  }

  stopWatchdog(): void {
    if (!this.watchdog) return;
    clearInterval(this.watchdog);
    this.watchdog = null;
  }

  status(): PipelineStatus[] {
    const taskStatus = (handle: TaskHandle): TaskStatus => ({
      role: handle.role,
      running: handle.running,
      restarts: handle.restarts,
      lastActivityAt: handle.worker.lastActivityAt()?.toISOString() ?? null,
    });

    return [...this.pipelines.entries()]
      .sort(([a], [b]) => a - b)
      .map(([lotId, pipeline]) => ({
        lotId,
        startedAt: pipeline.startedAt.toISOString(),
        capture: taskStatus(pipeline.capture),
        detect: pipeline.detect ? taskStatus(pipeline.detect) : null,
      }));
  }
}

export const defaultPipelineFactory = (): PipelineFactory => {
  const detector = new HttpDetector(detectorConfig);
  const renderer = new Renderer();

  return {
    createCapture: ({ lotId, slot }) =>
      new CaptureWorker({
        lotId,
        slot,
        readLot: id => lotRepository.getById(id),
        timings: pipelineConfig,
      }),
    createDetect: ({ lotId, paths, slot }) =>
      new DetectWorker({
        lotId,
        paths,
        slot,
        detector,
        renderer,
        store: resultStore,
        occupancy: occupancyConfig,
        confidence: detectorConfig.confidence,
        retentionKeep: storageConfig.retentionKeep,
        timings: pipelineConfig,
      }),
  };
};

// Export singleton instance
export const lotSupervisor = new LotSupervisor({
  lots: lotRepository,
  factory: defaultPipelineFactory(),
  options: { ...pipelineConfig, dataRoot: storageConfig.dataRoot },
});
