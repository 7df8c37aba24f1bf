import { storageConfig } from '@/config';
import { CreateLotInput, Lot, Stall, UpdateLotInput } from '@/types';
import { LotNotFoundError, LotStartupError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { getLotPaths, removeLotDirectories } from './lot-paths';
import { LotRepository, lotRepository } from './lot-repository';
import { LotSupervisor, lotSupervisor } from './lot-supervisor';
import { ResultStore, resultStore } from './result-store';
import { loadStallConfig, saveStallConfig } from './stall-config';

export interface LotPipelineResult {
  lot: Lot;
  pipeline: 'started' | 'running' | 'failed';
  error?: string;
}

export interface LotServiceDeps {
  lots: Pick<LotRepository, 'list' | 'getById' | 'create' | 'update' | 'delete'>;
  supervisor: Pick<LotSupervisor, 'start' | 'stop' | 'isRunning'>;
  store: Pick<ResultStore, 'purgeLot'>;
  dataRoot: string;
}

/**
 * Lot administration: keeps the registry, the running pipeline, the lot's
 * folders and its detection history consistent with each other.
 */
export class LotService {
  constructor(private readonly deps: LotServiceDeps) {}

  listLots(): Promise<Lot[]> {
    return this.deps.lots.list();
  }

  async getLot(lotId: number): Promise<Lot> {
    const lot = await this.deps.lots.getById(lotId);
    if (!lot) throw new LotNotFoundError(lotId);
    return lot;
  }

  private async startPipeline(lot: Lot): Promise<LotPipelineResult> {
    try {
      await this.deps.supervisor.start(lot.id);
      return { lot, pipeline: 'started' };
    } catch (error) {
      if (!(error instanceof LotStartupError)) throw error;
      logger.warn('Lot pipeline failed to start', { lotId: lot.id, error: error.message });
      return { lot, pipeline: 'failed', error: error.message };
    }
  }

  /**
   * Registers the lot and starts its pipeline. The lot stays registered when
   * the pipeline cannot start; the failure is reported alongside it.
   */
  async createLot(input: CreateLotInput): Promise<LotPipelineResult> {
    const lot = await this.deps.lots.create(input);
    logger.info('Lot created', { lotId: lot.id, name: lot.name });
    return this.startPipeline(lot);
  }

  /**
   * Source and flip changes reach a running capture task on its next cycle.
   * A lot without a running pipeline (its last start failed) is started again.
   */
  async updateLot(lotId: number, patch: UpdateLotInput): Promise<LotPipelineResult> {
    const lot = await this.deps.lots.update(lotId, patch);
    if (!lot) throw new LotNotFoundError(lotId);
    logger.info('Lot updated', { lotId, fields: Object.keys(patch) });

    if (this.deps.supervisor.isRunning(lotId)) {
      return { lot, pipeline: 'running' };
    }
    return this.startPipeline(lot);
  }

  async deleteLot(lotId: number): Promise<void> {
    await this.getLot(lotId);

    this.deps.supervisor.stop(lotId);
    await removeLotDirectories(getLotPaths(lotId, this.deps.dataRoot));
    const purged = await this.deps.store.purgeLot(lotId);
    await this.deps.lots.delete(lotId);

    logger.info('Lot deleted', { lotId, purgedRecords: purged });
  }

  async getStallConfig(lotId: number): Promise<Stall[]> {
    await this.getLot(lotId);
    return loadStallConfig(getLotPaths(lotId, this.deps.dataRoot).configPath);
  }

  async replaceStallConfig(lotId: number, document: unknown): Promise<Stall[]> {
    await this.getLot(lotId);
    return saveStallConfig(getLotPaths(lotId, this.deps.dataRoot).configPath, document);
  }
}

export const lotService = new LotService({
  lots: lotRepository,
  supervisor: lotSupervisor,
  store: resultStore,
  dataRoot: storageConfig.dataRoot,
});
