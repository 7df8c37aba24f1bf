import { Request, Response } from 'express';
import { promises as fs } from 'fs';
import { resolve } from 'path';
import { lotService } from '@/services/lot-service';
import { lotSupervisor } from '@/services/lot-supervisor';
import { resultStore } from '@/services/result-store';
import { StoredOccupancyRecord } from '@/types';
import { asyncHandler } from '@/utils';
import { logger } from '@/utils/logger';
import { historyQuery, lotIdParams } from '@/utils/validation';

export const getOccupancy = asyncHandler(async (req: Request, res: Response): Promise<void> => {
  const { lotId } = lotIdParams.parse(req.params);
  await lotService.getLot(lotId);

  const latest = await resultStore.latest(lotId);
  if (latest.status === 'no_data') {
    res.json({ data: { status: 'no_data', lotId } });
    return;
  }

  res.json({ data: { status: 'ok', ...latest.record } });
});

export const getHistory = asyncHandler(async (req: Request, res: Response): Promise<void> => {
  const { lotId } = lotIdParams.parse(req.params);
  const { limit } = historyQuery.parse(req.query);
  await lotService.getLot(lotId);

  const records = await resultStore.recent(lotId, limit);
  res.json({
    data: records,
    meta: { lotId, limit, count: records.length }
  });
});

const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};

// Renders are pruned by retention, so the newest record can outlive its file
const sendLatestImage = (pick: (record: StoredOccupancyRecord) => string | null) =>
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { lotId } = lotIdParams.parse(req.params);
    await lotService.getLot(lotId);

    const latest = await resultStore.latest(lotId);
    const imagePath = latest.status === 'ok' ? pick(latest.record) : null;

    if (!imagePath || !(await fileExists(imagePath))) {
      logger.debug('Latest image unavailable', { lotId, imagePath });
      res.status(404).json({
        error: {
          message: 'Image not found',
          code: 'IMAGE_NOT_FOUND'
        }
      });
      return;
    }

    res.setHeader('Cache-Control', 'no-cache');
    res.type('jpeg');
    res.sendFile(resolve(imagePath));
  });

export const getOverlayImage = sendLatestImage(record => record.overlayPath);

export const getMapImage = sendLatestImage(record => record.mapPath);

export const getPipelines = asyncHandler(async (req: Request, res: Response): Promise<void> => {
  const pipelines = lotSupervisor.status();
  res.json({
    data: pipelines,
    meta: { total: pipelines.length }
  });
});
