import { Request, Response } from 'express';
import { lotService } from '@/services/lot-service';
import { asyncHandler } from '@/utils';
import { createLotSchema, lotIdParams, updateLotSchema } from '@/utils/validation';

export const listLots = asyncHandler(async (req: Request, res: Response): Promise<void> => {
  const lots = await lotService.listLots();
  res.json({
    data: lots,
    meta: { total: lots.length }
  });
});

export const getLot = asyncHandler(async (req: Request, res: Response): Promise<void> => {
  const { lotId } = lotIdParams.parse(req.params);
  const lot = await lotService.getLot(lotId);
  res.json({ data: lot });
});

export const createLot = asyncHandler(async (req: Request, res: Response): Promise<void> => {
  const input = createLotSchema.parse(req.body);
  const result = await lotService.createLot(input);

  res.status(201).json({
    data: result.lot,
    meta: {
      pipeline: result.pipeline,
      ...(result.error ? { pipelineError: result.error } : {})
    }
  });
});

export const updateLot = asyncHandler(async (req: Request, res: Response): Promise<void> => {
  const { lotId } = lotIdParams.parse(req.params);
  const patch = updateLotSchema.parse(req.body);
  const result = await lotService.updateLot(lotId, patch);

  res.json({
    data: result.lot,
    meta: {
      pipeline: result.pipeline,
      ...(result.error ? { pipelineError: result.error } : {})
    }
  });
});

export const deleteLot = asyncHandler(async (req: Request, res: Response): Promise<void> => {
  const { lotId } = lotIdParams.parse(req.params);
  await lotService.deleteLot(lotId);
  res.status(204).end();
});

export const getStalls = asyncHandler(async (req: Request, res: Response): Promise<void> => {
  const { lotId } = lotIdParams.parse(req.params);
  const stalls = await lotService.getStallConfig(lotId);
  res.json({
    data: { stalls },
    meta: { total: stalls.length }
  });
});

export const replaceStalls = asyncHandler(async (req: Request, res: Response): Promise<void> => {
  const { lotId } = lotIdParams.parse(req.params);
  const stalls = await lotService.replaceStallConfig(lotId, req.body);
  res.json({
    data: { stalls },
    meta: { total: stalls.length }
  });
});
