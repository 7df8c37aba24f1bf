import { z } from 'zod';
import { MAX_HISTORY_LIMIT } from '@/services/result-store';

export const lotIdParams = z.object({
  lotId: z.coerce.number().int().positive(),
});

export const createLotSchema = z.object({
  name: z.string().trim().min(1).max(200),
  streamSource: z.string().trim().min(1),
  flip: z.boolean().optional(),
  totalSpots: z.number().int().min(0).optional(),
});

export const updateLotSchema = createLotSchema.partial().refine(
  patch => Object.values(patch).some(value => value !== undefined),
  { message: 'At least one field must be provided' }
);

export const historyQuery = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_HISTORY_LIMIT).default(20),
});
