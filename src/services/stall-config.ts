import { promises as fs } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { Stall, StallConfigDocument } from '@/types';
import { polygonArea } from '@/utils/geometry';
import { StallConfigError } from '@/utils/errors';
import { logger } from '@/utils/logger';

const pointSchema = z.tuple([z.number().finite(), z.number().finite()]);

const stallSchema = z.object({
  id: z.number().int(),
  lane: z.number().int(),
  points: z.array(pointSchema).min(3),
}).refine(stall => polygonArea(stall.points) > 0, {
  message: 'Stall polygon must enclose a positive area',
  path: ['points'],
});

export const stallConfigSchema = z.object({
  stalls: z.array(stallSchema),
}).superRefine((doc, ctx) => {
  const seen = new Set<number>();
  doc.stalls.forEach((stall, index) => {
    if (seen.has(stall.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate stall id ${stall.id}`,
        path: ['stalls', index, 'id'],
      });
    }
    seen.add(stall.id);
  });
});

export const EMPTY_STALL_CONFIG: StallConfigDocument = { stalls: [] };

const byStallId = (a: Stall, b: Stall): number => a.id - b.id;

/**
 * Validates a stall document and returns its stalls in ascending id order,
 * which is the assignment order the occupancy engine relies on.
 */
export const parseStallConfig = (input: unknown): Stall[] => {
  const result = stallConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length ? ` at ${issue.path.join('.')}` : '';
    throw new StallConfigError(`Invalid stall configuration${where}: ${issue.message}`);
  }
  return [...result.data.stalls].sort(byStallId);
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Missing or empty documents are a valid zero-stall configuration.
 */
export const loadStallConfig = async (configPath: string): Promise<Stall[]> => {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      logger.debug('No stall configuration yet', { configPath });
      return [];
    }
    throw error;
  }

  if (!raw.trim()) return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new StallConfigError(`Stall configuration is not valid JSON: ${configPath}`);
  }
  return parseStallConfig(parsed);
};

/**
 * Replaces the document wholesale. Written to a sibling temp file and renamed
 * so readers never observe a half-written document.
 */
export const saveStallConfig = async (configPath: string, input: unknown): Promise<Stall[]> => {
  const stalls = parseStallConfig(input);
  const document: StallConfigDocument = { stalls };
  await fs.mkdir(dirname(configPath), { recursive: true });
  const tmpPath = `${configPath}.tmp`;
  await fs.writeFile(tmpPath, JSON.stringify(document, null, 2));
  await fs.rename(tmpPath, configPath);
  logger.info('Stall configuration replaced', { configPath, stalls: stalls.length });
  return stalls;
};

export const ensureStallConfig = async (configPath: string): Promise<void> => {
  try {
    await fs.access(configPath);
  } catch {
    await fs.mkdir(dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, JSON.stringify(EMPTY_STALL_CONFIG, null, 2));
    logger.info('Created empty stall configuration', { configPath });
  }
};
