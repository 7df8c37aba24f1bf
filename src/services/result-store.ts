import { z } from 'zod';
import { db } from '@/database/pool';
import { LatestOccupancy, OccupancyRecord, StallStatus, StoredOccupancyRecord } from '@/types';
import { logger } from '@/utils/logger';

export const MAX_HISTORY_LIMIT = 500;

type DetectionRow = {
  id: string | number;
  lot_id: number;
  frame_path: string | null;
  overlay_path: string | null;
  map_path: string | null;
  occupied_count: number;
  free_count: number;
  stall_status: StallStatus | string;
  created_at: Date | string;
};

const stallStatusSchema = z.record(z.string(), z.boolean());

const COLUMNS = `id, lot_id, frame_path, overlay_path, map_path,
  occupied_count, free_count, stall_status, created_at`;

// BIGSERIAL comes back as a string from pg; JSONB is parsed unless a driver hook disabled it
export const mapDetectionRow = (row: DetectionRow): StoredOccupancyRecord => ({
  id: Number(row.id),
  lotId: row.lot_id,
  timestamp: new Date(row.created_at),
  stallStatus: stallStatusSchema.parse(
    typeof row.stall_status === 'string' ? JSON.parse(row.stall_status) : row.stall_status
  ),
  occupiedCount: row.occupied_count,
  freeCount: row.free_count,
  framePath: row.frame_path,
  overlayPath: row.overlay_path,
  mapPath: row.map_path,
});

/**
 * Append-only detection history, partitioned by lot id. Each write is one
 * independent insert, so concurrent lots never wait on each other.
 */
export class ResultStore {
  async write(record: OccupancyRecord): Promise<StoredOccupancyRecord> {
    const rows = await db.query<DetectionRow>(
      `INSERT INTO detection_results
        (lot_id, frame_path, overlay_path, map_path, occupied_count, free_count, stall_status, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING ${COLUMNS}`,
      [
        record.lotId,
        record.framePath,
        record.overlayPath,
        record.mapPath,
        record.occupiedCount,
        record.freeCount,
        JSON.stringify(record.stallStatus),
        record.timestamp,
      ]
    );
    return mapDetectionRow(rows[0]);
  }

  /**
   * Most recent record for the lot, or a `no_data` marker when the lot has
   * never completed a cycle. A zero-stall record is still `ok`.
   */
  async latest(lotId: number): Promise<LatestOccupancy> {
    const rows = await db.query<DetectionRow>(
      `SELECT ${COLUMNS} FROM detection_results WHERE lot_id = $1 ORDER BY id DESC LIMIT 1`,
      [lotId]
    );
    if (!rows.length) return { status: 'no_data', lotId };
    return { status: 'ok', record: mapDetectionRow(rows[0]) };
  }

  async recent(lotId: number, limit: number): Promise<StoredOccupancyRecord[]> {
    const bounded = Math.min(Math.max(1, Math.floor(limit)), MAX_HISTORY_LIMIT);
    const rows = await db.query<DetectionRow>(
      `SELECT ${COLUMNS} FROM detection_results WHERE lot_id = $1 ORDER BY id DESC LIMIT $2`,
      [lotId, bounded]
    );
    return rows.map(mapDetectionRow);
  }

  async purgeLot(lotId: number): Promise<number> {
    const deleted = await db.execute('DELETE FROM detection_results WHERE lot_id = $1', [lotId]);
    logger.info('Detection history purged', { lotId, deleted });
    return deleted;
  }
}

export const resultStore = new ResultStore();
