import { db } from '@/database/pool';
import { logger } from '@/utils/logger';

const STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS lots (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL,
    stream_source TEXT NOT NULL,
    flip BOOLEAN NOT NULL DEFAULT FALSE,
    total_spots INTEGER NOT NULL DEFAULT 0,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE IF NOT EXISTS detection_results (
    id BIGSERIAL PRIMARY KEY,
    lot_id INTEGER NOT NULL REFERENCES lots (id) ON DELETE CASCADE,
    frame_path TEXT,
    overlay_path TEXT,
    map_path TEXT,
    occupied_count INTEGER NOT NULL,
    free_count INTEGER NOT NULL,
    stall_status JSONB NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  // latest(lotId) and recent(lotId) are single index scans
  `CREATE INDEX IF NOT EXISTS idx_detection_results_lot_id_id
    ON detection_results (lot_id, id DESC)`,
];

export const ensureSchema = async (): Promise<void> => {
  for (const statement of STATEMENTS) {
    await db.execute(statement);
  }
  logger.info('Database schema ready', { tables: ['lots', 'detection_results'] });
};
