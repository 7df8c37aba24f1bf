#!/usr/bin/env tsx

import { db } from '../src/database/pool';
import { ensureSchema } from '../src/database/schema';
import { logger } from '../src/utils/logger';

const setupDatabase = async (): Promise<void> => {
  try {
    logger.info('Connecting to database for setup...');

    if (!(await db.testConnection())) {
      throw new Error('Database is not reachable');
    }

    await ensureSchema();

    const tables = await db.query<{ table_name: string }>(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
      AND table_name IN ('lots', 'detection_results')
      ORDER BY table_name
    `);
    logger.info('Tables present:', { tables: tables.map(t => t.table_name) });
    logger.info('✅ Database setup complete');
  } catch (error) {
    logger.error('❌ Database setup failed:', error);
    process.exitCode = 1;
  } finally {
    await db.close();
  }
};

void setupDatabase();
