import { appConfig } from '@/config';
import { createApp } from '@/app';
import { db } from '@/database/pool';
import { ensureSchema } from '@/database/schema';
import { lotRepository } from '@/services/lot-repository';
import { lotSupervisor } from '@/services/lot-supervisor';
import { logger } from '@/utils/logger';

const startServer = async (): Promise<void> => {
  try {
    await ensureSchema();

    const app = createApp();
    const server = app.listen(appConfig.port, () => {
      logger.info(`Lot occupancy API started on port ${appConfig.port}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
      logger.info(`CORS origin: ${appConfig.cors.origin}`);
    });

    lotSupervisor.on('started', (lotId: number) => {
      logger.info(`✅ Pipeline running for lot ${lotId}`);
    });
    lotSupervisor.on('crashed', (lotId: number, role: string) => {
      logger.warn(`⚠️ Lot ${lotId} ${role} task crashed`);
    });

    if (appConfig.features.autostartLots) {
      const lots = await lotRepository.list();
      logger.info(`🚀 Starting pipelines for ${lots.length} registered lot(s)...`);
      await lotSupervisor.startAll(lots.map(lot => lot.id));
    } else {
      logger.info('ℹ️ Lot autostart disabled (set AUTOSTART_LOTS=true to enable)');
    }

    if (appConfig.features.watchdog) {
      lotSupervisor.startWatchdog();
    }

    // Graceful shutdown handlers
    const gracefulShutdown = async (signal: string): Promise<void> => {
      logger.info(`${signal} received, shutting down gracefully`);

      lotSupervisor.stopWatchdog();
      const stopped = lotSupervisor.stopAll();
      logger.info(`🛑 Stopped ${stopped} pipeline(s)`);

      server.close();
      try {
        await db.close();
      } catch (error) {
        logger.error('❌ Error closing database pool:', error);
      }

      process.exit(0);
    };

    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

void startServer();
