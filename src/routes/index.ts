import { Router } from 'express';
import { apiRateLimit } from '@/middleware/rate-limit';
import {
  healthCheck,
  readiness,
  liveness
} from '@/controllers/health';
import {
  listLots,
  getLot,
  createLot,
  updateLot,
  deleteLot,
  getStalls,
  replaceStalls
} from '@/controllers/lots';
import {
  getOccupancy,
  getHistory,
  getOverlayImage,
  getMapImage,
  getPipelines
} from '@/controllers/occupancy';

const router = Router();

// =================================================================
// Health Check Routes
// =================================================================
router.get('/health', healthCheck);
router.get('/health/ready', readiness);
router.get('/health/live', liveness);

router.use(apiRateLimit);

// =================================================================
// Lot Administration
// =================================================================
const lotsRouter = Router();

lotsRouter.get('/', listLots);
lotsRouter.post('/', createLot);
lotsRouter.get('/:lotId', getLot);
lotsRouter.patch('/:lotId', updateLot);
lotsRouter.delete('/:lotId', deleteLot);

lotsRouter.get('/:lotId/stalls', getStalls);
lotsRouter.put('/:lotId/stalls', replaceStalls);

// =================================================================
// Occupancy Results
// =================================================================
lotsRouter.get('/:lotId/occupancy', getOccupancy);
lotsRouter.get('/:lotId/history', getHistory);
lotsRouter.get('/:lotId/overlay', getOverlayImage);
lotsRouter.get('/:lotId/map', getMapImage);

router.use('/lots', lotsRouter);

router.get('/pipelines', getPipelines);

export default router;
