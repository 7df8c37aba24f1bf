/**
 * HTTP tests for lot administration and stall configuration routes.
 */

jest.mock('@/services/lot-service', () => ({
  lotService: {
    listLots: jest.fn(),
    getLot: jest.fn(),
    createLot: jest.fn(),
    updateLot: jest.fn(),
    deleteLot: jest.fn(),
    getStallConfig: jest.fn(),
    replaceStallConfig: jest.fn(),
  },
}));

jest.mock('@/services/lot-supervisor', () => ({
  lotSupervisor: { status: jest.fn(() => []) },
}));

import request from 'supertest';
import { createApp } from '@/app';
import { lotService } from '@/services/lot-service';
import { Lot, Point } from '@/types';
import { LotNotFoundError, StallConfigError } from '@/utils/errors';

const mockLotService = jest.mocked(lotService);

const lot: Lot = {
  id: 5,
  name: 'North',
  streamSource: 'http://cam.local/snapshot.jpg',
  flip: false,
  totalSpots: 12,
  createdAt: new Date('2026-01-10T12:00:00Z'),
};

const lotJson = { ...lot, createdAt: '2026-01-10T12:00:00.000Z' };

describe('Lot routes', () => {
  const app = createApp();

  describe('GET /api/lots', () => {
    it('should list registered lots', async () => {
      mockLotService.listLots.mockResolvedValueOnce([lot]);

      const response = await request(app).get('/api/lots').expect(200);

      expect(response.body).toEqual({ data: [lotJson], meta: { total: 1 } });
    });
  });

  describe('GET /api/lots/:lotId', () => {
    it('should return the lot', async () => {
      mockLotService.getLot.mockResolvedValueOnce(lot);

      const response = await request(app).get('/api/lots/5').expect(200);

      expect(response.body).toEqual({ data: lotJson });
      expect(mockLotService.getLot).toHaveBeenCalledWith(5);
    });

    it('should answer 404 for an unknown lot', async () => {
      mockLotService.getLot.mockRejectedValueOnce(new LotNotFoundError(5));

      const response = await request(app).get('/api/lots/5').expect(404);

      expect(response.body).toEqual({ error: { message: 'Lot 5 not found', code: 'NOT_FOUND' } });
    });

    it('should reject a non-numeric id', async () => {
      const response = await request(app).get('/api/lots/north').expect(400);

      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(mockLotService.getLot).not.toHaveBeenCalled();
    });
  });

  describe('POST /api/lots', () => {
    it('should create a lot and report its pipeline state', async () => {
      mockLotService.createLot.mockResolvedValueOnce({ lot, pipeline: 'started' });

      const response = await request(app)
        .post('/api/lots')
        .send({ name: 'North', streamSource: 'http://cam.local/snapshot.jpg', totalSpots: 12 })
        .expect(201);

      expect(response.body).toEqual({ data: lotJson, meta: { pipeline: 'started' } });
      expect(mockLotService.createLot).toHaveBeenCalledWith({
        name: 'North',
        streamSource: 'http://cam.local/snapshot.jpg',
        totalSpots: 12,
      });
    });

    it('should still answer 201 when the pipeline failed to start', async () => {
      mockLotService.createLot.mockResolvedValueOnce({
        lot,
        pipeline: 'failed',
        error: 'Lot 5: Unsupported stream source scheme: rtsp',
      });

      const response = await request(app)
        .post('/api/lots')
        .send({ name: 'North', streamSource: 'rtsp://cam.local/live' })
        .expect(201);

      expect(response.body.meta).toEqual({
        pipeline: 'failed',
        pipelineError: 'Lot 5: Unsupported stream source scheme: rtsp',
      });
    });

    it('should reject a body without a stream source', async () => {
      const response = await request(app).post('/api/lots').send({ name: 'North' }).expect(400);

      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.message).toMatch(/^streamSource: /);
      expect(mockLotService.createLot).not.toHaveBeenCalled();
    });

    it('should reject malformed JSON', async () => {
      const response = await request(app)
        .post('/api/lots')
        .set('Content-Type', 'application/json')
        .send('{"name": ')
        .expect(400);

      expect(response.body).toEqual({ error: { message: 'Malformed JSON body', code: 'VALIDATION_ERROR' } });
    });
  });

  describe('PATCH /api/lots/:lotId', () => {
    it('should apply a partial update', async () => {
      mockLotService.updateLot.mockResolvedValueOnce({ lot: { ...lot, flip: true }, pipeline: 'running' });

      const response = await request(app).patch('/api/lots/5').send({ flip: true }).expect(200);

      expect(response.body.data.flip).toBe(true);
      expect(response.body.meta).toEqual({ pipeline: 'running' });
      expect(mockLotService.updateLot).toHaveBeenCalledWith(5, { flip: true });
    });

    it('should report the pipeline started by a source fix', async () => {
      mockLotService.updateLot.mockResolvedValueOnce({ lot, pipeline: 'started' });

      const response = await request(app)
        .patch('/api/lots/5')
        .send({ streamSource: 'http://cam.local/snapshot.jpg' })
        .expect(200);

      expect(response.body.meta).toEqual({ pipeline: 'started' });
    });

    it('should reject an empty patch', async () => {
      const response = await request(app).patch('/api/lots/5').send({}).expect(400);

      expect(response.body.error).toEqual({ message: 'At least one field must be provided', code: 'VALIDATION_ERROR' });
    });
  });

  describe('DELETE /api/lots/:lotId', () => {
    it('should delete the lot', async () => {
      mockLotService.deleteLot.mockResolvedValueOnce(undefined);

      await request(app).delete('/api/lots/5').expect(204);

      expect(mockLotService.deleteLot).toHaveBeenCalledWith(5);
    });
  });

  describe('stalls', () => {
    const points: Point[] = [[0, 0], [10, 0], [10, 10], [0, 10]];
    const stalls = [{ id: 1, lane: 1, points }];

    it('should return the stall document', async () => {
      mockLotService.getStallConfig.mockResolvedValueOnce(stalls);

      const response = await request(app).get('/api/lots/5/stalls').expect(200);

      expect(response.body).toEqual({ data: { stalls }, meta: { total: 1 } });
    });

    it('should replace the stall document', async () => {
      mockLotService.replaceStallConfig.mockResolvedValueOnce(stalls);

      await request(app).put('/api/lots/5/stalls').send({ stalls }).expect(200);

      expect(mockLotService.replaceStallConfig).toHaveBeenCalledWith(5, { stalls });
    });

    it('should answer 400 for an invalid stall document', async () => {
      mockLotService.replaceStallConfig.mockRejectedValueOnce(
        new StallConfigError('Invalid stall configuration at stalls.0.id: Duplicate stall id 1')
      );

      const response = await request(app).put('/api/lots/5/stalls').send({ stalls: [] }).expect(400);

      expect(response.body.error).toEqual({
        message: 'Invalid stall configuration at stalls.0.id: Duplicate stall id 1',
        code: 'INVALID_STALL_CONFIG',
      });
    });
  });

  it('should answer 404 for unknown routes', async () => {
    const response = await request(app).get('/api/parking').expect(404);

    expect(response.body).toEqual({ error: { message: 'Route not found', code: 'NOT_FOUND' } });
  });
});
