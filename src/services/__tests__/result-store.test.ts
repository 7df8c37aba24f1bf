import { db } from '@/database/pool';
import { mapDetectionRow, MAX_HISTORY_LIMIT, ResultStore } from '../result-store';

const mockDb = jest.mocked(db);

const row = {
  id: '42',
  lot_id: 3,
  frame_path: '/data/lot3/frames/latest.jpg',
  overlay_path: '/data/lot3/overlays/overlay_1.jpg',
  map_path: '/data/lot3/maps/map_1.jpg',
  occupied_count: 1,
  free_count: 1,
  stall_status: { '1': true, '2': false },
  created_at: new Date('2026-03-01T08:00:00Z'),
};

describe('ResultStore', () => {
  let store: ResultStore;

  beforeEach(() => {
    store = new ResultStore();
  });

  describe('mapDetectionRow', () => {
    it('should convert ids and parse a JSON stall status string', () => {
      const record = mapDetectionRow({ ...row, stall_status: '{"1":false}', created_at: '2026-03-01T08:00:00.000Z' });

      expect(record.id).toBe(42);
      expect(record.stallStatus).toEqual({ '1': false });
      expect(record.timestamp.toISOString()).toBe('2026-03-01T08:00:00.000Z');
    });

    it('should reject a stall status with non-boolean values', () => {
      expect(() => mapDetectionRow({ ...row, stall_status: '{"1":"yes"}' })).toThrow();
    });
  });

  describe('write', () => {
    it('should insert the record and return it with its id', async () => {
      mockDb.query.mockResolvedValueOnce([row]);
      const timestamp = new Date('2026-03-01T08:00:00Z');

      const stored = await store.write({
        lotId: 3,
        timestamp,
        stallStatus: { '1': true, '2': false },
        occupiedCount: 1,
        freeCount: 1,
        framePath: row.frame_path,
        overlayPath: row.overlay_path,
        mapPath: row.map_path,
      });

      expect(mockDb.query).toHaveBeenCalledWith(
        expect.stringContaining('INSERT INTO detection_results'),
        [3, row.frame_path, row.overlay_path, row.map_path, 1, 1, '{"1":true,"2":false}', timestamp]
      );
      expect(stored).toEqual({
        id: 42,
        lotId: 3,
        timestamp,
        stallStatus: { '1': true, '2': false },
        occupiedCount: 1,
        freeCount: 1,
        framePath: row.frame_path,
        overlayPath: row.overlay_path,
        mapPath: row.map_path,
      });
    });
  });

  describe('latest', () => {
    it('should report no_data for a lot without records', async () => {
      mockDb.query.mockResolvedValueOnce([]);

      expect(await store.latest(3)).toEqual({ status: 'no_data', lotId: 3 });
    });

    it('should return the newest record', async () => {
      mockDb.query.mockResolvedValueOnce([row]);

      const latest = await store.latest(3);

      expect(latest.status).toBe('ok');
      expect(latest.status === 'ok' && latest.record.id).toBe(42);
      expect(mockDb.query).toHaveBeenCalledWith(expect.stringContaining('ORDER BY id DESC LIMIT 1'), [3]);
    });

    it('should treat a zero-stall record as data', async () => {
      mockDb.query.mockResolvedValueOnce([{ ...row, stall_status: {}, occupied_count: 0, free_count: 0 }]);

      const latest = await store.latest(3);

      expect(latest.status).toBe('ok');
    });
  });

  describe('recent', () => {
    it('should clamp the limit', async () => {
      mockDb.query.mockResolvedValueOnce([]).mockResolvedValueOnce([]);

      await store.recent(3, 10_000);
      await store.recent(3, 0);

      expect(mockDb.query.mock.calls[0][1]).toEqual([3, MAX_HISTORY_LIMIT]);
      expect(mockDb.query.mock.calls[1][1]).toEqual([3, 1]);
    });
  });

  describe('purgeLot', () => {
    it('should delete every record of the lot', async () => {
      mockDb.execute.mockResolvedValueOnce(4);

      expect(await store.purgeLot(9)).toBe(4);
      expect(mockDb.execute).toHaveBeenCalledWith('DELETE FROM detection_results WHERE lot_id = $1', [9]);
    });
  });
});
