import { db } from '@/database/pool';
import { LotRepository } from '../lot-repository';

const mockDb = jest.mocked(db);

const lotRow = {
  id: 5,
  name: 'North',
  stream_source: 'http://cam.local/snapshot.jpg',
  flip: false,
  total_spots: 12,
  created_at: new Date('2026-01-10T12:00:00Z'),
};

describe('LotRepository', () => {
  let repository: LotRepository;

  beforeEach(() => {
    repository = new LotRepository();
  });

  it('should map rows to lots', async () => {
    mockDb.query.mockResolvedValueOnce([lotRow]);

    expect(await repository.getById(5)).toEqual({
      id: 5,
      name: 'North',
      streamSource: 'http://cam.local/snapshot.jpg',
      flip: false,
      totalSpots: 12,
      createdAt: new Date('2026-01-10T12:00:00Z'),
    });
  });

  it('should return null for an unknown lot', async () => {
    mockDb.query.mockResolvedValueOnce([]);

    expect(await repository.getById(99)).toBeNull();
  });

  it('should default flip and total spots on create', async () => {
    mockDb.query.mockResolvedValueOnce([lotRow]);

    await repository.create({ name: 'North', streamSource: 'http://cam.local/snapshot.jpg' });

    expect(mockDb.query).toHaveBeenCalledWith(
      expect.stringContaining('INSERT INTO lots'),
      ['North', 'http://cam.local/snapshot.jpg', false, 0]
    );
  });

  it('should update only the provided fields', async () => {
    mockDb.query.mockResolvedValueOnce([{ ...lotRow, flip: true }]);

    const lot = await repository.update(5, { flip: true, name: 'North' });

    expect(lot?.flip).toBe(true);
    expect(mockDb.query).toHaveBeenCalledWith(
      expect.stringContaining('SET name = $1, flip = $2 WHERE id = $3'),
      ['North', true, 5]
    );
  });

  it('should fall back to a read for an empty patch', async () => {
    mockDb.query.mockResolvedValueOnce([lotRow]);

    await repository.update(5, {});

    expect(mockDb.query).toHaveBeenCalledWith(expect.stringContaining('WHERE id = $1'), [5]);
    expect(mockDb.query.mock.calls[0][0]).not.toContain('UPDATE');
  });

  it('should report whether a lot was deleted', async () => {
    mockDb.execute.mockResolvedValueOnce(1).mockResolvedValueOnce(0);

    expect(await repository.delete(5)).toBe(true);
    expect(await repository.delete(5)).toBe(false);
  });
});
