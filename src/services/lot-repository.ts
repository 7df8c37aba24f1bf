import { db } from '@/database/pool';
import { CreateLotInput, Lot, UpdateLotInput } from '@/types';

type LotRow = {
  id: number;
  name: string;
  stream_source: string;
  flip: boolean;
  total_spots: number;
  created_at: Date | string;
};

const COLUMNS = 'id, name, stream_source, flip, total_spots, created_at';

export const mapLotRow = (row: LotRow): Lot => ({
  id: row.id,
  name: row.name,
  streamSource: row.stream_source,
  flip: row.flip,
  totalSpots: row.total_spots,
  createdAt: new Date(row.created_at),
});

// camelCase field -> column, in the order updates are applied
const UPDATABLE: [keyof UpdateLotInput, string][] = [
  ['name', 'name'],
  ['streamSource', 'stream_source'],
  ['flip', 'flip'],
  ['totalSpots', 'total_spots'],
];

export class LotRepository {
  async list(): Promise<Lot[]> {
    const rows = await db.query<LotRow>(`SELECT ${COLUMNS} FROM lots ORDER BY id ASC`);
    return rows.map(mapLotRow);
  }

  async getById(lotId: number): Promise<Lot | null> {
    const rows = await db.query<LotRow>(`SELECT ${COLUMNS} FROM lots WHERE id = $1`, [lotId]);
    return rows.length ? mapLotRow(rows[0]) : null;
  }

  async create(input: CreateLotInput): Promise<Lot> {
    const rows = await db.query<LotRow>(
      `INSERT INTO lots (name, stream_source, flip, total_spots)
       VALUES ($1, $2, $3, $4)
       RETURNING ${COLUMNS}`,
      [input.name, input.streamSource, input.flip ?? false, input.totalSpots ?? 0]
    );
    return mapLotRow(rows[0]);
  }

  async update(lotId: number, patch: UpdateLotInput): Promise<Lot | null> {
    const sets: string[] = [];
    const params: unknown[] = [];

    for (const [field, column] of UPDATABLE) {
      const value = patch[field];
      if (value !== undefined) {
        params.push(value);
        sets.push(`${column} = $${params.length}`);
      }
    }

    if (!sets.length) return this.getById(lotId);

    params.push(lotId);
    const rows = await db.query<LotRow>(
      `UPDATE lots SET ${sets.join(', ')} WHERE id = $${params.length} RETURNING ${COLUMNS}`,
      params
    );
    return rows.length ? mapLotRow(rows[0]) : null;
  }

  async delete(lotId: number): Promise<boolean> {
    return (await db.execute('DELETE FROM lots WHERE id = $1', [lotId])) > 0;
  }
}

export const lotRepository = new LotRepository();
