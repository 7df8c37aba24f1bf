import { StallStatus } from '@/types';

/**
 * Per-stall majority vote over the last `window` raw decisions.
 *
 * The threshold is `ceil(length / 2)` of the buffer's current length, not of
 * the nominal window: right after a (re)start a single `true` already yields
 * `true`, and a `[true, false]` tie resolves to occupied.
 */
export class TemporalSmoother {
  private readonly history = new Map<string, boolean[]>();

  constructor(private readonly window: number = 3) {
    if (!Number.isInteger(window) || window < 1) {
      throw new Error(`Smoothing window must be a positive integer, got ${window}`);
    }
  }

  push(stallId: string, raw: boolean): boolean {
    const buffer = this.history.get(stallId) ?? [];
    buffer.push(raw);
    if (buffer.length > this.window) buffer.shift();
    this.history.set(stallId, buffer);

    const trues = buffer.filter(Boolean).length;
    return trues >= Math.ceil(buffer.length / 2);
  }

  /**
   * Smooths one frame's raw decisions. History of stalls absent from `raw`
   * (removed by a stall document replace) is dropped.
   */
  apply(raw: StallStatus): StallStatus {
    for (const stallId of [...this.history.keys()]) {
      if (!(stallId in raw)) this.history.delete(stallId);
    }

    const smoothed: StallStatus = {};
    for (const [stallId, value] of Object.entries(raw)) {
      smoothed[stallId] = this.push(stallId, value);
    }
    return smoothed;
  }

  depth(stallId: string): number {
    return this.history.get(stallId)?.length ?? 0;
  }

  reset(): void {
    this.history.clear();
  }
}
