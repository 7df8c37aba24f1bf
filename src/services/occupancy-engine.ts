/**
 * Occupancy engine: maps one frame's detector boxes onto stall polygons.
 *
 * Boxes are filtered to vehicle classes above a minimum area, shrunk inward
 * and cut down to their lower footprint (the part of the vehicle touching the
 * ground under an angled camera), then assigned greedily to stalls in
 * ascending stall-id order. A box that satisfies a stall is consumed, so one
 * vehicle occupies at most one stall per cycle and the lower stall id wins
 * when two stalls could claim the same box.
 *
 * Geometry modes:
 * - `polygon`: exact stall ∩ box area through polygon clipping.
 * - `bbox`: the stall's axis-aligned bounding rectangle stands in for the
 *   polygon when computing overlap. This over-estimates coverage for slanted
 *   or irregular stalls. The center-point rule always uses the real polygon.
 */

import {
  CandidateBox,
  DetectionBox,
  GeometryMode,
  OccupancyConfig,
  OccupancyResult,
  Rect,
  Stall,
  StallMatch,
  StallStatus,
} from '@/types';
import {
  boundingRect,
  pointInPolygon,
  polygonArea,
  polygonRectIntersectionArea,
  rectArea,
  rectCenter,
  rectIntersectionArea,
} from '@/utils/geometry';

export type OccupancyParams = Omit<OccupancyConfig, 'smoothingWindow'>;

/**
 * Shrinks the box by `margin` on every side and keeps the lower `fraction`
 * of what remains. Returns null when nothing is left.
 */
export const normalizeBox = (box: Rect, margin: number, fraction: number): Rect | null => {
  const x1 = box.x1 + margin;
  const x2 = box.x2 - margin;
  const top = box.y1 + margin;
  const y2 = box.y2 - margin;
  if (x2 <= x1 || y2 <= top) return null;

  const keep = Math.min(Math.max(fraction, 0), 1);
  const y1 = y2 - (y2 - top) * keep;
  if (y2 <= y1) return null;

  return { x1, y1, x2, y2 };
};

export const selectCandidates = (boxes: DetectionBox[], params: OccupancyParams): CandidateBox[] => {
  const vehicleClasses = new Set(params.vehicleClasses);
  const candidates: CandidateBox[] = [];

  for (const box of boxes) {
    if (!vehicleClasses.has(box.classId)) continue;
    if (rectArea(box) <= params.minBoxArea) continue;

    const adjusted = normalizeBox(box, params.shrinkMargin, params.footprintFraction);
    if (!adjusted) continue;

    candidates.push({
      source: box,
      adjusted,
      center: rectCenter(adjusted),
      area: rectArea(adjusted),
    });
  }

  return candidates;
};

interface StallGeometry {
  stall: Stall;
  area: number;
  overlapArea: (box: Rect) => number;
}

const stallGeometry = (stall: Stall, mode: GeometryMode): StallGeometry => {
  if (mode === 'bbox') {
    const rect = boundingRect(stall.points);
    return { stall, area: rectArea(rect), overlapArea: box => rectIntersectionArea(rect, box) };
  }
  return {
    stall,
    area: polygonArea(stall.points),
    overlapArea: box => polygonRectIntersectionArea(stall.points, box),
  };
};

const matchBox = (
  geometry: StallGeometry,
  candidate: CandidateBox,
  threshold: number
): StallMatch | null => {
  const { stall } = geometry;

  if (pointInPolygon(candidate.center, stall.points)) {
    return { stallId: stall.id, box: candidate, rule: 'center', overlap: 1 };
  }

  const intersection = geometry.overlapArea(candidate.adjusted);
  if (intersection <= 0) return null;

  const stallFraction = geometry.area > 0 ? intersection / geometry.area : 0;
  if (stallFraction >= threshold) {
    return { stallId: stall.id, box: candidate, rule: 'stall-overlap', overlap: stallFraction };
  }

  const boxFraction = candidate.area > 0 ? intersection / candidate.area : 0;
  if (boxFraction >= threshold) {
    return { stallId: stall.id, box: candidate, rule: 'box-overlap', overlap: boxFraction };
  }

  return null;
};

/**
 * Raw single-frame occupancy. `stalls` may arrive in any order; they are
 * visited by ascending id.
 */
export const evaluateOccupancy = (
  stalls: Stall[],
  boxes: DetectionBox[],
  params: OccupancyParams
): OccupancyResult => {
  const candidates = selectCandidates(boxes, params);
  const pool = [...candidates];
  const matches: StallMatch[] = [];
  const status: StallStatus = {};

  const ordered = [...stalls].sort((a, b) => a.id - b.id);

  for (const stall of ordered) {
    const geometry = stallGeometry(stall, params.geometry);
    status[String(stall.id)] = false;

    for (let i = 0; i < pool.length; i++) {
      const match = matchBox(geometry, pool[i], params.overlapFraction);
      if (match) {
        status[String(stall.id)] = true;
        matches.push(match);
        pool.splice(i, 1);
        break;
      }
    }
  }

  const occupiedCount = Object.values(status).filter(Boolean).length;

  return {
    status,
    occupiedCount,
    freeCount: ordered.length - occupiedCount,
    candidates,
    matches,
    unmatched: pool,
  };
};
