import { Point, Rect } from '@/types';

const EPSILON = 1e-9;

/** Shoelace area, always non-negative. */
export const polygonArea = (points: Point[]): number => {
  if (points.length < 3) return 0;
  let twice = 0;
  for (let i = 0; i < points.length; i++) {
    const [x1, y1] = points[i];
    const [x2, y2] = points[(i + 1) % points.length];
    twice += x1 * y2 - x2 * y1;
  }
  return Math.abs(twice) / 2;
};

/**
 * Area-weighted centroid. Degenerate polygons fall back to the vertex mean.
 */
export const polygonCentroid = (points: Point[]): Point => {
  let signedTwice = 0;
  let cx = 0;
  let cy = 0;
  for (let i = 0; i < points.length; i++) {
    const [x1, y1] = points[i];
    const [x2, y2] = points[(i + 1) % points.length];
    const cross = x1 * y2 - x2 * y1;
    signedTwice += cross;
    cx += (x1 + x2) * cross;
    cy += (y1 + y2) * cross;
  }

  if (Math.abs(signedTwice) < EPSILON) {
    const n = points.length || 1;
    return [
      points.reduce((sum, [x]) => sum + x, 0) / n,
      points.reduce((sum, [, y]) => sum + y, 0) / n,
    ];
  }

  return [cx / (3 * signedTwice), cy / (3 * signedTwice)];
};

const onSegment = ([px, py]: Point, [ax, ay]: Point, [bx, by]: Point): boolean => {
  const cross = (bx - ax) * (py - ay) - (by - ay) * (px - ax);
  if (Math.abs(cross) > EPSILON) return false;
  return (
    px >= Math.min(ax, bx) - EPSILON && px <= Math.max(ax, bx) + EPSILON &&
    py >= Math.min(ay, by) - EPSILON && py <= Math.max(ay, by) + EPSILON
  );
};

/** Even-odd ray cast; points on an edge count as inside. */
export const pointInPolygon = (point: Point, polygon: Point[]): boolean => {
  const [px, py] = point;
  let inside = false;
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const a = polygon[i];
    const b = polygon[j];
    if (onSegment(point, a, b)) return true;
    const [ax, ay] = a;
    const [bx, by] = b;
    if ((ay > py) !== (by > py) && px < ((bx - ax) * (py - ay)) / (by - ay) + ax) {
      inside = !inside;
    }
  }
  return inside;
};

export const boundingRect = (points: Point[]): Rect => ({
  x1: Math.min(...points.map(([x]) => x)),
  y1: Math.min(...points.map(([, y]) => y)),
  x2: Math.max(...points.map(([x]) => x)),
  y2: Math.max(...points.map(([, y]) => y)),
});

export const rectArea = (rect: Rect): number =>
  Math.max(0, rect.x2 - rect.x1) * Math.max(0, rect.y2 - rect.y1);

export const rectCenter = (rect: Rect): Point => [(rect.x1 + rect.x2) / 2, (rect.y1 + rect.y2) / 2];

export const rectIntersectionArea = (a: Rect, b: Rect): number =>
  rectArea({
    x1: Math.max(a.x1, b.x1),
    y1: Math.max(a.y1, b.y1),
    x2: Math.min(a.x2, b.x2),
    y2: Math.min(a.y2, b.y2),
  });

type Inside = (p: Point) => boolean;
type Cross = (a: Point, b: Point) => Point;

const clipEdge = (input: Point[], inside: Inside, cross: Cross): Point[] => {
  const output: Point[] = [];
  for (let i = 0; i < input.length; i++) {
    const current = input[i];
    const previous = input[(i + input.length - 1) % input.length];
    const currentIn = inside(current);
    const previousIn = inside(previous);
    if (currentIn) {
      if (!previousIn) output.push(cross(previous, current));
      output.push(current);
    } else if (previousIn) {
      output.push(cross(previous, current));
    }
  }
  return output;
};

const crossVertical = (x: number): Cross => ([ax, ay], [bx, by]) => {
  const t = (x - ax) / (bx - ax);
  return [x, ay + t * (by - ay)];
};

const crossHorizontal = (y: number): Cross => ([ax, ay], [bx, by]) => {
  const t = (y - ay) / (by - ay);
  return [ax + t * (bx - ax), y];
};

/**
 * Sutherland–Hodgman clip of an arbitrary simple polygon against an
 * axis-aligned rectangle. The clip window is convex, so the area of the
 * result is exact even for concave stall polygons.
 */
export const clipPolygonToRect = (polygon: Point[], rect: Rect): Point[] => {
  let output = polygon;
  output = clipEdge(output, ([x]) => x >= rect.x1, crossVertical(rect.x1));
  if (!output.length) return output;
  output = clipEdge(output, ([x]) => x <= rect.x2, crossVertical(rect.x2));
  if (!output.length) return output;
  output = clipEdge(output, ([, y]) => y >= rect.y1, crossHorizontal(rect.y1));
  if (!output.length) return output;
  return clipEdge(output, ([, y]) => y <= rect.y2, crossHorizontal(rect.y2));
};

export const polygonRectIntersectionArea = (polygon: Point[], rect: Rect): number =>
  polygonArea(clipPolygonToRect(polygon, rect));
