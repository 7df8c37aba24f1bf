import { join } from 'path';
import sharp from 'sharp';
import { renderConfig } from '@/config';
import { CandidateBox, OccupancyResult, Point, RenderConfig, Stall, StallStatus } from '@/types';
import { polygonCentroid } from '@/utils/geometry';
import { logger } from '@/utils/logger';

export const COLORS = {
  occupied: '#ff0000',
  free: '#00c800',
  detection: '#00ffff',
  center: '#ff00ff',
  background: '#232323',
  text: '#ffffff',
  laneHeader: '#ffff00',
} as const;

// Schematic map grid, in pixels
export const MAP_LAYOUT = {
  stallWidth: 120,
  stallHeight: 80,
  padX: 30,
  padY: 25,
  marginX: 80,
  marginY: 80,
  headerY: 40,
  placeholderWidth: 600,
  placeholderHeight: 300,
} as const;

export interface FrameSize {
  width: number;
  height: number;
}

export interface MapCell {
  stall: Stall;
  x: number;
  y: number;
}

export interface MapColumn {
  lane: number;
  x: number;
  cells: MapCell[];
}

export interface MapLayout {
  width: number;
  height: number;
  columns: MapColumn[];
}

const escapeXml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');

const fmt = (value: number): string => String(Math.round(value * 100) / 100);

const pointsAttr = (points: Point[]): string => points.map(([x, y]) => `${fmt(x)},${fmt(y)}`).join(' ');

const stallColor = (status: StallStatus, stall: Stall): string =>
  status[String(stall.id)] ? COLORS.occupied : COLORS.free;

export const summaryText = (status: StallStatus, stalls: Stall[]): string => {
  const occupied = stalls.filter(stall => status[String(stall.id)]).length;
  return `Occupied: ${occupied}/${stalls.length}  Free: ${stalls.length - occupied}`;
};

/**
 * Lanes ascending left to right; within a lane stalls ordered by centroid y,
 * so the back row of the lot is drawn at the top.
 */
export const layoutMap = (stalls: Stall[]): MapLayout => {
  const byLane = new Map<number, Stall[]>();
  for (const stall of stalls) {
    const lane = byLane.get(stall.lane) ?? [];
    lane.push(stall);
    byLane.set(stall.lane, lane);
  }

  const { stallWidth, stallHeight, padX, padY, marginX, marginY } = MAP_LAYOUT;
  const lanes = [...byLane.keys()].sort((a, b) => a - b);

  const columns: MapColumn[] = lanes.map((lane, col) => {
    const x = marginX + col * (stallWidth + padX);
    const ordered = [...(byLane.get(lane) ?? [])]
      .map(stall => ({ stall, cy: polygonCentroid(stall.points)[1] }))
      .sort((a, b) => a.cy - b.cy || a.stall.id - b.stall.id);
    return {
      lane,
      x,
      cells: ordered.map(({ stall }, row) => ({ stall, x, y: marginY + row * (stallHeight + padY) })),
    };
  });

  const rows = Math.max(0, ...columns.map(column => column.cells.length));
  return {
    width: marginX * 2 + columns.length * (stallWidth + padX),
    height: marginY * 2 + rows * (stallHeight + padY),
    columns,
  };
};

export const buildMapSvg = (stalls: Stall[], status: StallStatus): string => {
  if (!stalls.length) {
    const { placeholderWidth: w, placeholderHeight: h } = MAP_LAYOUT;
    return [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${w}" height="${h}">`,
      `<rect width="${w}" height="${h}" fill="${COLORS.background}"/>`,
      `<text x="30" y="160" font-family="sans-serif" font-size="28" fill="${COLORS.text}">No stalls configured</text>`,
      '</svg>',
    ].join('');
  }

  const layout = layoutMap(stalls);
  const { stallWidth, stallHeight, headerY } = MAP_LAYOUT;
  const parts = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${layout.width}" height="${layout.height}">`,
    `<rect width="${layout.width}" height="${layout.height}" fill="${COLORS.background}"/>`,
  ];

  for (const column of layout.columns) {
    parts.push(
      `<text x="${column.x + 5}" y="${headerY}" font-family="sans-serif" font-size="18" fill="${COLORS.laneHeader}">Lane ${column.lane}</text>`
    );
    for (const cell of column.cells) {
      parts.push(
        `<rect x="${cell.x}" y="${cell.y}" width="${stallWidth}" height="${stallHeight}" fill="${stallColor(status, cell.stall)}" stroke="${COLORS.text}" stroke-width="2"/>`,
        `<text x="${cell.x + stallWidth / 2}" y="${cell.y + stallHeight / 2 + 8}" text-anchor="middle" font-family="sans-serif" font-size="22" fill="${COLORS.text}">${cell.stall.id}</text>`
      );
    }
  }

  parts.push('</svg>');
  return parts.join('');
};

const diagnosticsSvg = (candidates: CandidateBox[], unmatched: CandidateBox[]): string[] => {
  const parts: string[] = [];
  for (const { source } of unmatched) {
    parts.push(
      `<rect x="${fmt(source.x1)}" y="${fmt(source.y1)}" width="${fmt(source.x2 - source.x1)}" height="${fmt(source.y2 - source.y1)}" fill="none" stroke="${COLORS.detection}" stroke-width="2"/>`
    );
  }
  for (const { center } of candidates) {
    parts.push(`<circle cx="${fmt(center[0])}" cy="${fmt(center[1])}" r="5" fill="${COLORS.center}"/>`);
  }
  return parts;
};

export const buildOverlaySvg = (
  size: FrameSize,
  stalls: Stall[],
  status: StallStatus,
  detections?: Pick<OccupancyResult, 'candidates' | 'unmatched'>
): string => {
  const parts = [`<svg xmlns="http://www.w3.org/2000/svg" width="${size.width}" height="${size.height}">`];

  if (detections) {
    parts.push(...diagnosticsSvg(detections.candidates, detections.unmatched));
  }

  for (const stall of stalls) {
    const color = stallColor(status, stall);
    const [cx, cy] = polygonCentroid(stall.points);
    parts.push(
      `<polygon points="${pointsAttr(stall.points)}" fill="none" stroke="${color}" stroke-width="2"/>`,
      `<text x="${fmt(cx)}" y="${fmt(cy)}" text-anchor="middle" font-family="sans-serif" font-size="16" font-weight="bold" fill="${color}">${stall.id}</text>`
    );
  }

  const summary = summaryText(status, stalls);
  const panelWidth = summary.length * 12 + 20;
  parts.push(
    `<rect x="10" y="10" width="${panelWidth}" height="36" fill="#000000"/>`,
    `<text x="20" y="36" font-family="sans-serif" font-size="20" fill="${COLORS.text}">${escapeXml(summary)}</text>`,
    '</svg>'
  );

  return parts.join('');
};

/**
 * Writes overlay and map renders as new timestamped JPEGs. Files are never
 * overwritten, so "newest file in the folder" is a valid read for consumers.
 */
export class Renderer {
  private lastStamp = 0;

  constructor(private readonly config: RenderConfig = renderConfig) {}

  private nextFilePath(dir: string, prefix: string): string {
    const stamp = Math.max(Date.now(), this.lastStamp + 1);
    this.lastStamp = stamp;
    return join(dir, `${prefix}_${stamp}.jpg`);
  }

  async renderOverlay(
    frame: Buffer,
    size: FrameSize,
    stalls: Stall[],
    status: StallStatus,
    result: Pick<OccupancyResult, 'candidates' | 'unmatched'>,
    outputDir: string
  ): Promise<string> {
    const svg = buildOverlaySvg(size, stalls, status, this.config.drawDetections ? result : undefined);
    const outputPath = this.nextFilePath(outputDir, 'overlay');

    await sharp(frame)
      .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
      .jpeg({ quality: this.config.jpegQuality })
      .toFile(outputPath);

    logger.debug('Overlay written', { outputPath, stalls: stalls.length });
    return outputPath;
  }

  async renderMap(stalls: Stall[], status: StallStatus, outputDir: string): Promise<string> {
    const outputPath = this.nextFilePath(outputDir, 'map');

    await sharp(Buffer.from(buildMapSvg(stalls, status)))
      .jpeg({ quality: this.config.jpegQuality })
      .toFile(outputPath);

    logger.debug('Map written', { outputPath, stalls: stalls.length });
    return outputPath;
  }
}
