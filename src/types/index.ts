export type Point = [number, number];

export interface Rect {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

// Lot registry row
export interface Lot {
  id: number;
  name: string;
  streamSource: string;
  flip: boolean;
  totalSpots: number;
  createdAt: Date;
}

export interface CreateLotInput {
  name: string;
  streamSource: string;
  flip?: boolean;
  totalSpots?: number;
}

export type UpdateLotInput = Partial<CreateLotInput>;

// Stall configuration document
export interface Stall {
  id: number;
  lane: number;
  points: Point[];
}

export interface StallConfigDocument {
  stalls: Stall[];
}

// Detector output, one entry per box
export interface DetectionBox extends Rect {
  classId: number;
  confidence: number;
}

// Box after class/area filtering and footprint normalization
export interface CandidateBox {
  source: DetectionBox;
  adjusted: Rect;
  center: Point;
  area: number;
}

export interface StallMatch {
  stallId: number;
  box: CandidateBox;
  rule: 'center' | 'stall-overlap' | 'box-overlap';
  overlap: number;
}

export type StallStatus = Record<string, boolean>;

export interface OccupancyResult {
  status: StallStatus;
  occupiedCount: number;
  freeCount: number;
  candidates: CandidateBox[];
  matches: StallMatch[];
  unmatched: CandidateBox[];
}

export interface OccupancyRecord {
  lotId: number;
  timestamp: Date;
  stallStatus: StallStatus;
  occupiedCount: number;
  freeCount: number;
  framePath: string | null;
  overlayPath: string | null;
  mapPath: string | null;
}

export interface StoredOccupancyRecord extends OccupancyRecord {
  id: number;
}

export type LatestOccupancy =
  | { status: 'ok'; record: StoredOccupancyRecord }
  | { status: 'no_data'; lotId: number };

export interface LotPaths {
  root: string;
  configPath: string;
  framesDir: string;
  overlaysDir: string;
  mapsDir: string;
  latestFramePath: string;
}

export type SourceKind = 'snapshot' | 'mjpeg' | 'file';

export type WorkerRole = 'capture' | 'detect';

export interface TaskStatus {
  role: WorkerRole;
  running: boolean;
  restarts: number;
  lastActivityAt: string | null;
}

export interface PipelineStatus {
  lotId: number;
  startedAt: string;
  capture: TaskStatus;
  detect: TaskStatus | null;
}

// Configuration groups
export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
  maxConnections: number;
  idleTimeout: number;
  connectionTimeout: number;
}

export interface StorageConfig {
  dataRoot: string;
  retentionKeep: number;
}

export interface DetectorConfig {
  url: string;
  confidence: number;
  imageSize: number;
  timeoutMs: number;
}

export type GeometryMode = 'polygon' | 'bbox';

export interface OccupancyConfig {
  vehicleClasses: number[];
  minBoxArea: number;
  shrinkMargin: number;
  footprintFraction: number;
  overlapFraction: number;
  smoothingWindow: number;
  geometry: GeometryMode;
}

export interface PipelineConfig {
  captureIntervalMs: number;
  captureBackoffMs: number;
  fetchTimeoutMs: number;
  detectIntervalMs: number;
  detectPollMs: number;
  settleDelayMs: number;
  restartBackoffMs: number;
  stallTimeoutMs: number;
  watchdogIntervalMs: number;
}

export interface RenderConfig {
  jpegQuality: number;
  drawDetections: boolean;
}

// API types
export interface ApiResponse<T> {
  data: T;
  meta?: Record<string, unknown>;
  error?: {
    message: string;
    code: string;
  };
}

export interface HealthStatus {
  status: 'healthy' | 'unhealthy' | 'degraded';
  timestamp: string;
  version: string;
  uptime: number;
  services: {
    database: 'connected' | 'disconnected' | 'error';
    storage: 'writable' | 'readonly' | 'error';
  };
  pipelines: number;
}
