import { config } from 'dotenv';
import {
  DatabaseConfig,
  DetectorConfig,
  GeometryMode,
  OccupancyConfig,
  PipelineConfig,
  RenderConfig,
  StorageConfig,
} from '@/types';

config();

const requiredEnvVars = [
  'DB_PASSWORD',
  'DETECTOR_URL',
] as const;

for (const envVar of requiredEnvVars) {
  if (!process.env[envVar]) {
    throw new Error(`Missing required environment variable: ${envVar}`);
  }
}

const parseFloatSafe = (value: string | undefined, defaultValue: number): number => {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
};

const parseIntList = (value: string | undefined, defaultValue: number[]): number[] => {
  if (!value) return defaultValue;
  const parsed = value.split(',').map(v => parseInt(v.trim(), 10)).filter(v => !isNaN(v));
  return parsed.length ? parsed : defaultValue;
};

const geometryMode = (value: string | undefined): GeometryMode =>
  value === 'bbox' ? 'bbox' : 'polygon';

export const appConfig = {
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.API_PORT || '3001', 10),
  basePath: process.env.API_BASE_PATH || '/api',

  cors: {
    origin: process.env.CORS_ORIGIN || 'http://localhost:3000',
    credentials: process.env.CORS_CREDENTIALS === 'true',
  },

  security: {
    trustProxy: process.env.TRUST_PROXY === 'true',
  },

  rateLimit: {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '60000', 10),
    maxRequests: parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '120', 10),
  },

  logging: {
    level: process.env.LOG_LEVEL || 'info',
    format: process.env.LOG_FORMAT || 'simple',
    filePath: process.env.LOG_FILE_PATH,
    logDatabaseQueries: process.env.LOG_DATABASE_QUERIES === 'true',
  },

  health: {
    timeout: parseInt(process.env.HEALTH_CHECK_TIMEOUT || '5000', 10),
  },

  features: {
    autostartLots: process.env.AUTOSTART_LOTS !== 'false',
    watchdog: process.env.ENABLE_PIPELINE_WATCHDOG !== 'false',
  },
};

export const databaseConfig: DatabaseConfig = {
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432', 10),
  database: process.env.DB_NAME || 'lot_occupancy',
  username: process.env.DB_USER || 'lot_occupancy',
  password: process.env.DB_PASSWORD || '',
  maxConnections: parseInt(process.env.DB_MAX_CONNECTIONS || '10', 10),
  idleTimeout: parseInt(process.env.DB_IDLE_TIMEOUT || '30000', 10),
  connectionTimeout: parseInt(process.env.DB_CONNECTION_TIMEOUT || '5000', 10),
};

export const storageConfig: StorageConfig = {
  dataRoot: process.env.DATA_ROOT || 'data',
  retentionKeep: parseInt(process.env.RETENTION_KEEP || '5', 10),
};

export const detectorConfig: DetectorConfig = {
  url: process.env.DETECTOR_URL || '',
  confidence: parseFloatSafe(process.env.DETECTOR_CONFIDENCE, 0.2),
  imageSize: parseInt(process.env.DETECTOR_IMAGE_SIZE || '1280', 10),
  timeoutMs: parseInt(process.env.DETECTOR_TIMEOUT_MS || '15000', 10),
};

export const occupancyConfig: OccupancyConfig = {
  vehicleClasses: parseIntList(process.env.VEHICLE_CLASSES, [2, 3, 5, 7]),
  minBoxArea: parseFloatSafe(process.env.MIN_BOX_AREA, 800),
  shrinkMargin: parseFloatSafe(process.env.BOX_SHRINK_MARGIN, 10),
  footprintFraction: parseFloatSafe(process.env.BOX_FOOTPRINT_FRACTION, 0.6),
  overlapFraction: parseFloatSafe(process.env.STALL_OVERLAP_FRACTION, 0.3),
  smoothingWindow: parseInt(process.env.SMOOTHING_WINDOW || '3', 10),
  geometry: geometryMode(process.env.OCCUPANCY_GEOMETRY),
};

export const pipelineConfig: PipelineConfig = {
  captureIntervalMs: parseInt(process.env.CAPTURE_INTERVAL_MS || '2000', 10),
  captureBackoffMs: parseInt(process.env.CAPTURE_BACKOFF_MS || '1000', 10),
  fetchTimeoutMs: parseInt(process.env.FETCH_TIMEOUT_MS || '10000', 10),
  detectIntervalMs: parseInt(process.env.DETECT_INTERVAL_MS || '2000', 10),
  detectPollMs: parseInt(process.env.DETECT_POLL_MS || '500', 10),
  settleDelayMs: parseInt(process.env.SETTLE_DELAY_MS || '1000', 10),
  restartBackoffMs: parseInt(process.env.RESTART_BACKOFF_MS || '5000', 10),
  stallTimeoutMs: parseInt(process.env.STALL_TIMEOUT_MS || '60000', 10),
  watchdogIntervalMs: parseInt(process.env.WATCHDOG_INTERVAL_MS || '15000', 10),
};

export const renderConfig: RenderConfig = {
  jpegQuality: parseInt(process.env.RENDER_JPEG_QUALITY || '85', 10),
  drawDetections: process.env.RENDER_DRAW_DETECTIONS !== 'false',
};

export const isDevelopment = appConfig.nodeEnv === 'development';
export const isProduction = appConfig.nodeEnv === 'production';
