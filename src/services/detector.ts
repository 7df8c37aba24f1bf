/**
 * Client for the external vehicle detector.
 *
 * The detector is a stateless inference endpoint: JPEG in, boxes out. The
 * response shape matches the YOLO inference server used across our camera
 * services:
 *
 *   { "detections": [{ "class": "car" | 2, "confidence": 0.81,
 *                      "bounding_box": { "x": 10, "y": 20, "width": 80, "height": 40 } }] }
 *
 * Order of returned boxes carries no meaning.
 */

import { z } from 'zod';
import { detectorConfig } from '@/config';
import { DetectionBox, DetectorConfig } from '@/types';
import { DetectorError } from '@/utils/errors';
import { errorMessage } from '@/utils';
import { logger } from '@/utils/logger';

export interface Detector {
  detect(image: Buffer, confidence: number): Promise<DetectionBox[]>;
}

// COCO ids of the classes the detector reports by name
const CLASS_IDS: Record<string, number> = {
  person: 0,
  bicycle: 1,
  car: 2,
  motorcycle: 3,
  bus: 5,
  train: 6,
  truck: 7,
};

const detectionSchema = z.object({
  class: z.union([z.number(), z.string()]),
  confidence: z.number(),
  bounding_box: z.object({
    x: z.number(),
    y: z.number(),
    width: z.number().nonnegative(),
    height: z.number().nonnegative(),
  }),
});

const detectorResponseSchema = z.object({
  detections: z.array(detectionSchema),
});

type RawDetection = z.infer<typeof detectionSchema>;

export const resolveClassId = (value: number | string): number => {
  if (typeof value === 'number') return value;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return parseInt(trimmed, 10);
  return CLASS_IDS[trimmed.toLowerCase()] ?? -1;
};

export const toDetectionBox = (raw: RawDetection): DetectionBox => ({
  x1: raw.bounding_box.x,
  y1: raw.bounding_box.y,
  x2: raw.bounding_box.x + raw.bounding_box.width,
  y2: raw.bounding_box.y + raw.bounding_box.height,
  classId: resolveClassId(raw.class),
  confidence: raw.confidence,
});

export const parseDetectorResponse = (body: unknown): DetectionBox[] => {
  const parsed = detectorResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new DetectorError(`Unexpected detector response: ${parsed.error.issues[0].message}`);
  }
  return parsed.data.detections.map(toDetectionBox);
};

export class HttpDetector implements Detector {
  constructor(private readonly config: DetectorConfig = detectorConfig) {}

  async detect(image: Buffer, confidence: number): Promise<DetectionBox[]> {
    const url = new URL(this.config.url);
    url.searchParams.set('conf', String(confidence));
    url.searchParams.set('imgsz', String(this.config.imageSize));

    const start = Date.now();
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'image/jpeg' },
        body: image,
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new DetectorError(`Detector request failed: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      throw new DetectorError(`Detector responded with HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new DetectorError(`Detector returned invalid JSON: ${errorMessage(error)}`);
    }

    const boxes = parseDetectorResponse(body);
    logger.debug('Detector call completed', { boxes: boxes.length, duration: Date.now() - start });
    return boxes;
  }
}
