import { DetectorConfig } from '@/types';
import { DetectorError } from '@/utils/errors';
import { HttpDetector, parseDetectorResponse, resolveClassId } from '../detector';

const config: DetectorConfig = {
  url: 'http://detector.test/predict',
  confidence: 0.2,
  imageSize: 1280,
  timeoutMs: 1000,
};

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('detector', () => {
  describe('resolveClassId', () => {
    it('should map class names and numeric strings to ids', () => {
      expect(resolveClassId(7)).toBe(7);
      expect(resolveClassId('Car')).toBe(2);
      expect(resolveClassId('truck')).toBe(7);
      expect(resolveClassId(' 5 ')).toBe(5);
    });

    it('should map unknown names to -1', () => {
      expect(resolveClassId('boat')).toBe(-1);
    });
  });

  describe('parseDetectorResponse', () => {
    it('should convert x/y/width/height boxes to corner coordinates', () => {
      const boxes = parseDetectorResponse({
        detections: [
          { class: 'car', confidence: 0.81, bounding_box: { x: 10, y: 20, width: 80, height: 40 } },
          { class: 3, confidence: 0.4, bounding_box: { x: 0, y: 0, width: 5, height: 5 } },
        ],
      });

      expect(boxes).toEqual([
        { x1: 10, y1: 20, x2: 90, y2: 60, classId: 2, confidence: 0.81 },
        { x1: 0, y1: 0, x2: 5, y2: 5, classId: 3, confidence: 0.4 },
      ]);
    });

    it('should accept an empty detection list', () => {
      expect(parseDetectorResponse({ detections: [] })).toEqual([]);
    });

    it('should reject a malformed response', () => {
      expect(() => parseDetectorResponse({ boxes: [] })).toThrow(DetectorError);
    });
  });

  describe('HttpDetector', () => {
    let fetchSpy: jest.SpiedFunction<typeof fetch>;

    beforeEach(() => {
      fetchSpy = jest.spyOn(global, 'fetch');
    });

    afterEach(() => {
      fetchSpy.mockRestore();
    });

    it('should post the frame with confidence and image size parameters', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({
        detections: [{ class: 'bus', confidence: 0.9, bounding_box: { x: 1, y: 2, width: 3, height: 4 } }],
      }));
      const frame = Buffer.from([0xff, 0xd8, 0xff, 0xd9]);

      const boxes = await new HttpDetector(config).detect(frame, 0.35);

      expect(boxes).toEqual([{ x1: 1, y1: 2, x2: 4, y2: 6, classId: 5, confidence: 0.9 }]);
      const [url, init] = fetchSpy.mock.calls[0];
      expect(String(url)).toBe('http://detector.test/predict?conf=0.35&imgsz=1280');
      expect(init?.method).toBe('POST');
      expect(init?.body).toBe(frame);
    });

    it('should raise a DetectorError on an HTTP failure', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ error: 'overloaded' }, 503));

      await expect(new HttpDetector(config).detect(Buffer.alloc(4), 0.2)).rejects.toThrow(
        'Detector responded with HTTP 503'
      );
    });

    it('should raise a DetectorError when the request fails', async () => {
      fetchSpy.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      await expect(new HttpDetector(config).detect(Buffer.alloc(4), 0.2)).rejects.toThrow(
        'Detector request failed: connect ECONNREFUSED'
      );
    });
  });
});
