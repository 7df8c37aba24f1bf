import { Request, Response, NextFunction, RequestHandler } from 'express';

export * from './logger';

export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => (req, res, next) => {
  Promise.resolve(fn(req, res, next)).catch(next);
};

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects, so task
 * loops can sleep unconditionally and check `signal.aborted` afterwards.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const validateImageFormat = (buffer: Buffer): { isValid: boolean; format?: string } => {
  const signatures = {
    jpeg: [0xFF, 0xD8, 0xFF],
    png: [0x89, 0x50, 0x4E, 0x47],
    webp: [0x52, 0x49, 0x46, 0x46] // RIFF for WebP
  };

  for (const [format, signature] of Object.entries(signatures)) {
    const matches = signature.every((byte, index) => buffer[index] === byte);
    if (matches) {
      if (format === 'webp') {
        const webpCheck = buffer.subarray(8, 12);
        const isWebp = webpCheck.toString() === 'WEBP';
        if (isWebp) return { isValid: true, format };
      } else {
        return { isValid: true, format };
      }
    }
  }

  return { isValid: false };
};
