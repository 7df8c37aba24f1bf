/**
 * Frame sources for the capture task.
 *
 * The kind is picked by inspecting the lot's stream descriptor:
 * - `snapshot`: an HTTP(S) URL that answers one still image per request
 *   (`*.jpg`, `*.jpeg`, `*.png`, `cgi-bin` or `snapshot` paths)
 * - `mjpeg`: any other HTTP(S) URL, read as a continuous multipart JPEG stream
 * - `file`: a `file:` URL or a plain path, re-read on every cycle
 */

import { promises as fs } from 'fs';
import { fileURLToPath } from 'url';
import sharp from 'sharp';
import { SourceKind } from '@/types';
import { FrameSourceError } from '@/utils/errors';
import { errorMessage, validateImageFormat } from '@/utils';
import { logger } from '@/utils/logger';

export interface FrameSource {
  readonly kind: SourceKind;
  readonly descriptor: string;
  next(): Promise<Buffer>;
  close(): Promise<void>;
}

export interface FrameSourceOptions {
  timeoutMs: number;
}

const SNAPSHOT_PATTERN = /(\.(jpe?g|png)$)|(\/cgi-bin\/)|snapshot/i;

export const resolveSourceKind = (descriptor: string | null | undefined): SourceKind => {
  const value = descriptor?.trim();
  if (!value) {
    throw new FrameSourceError('No stream source configured');
  }

  const scheme = /^([a-z][a-z0-9+.-]*):\/\//i.exec(value)?.[1]?.toLowerCase();
  if (!scheme || scheme === 'file') return 'file';

  if (scheme !== 'http' && scheme !== 'https') {
    throw new FrameSourceError(`Unsupported stream source scheme: ${scheme}`);
  }

  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new FrameSourceError(`Invalid stream source URL: ${value}`);
  }

  return SNAPSHOT_PATTERN.test(url.pathname) || /action=snapshot/i.test(url.search)
    ? 'snapshot'
    : 'mjpeg';
};

const SOI = Buffer.from([0xff, 0xd8]);
const EOI = Buffer.from([0xff, 0xd9]);

/**
 * Splits a multipart MJPEG byte stream into complete JPEG images by scanning
 * for start/end-of-image markers; part headers and boundaries are skipped.
 */
export class MjpegFrameParser {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly maxBufferBytes: number = 16 * 1024 * 1024) {}

  push(chunk: Buffer): Buffer[] {
    this.buffer = this.buffer.length ? Buffer.concat([this.buffer, chunk]) : chunk;
    const frames: Buffer[] = [];

    for (;;) {
      const start = this.buffer.indexOf(SOI);
      if (start < 0) {
        // a trailing 0xFF may be the first half of the next marker
        this.buffer = this.buffer.subarray(Math.max(0, this.buffer.length - 1));
        break;
      }
      const end = this.buffer.indexOf(EOI, start + SOI.length);
      if (end < 0) {
        this.buffer = this.buffer.subarray(start);
        break;
      }
      frames.push(Buffer.from(this.buffer.subarray(start, end + EOI.length)));
      this.buffer = this.buffer.subarray(end + EOI.length);
    }

    if (this.buffer.length > this.maxBufferBytes) {
      this.buffer = Buffer.alloc(0);
    }
    return frames;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
  }
}

const ensureImage = (frame: Buffer, descriptor: string): Buffer => {
  if (!validateImageFormat(frame).isValid) {
    throw new FrameSourceError(`Source did not return an image: ${descriptor}`);
  }
  return frame;
};

export class SnapshotSource implements FrameSource {
  readonly kind = 'snapshot' as const;

  constructor(public readonly descriptor: string, private readonly options: FrameSourceOptions) {}

  async next(): Promise<Buffer> {
    let response: Response;
    try {
      response = await fetch(this.descriptor, { signal: AbortSignal.timeout(this.options.timeoutMs) });
    } catch (error) {
      throw new FrameSourceError(`Snapshot fetch failed: ${errorMessage(error)}`);
    }
    if (!response.ok) {
      throw new FrameSourceError(`Snapshot fetch failed with HTTP ${response.status}`);
    }
    return ensureImage(Buffer.from(await response.arrayBuffer()), this.descriptor);
  }

  async close(): Promise<void> {
    // stateless
  }
}

interface ChunkReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  cancel(): Promise<void>;
}

interface StreamSession {
  controller: AbortController;
  reader: ChunkReader;
  parser: MjpegFrameParser;
  latest: Buffer | null;
  seq: number;
  failure: FrameSourceError | null;
  listeners: Set<() => void>;
}

const notify = (session: StreamSession): void => {
  for (const listener of [...session.listeners]) listener();
};

/**
 * An open MJPEG stream is read continuously in the background and only the
 * newest complete frame is kept, so `next()` never returns a frame that was
 * queued behind newer ones. A failed or ended stream is reported by the next
 * `next()` call, and the call after that reopens it.
 */
export class MjpegStreamSource implements FrameSource {
  readonly kind = 'mjpeg' as const;
  private session: StreamSession | null = null;
  private consumed = 0;

  constructor(public readonly descriptor: string, private readonly options: FrameSourceOptions) {}

  private async open(): Promise<StreamSession> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    let reader: ChunkReader;
    try {
      const response = await fetch(this.descriptor, { signal: controller.signal });
      if (!response.ok || !response.body) {
        controller.abort();
        throw new FrameSourceError(`Stream open failed with HTTP ${response.status}`);
      }
      reader = response.body.getReader();
    } catch (error) {
      if (error instanceof FrameSourceError) throw error;
      throw new FrameSourceError(`Stream open failed: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timer);
    }

    const session: StreamSession = {
      controller,
      reader,
      parser: new MjpegFrameParser(),
      latest: null,
      seq: 0,
      failure: null,
      listeners: new Set(),
    };
    this.session = session;
    this.consumed = 0;

    this.pump(session).catch(error => {
      logger.error('Stream reader stopped', { descriptor: this.descriptor, error: errorMessage(error) });
    });
    return session;
  }

  private async readChunk(reader: ChunkReader): Promise<{ done: boolean; value?: Uint8Array }> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new FrameSourceError('Stream read timed out')),
        this.options.timeoutMs
      );
    });
    try {
      return await Promise.race([reader.read(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private fail(session: StreamSession, failure: FrameSourceError): void {
    session.failure ??= failure;
    notify(session);
  }

  private async pump(session: StreamSession): Promise<void> {
    while (this.session === session) {
      let chunk: { done: boolean; value?: Uint8Array };
      try {
        chunk = await this.readChunk(session.reader);
      } catch (error) {
        this.fail(
          session,
          error instanceof FrameSourceError ? error : new FrameSourceError(`Stream read failed: ${errorMessage(error)}`)
        );
        return;
      }

      if (chunk.done || !chunk.value) {
        this.fail(session, new FrameSourceError('Stream ended'));
        return;
      }

      const frames = session.parser.push(Buffer.from(chunk.value));
      if (frames.length) {
        session.latest = frames[frames.length - 1];
        session.seq++;
        notify(session);
      }
    }
  }

  // Resolves with the newest frame not yet returned, waiting up to timeoutMs for one
  private awaitFrame(session: StreamSession): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const settle = (): boolean => {
        if (session.latest && session.seq > this.consumed) {
          this.consumed = session.seq;
          resolve(session.latest);
          return true;
        }
        if (session.failure) {
          reject(session.failure);
          return true;
        }
        return false;
      };
      if (settle()) return;

      const listener = (): void => {
        if (!settle()) return;
        clearTimeout(timer);
        session.listeners.delete(listener);
      };
      const timer = setTimeout(() => {
        session.listeners.delete(listener);
        reject(new FrameSourceError('Stream read timed out'));
      }, this.options.timeoutMs);
      session.listeners.add(listener);
    });
  }

  async next(): Promise<Buffer> {
    const session = this.session ?? await this.open();
    let frame: Buffer;
    try {
      frame = await this.awaitFrame(session);
    } catch (error) {
      await this.close();
      throw error;
    }
    return ensureImage(frame, this.descriptor);
  }

  async close(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (!session) return;
    session.controller.abort();
    await session.reader.cancel().catch(error => {
      logger.debug('Stream reader cancel failed', { descriptor: this.descriptor, error: errorMessage(error) });
    });
  }
}

export class FileSource implements FrameSource {
  readonly kind = 'file' as const;
  private readonly filePath: string;

  constructor(public readonly descriptor: string) {
    this.filePath = descriptor.startsWith('file://') ? fileURLToPath(descriptor) : descriptor;
  }

  async next(): Promise<Buffer> {
    let frame: Buffer;
    try {
      frame = await fs.readFile(this.filePath);
    } catch (error) {
      throw new FrameSourceError(`Frame file unreadable: ${errorMessage(error)}`);
    }
    return ensureImage(frame, this.descriptor);
  }

  async close(): Promise<void> {
    // stateless
  }
}

export const createFrameSource = (descriptor: string, options: FrameSourceOptions): FrameSource => {
  const kind = resolveSourceKind(descriptor);
  const value = descriptor.trim();
  switch (kind) {
    case 'snapshot':
      return new SnapshotSource(value, options);
    case 'mjpeg':
      return new MjpegStreamSource(value, options);
    case 'file':
      return new FileSource(value);
  }
};

/**
 * Applies the lot's flip (camera mounted upside down: 180° rotation) and
 * normalizes non-JPEG sources to JPEG. Unflipped JPEG passes through as is.
 */
export const prepareFrame = async (frame: Buffer, flip: boolean): Promise<Buffer> => {
  const { format } = validateImageFormat(frame);
  if (!flip && format === 'jpeg') return frame;
  const image = sharp(frame);
  return (flip ? image.rotate(180) : image).jpeg({ quality: 90 }).toBuffer();
};
