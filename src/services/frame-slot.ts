import { promises as fs } from 'fs';

export interface FrameSnapshot {
  version: number;
  path: string;
  capturedAt: Date;
}

/**
 * Single-slot handoff between a lot's capture and detect tasks.
 *
 * The capture side writes to a temp file and renames it over the slot path,
 * so the detect side reads either the previous or the new frame, never a
 * partial one. The directory must already exist (created on lot start).
 * `version` is the modification marker detect compares against;
 * there is no queue, a newer frame simply replaces an unprocessed one.
 */
export class FrameSlot {
  private version = 0;
  private capturedAt: Date | null = null;

  constructor(public readonly path: string) {}

  async publish(frame: Buffer): Promise<FrameSnapshot> {
    const tmpPath = `${this.path}.tmp`;
    await fs.writeFile(tmpPath, frame);
    await fs.rename(tmpPath, this.path);

    this.version += 1;
    this.capturedAt = new Date();
    return { version: this.version, path: this.path, capturedAt: this.capturedAt };
  }

  current(): FrameSnapshot | null {
    if (!this.capturedAt) return null;
    return { version: this.version, path: this.path, capturedAt: this.capturedAt };
  }

  async read(): Promise<Buffer> {
    return fs.readFile(this.path);
  }
}
