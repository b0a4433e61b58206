import { setTimeout as sleep } from 'timers/promises';
import type { Logger } from 'pino';
import { isCameraLive, latestFrame, type CameraProvider } from '../camera/provider.js';
import { encodePart } from './multipart.js';
import type { PlaceholderSource } from './placeholder.js';

export type StreamPacing = {
  /** Upper bound on parts per second sent to one client. */
  maxFps: number;
  offlineIntervalMs: number;
  freshnessMs: number;
};

export type StreamSessionOptions = {
  camera: CameraProvider;
  placeholders: PlaceholderSource;
  pacing: StreamPacing;
  logger: Logger;
  now?: () => number;
};

/** Sleeps unless the signal fires first. Returns false when aborted. */
async function pause(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return false;
  try {
    await sleep(Math.max(0, ms), undefined, { signal });
    return true;
  } catch {
    return false;
  }
}

/**
 * One client's view of the camera: an endless sequence of multipart JPEG
 * parts, paced independently of the capture rate. Only reads shared state.
 */
export class StreamSession {
  private readonly camera: CameraProvider;
  private readonly placeholders: PlaceholderSource;
  private readonly pacing: StreamPacing;
  private readonly logger: Logger;
  private readonly now: () => number;
  private lastSentAt: number | null = null;

  constructor(options: StreamSessionOptions) {
    this.camera = options.camera;
    this.placeholders = options.placeholders;
    this.pacing = options.pacing;
    this.logger = options.logger;
    this.now = options.now ?? (() => performance.now());
  }

  /** When the last part was handed to the client, on the session clock. */
  get lastSent(): number | null {
    return this.lastSentAt;
  }

  get minIntervalMs(): number {
    return 1000 / this.pacing.maxFps;
  }

  async *frames(signal: AbortSignal): AsyncGenerator<Buffer, void, undefined> {
    try {
      while (!signal.aborted) {
        if (!isCameraLive(this.camera)) {
          const kind = this.camera.kind === 'available' ? 'offline' : 'missing';
          const image = await this.placeholders.render(kind);
          if (signal.aborted) return;
          if (image && image.length > 0) {
            this.lastSentAt = this.now();
            yield encodePart(image);
          }
          if (!(await pause(this.pacing.offlineIntervalMs, signal))) return;
          continue;
        }

        const frame = latestFrame(this.camera);
        if (frame && frame.ageMs < this.pacing.freshnessMs) {
          const sentAt = this.now();
          this.lastSentAt = sentAt;
          yield encodePart(frame.bytes);
          // time spent waiting on the client counts towards the interval
          if (!(await pause(this.minIntervalMs - (this.now() - sentAt), signal))) return;
          continue;
        }

        if (!(await pause(this.minIntervalMs / 2, signal))) return;
      }
    } catch (error) {
      this.logger.error({ err: error }, 'stream session failed');
    } finally {
      this.logger.debug('stream session ended');
    }
  }
}
