import readline from 'readline';
import type { Logger } from 'pino';
import type { CaptureDevice, CaptureSettings } from './capture_device.js';
import { DeviceFaultError, DeviceUnavailableError } from './errors.js';
import { JpegSplitter } from './jpeg_splitter.js';
import {
  spawnChild,
  terminate,
  waitForSpawn,
  hasExited,
  type ChildHandle,
  type SpawnChild
} from '../process/child.js';

export type FfmpegDeviceOptions = {
  ffmpegPath: string;
  inputFormat: string;
  device: string;
  settings: CaptureSettings;
  logger: Logger;
  spawn?: SpawnChild;
  closeGraceMs?: number;
};

type Waiter = {
  resolve: (frame: Buffer) => void;
  reject: (error: Error) => void;
};

/** Maps JPEG quality (1-100, higher is better) onto ffmpeg's mjpeg -q:v scale (2-31, lower is better). */
export function toFfmpegQuality(quality: number): number {
  const clamped = Math.min(100, Math.max(1, quality));
  return Math.round(31 - ((clamped - 1) / 99) * 29);
}

export function buildFfmpegArgs(options: Pick<FfmpegDeviceOptions, 'inputFormat' | 'device' | 'settings'>): string[] {
  const { width, height, frameRate, quality } = options.settings;
  return [
    '-hide_banner',
    '-loglevel', 'error',
    '-f', options.inputFormat,
    '-framerate', String(frameRate),
    '-video_size', `${width}x${height}`,
    '-i', options.device,
    '-vf', `scale=${width}:${height}`,
    '-r', String(frameRate),
    '-c:v', 'mjpeg',
    '-q:v', String(toFfmpegQuality(quality)),
    '-f', 'image2pipe',
    'pipe:1'
  ];
}

/**
 * Camera backed by an ffmpeg child process writing MJPEG to stdout. Only the
 * newest unread frame is kept; a slow reader skips frames rather than queueing
 * them.
 */
export class FfmpegCaptureDevice implements CaptureDevice {
  private readonly options: FfmpegDeviceOptions;
  private readonly spawn: SpawnChild;
  private readonly splitter = new JpegSplitter();
  private proc: ChildHandle | null = null;
  private latest: Buffer | null = null;
  private waiter: Waiter | null = null;
  private failure: Error | null = null;
  private closing: Promise<void> | null = null;

  constructor(options: FfmpegDeviceOptions) {
    this.options = options;
    this.spawn = options.spawn ?? spawnChild;
  }

  async open(): Promise<void> {
    if (this.proc) return;
    const args = buildFfmpegArgs(this.options);
    this.options.logger.debug({ args }, 'spawning ffmpeg');
    const proc = this.spawn(this.options.ffmpegPath, args);
    this.proc = proc;

    try {
      await waitForSpawn(proc);
    } catch (error) {
      this.proc = null;
      throw new DeviceUnavailableError(`Could not start ${this.options.ffmpegPath}`, { cause: error });
    }

    proc.stdout.on('data', (chunk: Buffer) => {
      for (const frame of this.splitter.push(chunk)) {
        this.deliver(frame);
      }
    });

    const lines = readline.createInterface({ input: proc.stderr });
    lines.on('line', (line) => {
      if (line.trim()) {
        this.options.logger.warn({ line: line.trim() }, 'ffmpeg');
      }
    });

    proc.once('exit', (code, signal) => {
      this.fail(new DeviceFaultError(`ffmpeg exited (code=${code ?? 'null'}, signal=${signal ?? 'none'})`));
    });
  }

  grab(): Promise<Buffer> {
    if (this.latest) {
      const frame = this.latest;
      this.latest = null;
      return Promise.resolve(frame);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (!this.proc) {
      return Promise.reject(new DeviceFaultError('Device is not open'));
    }
    if (this.waiter) {
      return Promise.reject(new DeviceFaultError('A grab is already pending'));
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  isAlive(): boolean {
    return this.proc !== null && !hasExited(this.proc) && !this.failure;
  }

  private async shutdown(): Promise<void> {
    this.fail(new DeviceFaultError('Device closed'));
    const proc = this.proc;
    if (!proc) return;
    await terminate(proc, this.options.closeGraceMs ?? 1000);
    this.splitter.reset();
    this.latest = null;
  }

  private deliver(frame: Buffer) {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.resolve(frame);
      return;
    }
    this.latest = frame;
  }

  private fail(error: Error) {
    if (!this.failure) {
      this.failure = error;
    }
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.reject(this.failure);
  }
}
