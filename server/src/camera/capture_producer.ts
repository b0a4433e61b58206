import { setTimeout as sleep } from 'timers/promises';
import type { Logger } from 'pino';
import type { CaptureDevice, CaptureDeviceFactory, CaptureSettings } from './capture_device.js';
import { DeviceUnavailableError } from './errors.js';
import type { FrameSlot } from './frame_slot.js';

export type CaptureState = 'stopped' | 'starting' | 'running' | 'stopping';

export type CaptureProducerOptions = {
  createDevice: CaptureDeviceFactory;
  slot: FrameSlot;
  logger: Logger;
  warmupMs?: number;
  stopTimeoutMs?: number;
};

/** Wraps a device so that `close` reaches it at most once. */
class DeviceHandle {
  readonly device: CaptureDevice;
  private closing: Promise<void> | null = null;

  constructor(device: CaptureDevice) {
    this.device = device;
  }

  release(): Promise<void> {
    if (!this.closing) {
      this.closing = this.device.close();
    }
    return this.closing;
  }
}

/** Resolves true if `task` settled within `timeoutMs`. */
async function settlesWithin(task: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  const timeout = new AbortController();
  try {
    return await Promise.race([
      task.then(
        () => true,
        () => true
      ),
      sleep(timeoutMs, false, { signal: timeout.signal })
    ]);
  } finally {
    timeout.abort();
  }
}

/**
 * Owns the camera device and runs the capture loop that feeds the frame slot.
 *
 * stopped -> starting -> running -> stopping -> stopped. The device is opened
 * only while starting and released exactly once on the way back to stopped,
 * whichever path gets there (stop, open failure or a fault in the loop).
 */
export class CaptureProducer {
  private readonly createDevice: CaptureDeviceFactory;
  private readonly slot: FrameSlot;
  private readonly logger: Logger;
  private readonly warmupMs: number;
  private readonly stopTimeoutMs: number;

  private state: CaptureState = 'stopped';
  private settings: CaptureSettings | null = null;
  private handle: DeviceHandle | null = null;
  private task: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private warmup: AbortController | null = null;

  constructor(options: CaptureProducerOptions) {
    this.createDevice = options.createDevice;
    this.slot = options.slot;
    this.logger = options.logger;
    this.warmupMs = options.warmupMs ?? 2000;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 3000;
  }

  getState(): CaptureState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  getSettings(): CaptureSettings | null {
    return this.settings;
  }

  async start(settings: CaptureSettings): Promise<void> {
    while (this.stopping) {
      await this.stopping;
    }
    if (this.state === 'running' || this.state === 'starting') {
      this.logger.info({ state: this.state }, 'capture already started');
      return;
    }

    this.state = 'starting';
    this.settings = settings;
    const handle = new DeviceHandle(this.createDevice(settings));
    this.handle = handle;
    const warmup = new AbortController();
    this.warmup = warmup;

    try {
      this.logger.info(settings, 'opening camera');
      await handle.device.open();
      if (this.warmupMs > 0) {
        this.logger.info({ warmupMs: this.warmupMs }, 'camera warming up');
        await sleep(this.warmupMs, undefined, { signal: warmup.signal });
      }
      if (this.handle === handle && !handle.device.isAlive()) {
        throw new DeviceUnavailableError('Camera stopped during warm-up');
      }
    } catch (error) {
      this.warmup = null;
      if (this.handle !== handle) {
        this.logger.info('camera start cancelled');
        await this.releaseQuietly(handle);
        return;
      }
      await this.releaseQuietly(handle);
      this.handle = null;
      this.state = 'stopped';
      if (error instanceof DeviceUnavailableError) throw error;
      throw new DeviceUnavailableError('Camera could not be opened', { cause: error });
    }
    this.warmup = null;

    if (this.handle !== handle || this.state !== 'starting') {
      this.logger.info('camera start cancelled');
      await this.releaseQuietly(handle);
      return;
    }

    this.state = 'running';
    this.task = this.captureLoop(handle);
    this.logger.info(
      { width: settings.width, height: settings.height, frameRate: settings.frameRate, quality: settings.quality },
      'camera capture started'
    );
  }

  stop(): Promise<void> {
    if (this.stopping) return this.stopping;
    if (this.state === 'stopped') {
      this.slot.clear();
      return Promise.resolve();
    }
    this.stopping = this.shutdown().finally(() => {
      this.stopping = null;
    });
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.logger.info({ state: this.state }, 'stopping camera');
    this.state = 'stopping';
    this.warmup?.abort();

    const handle = this.handle;
    const task = this.task;
    this.handle = null;
    this.task = null;

    if (task && !(await settlesWithin(task, this.stopTimeoutMs))) {
      this.logger.warn({ timeoutMs: this.stopTimeoutMs }, 'capture task did not exit in time, forcing device release');
    }
    if (handle) {
      const closed = settlesWithin(this.releaseQuietly(handle), this.stopTimeoutMs);
      if (!(await closed)) {
        this.logger.warn('camera close did not finish in time');
      }
    }

    this.slot.clear();
    this.state = 'stopped';
    this.logger.info('camera stopped');
  }

  private async captureLoop(handle: DeviceHandle): Promise<void> {
    const current = () => this.handle === handle && this.state === 'running';
    try {
      while (current()) {
        const frame = await handle.device.grab();
        if (!current()) break;
        this.slot.publish(frame);
      }
    } catch (error) {
      if (current()) {
        this.logger.error({ err: error }, 'camera fault, capture stopped');
      } else {
        this.logger.debug({ err: error }, 'capture loop ended during stop');
      }
    } finally {
      await this.releaseQuietly(handle);
      if (current()) {
        this.handle = null;
        this.task = null;
        this.slot.clear();
        this.state = 'stopped';
      }
    }
  }

  private async releaseQuietly(handle: DeviceHandle): Promise<void> {
    try {
      await handle.release();
    } catch (error) {
      this.logger.error({ err: error }, 'failed to close camera');
    }
  }
}
