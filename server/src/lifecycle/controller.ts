import type { Logger } from 'pino';
import type { CameraProvider } from '../camera/provider.js';
import type { TunnelService } from '../tunnel/cloudflared.js';
import type { Notifier } from '../notify/email.js';

export type ShutdownStep = () => Promise<void> | void;

export type LifecycleOptions = {
  camera: CameraProvider;
  logger: Logger;
  tunnel?: TunnelService | null;
  notifier?: Notifier | null;
  localUrl: string;
  checkInternet?: () => Promise<boolean>;
};

/**
 * Starts the camera before the server takes traffic and tears everything down
 * in order at exit. Streams observe shutdown through `streamSignal`.
 */
export class LifecycleController {
  private readonly camera: CameraProvider;
  private readonly logger: Logger;
  private readonly tunnel: TunnelService | null;
  private readonly notifier: Notifier | null;
  private readonly localUrl: string;
  private readonly checkInternet: () => Promise<boolean>;
  private readonly streams = new AbortController();
  private readonly extraSteps: Array<{ name: string; step: ShutdownStep }> = [];
  private shuttingDown: Promise<void> | null = null;

  constructor(options: LifecycleOptions) {
    this.camera = options.camera;
    this.logger = options.logger;
    this.tunnel = options.tunnel ?? null;
    this.notifier = options.notifier ?? null;
    this.localUrl = options.localUrl;
    this.checkInternet = options.checkInternet ?? (() => Promise.resolve(true));
  }

  get streamSignal(): AbortSignal {
    return this.streams.signal;
  }

  isAcceptingStreams(): boolean {
    return !this.streams.signal.aborted;
  }

  getTunnelUrl(): string | null {
    return this.tunnel?.getUrl() ?? null;
  }

  async startup(): Promise<boolean> {
    if (this.camera.kind === 'unavailable') {
      this.logger.error({ reason: this.camera.reason }, 'camera unavailable, video will show the offline placeholder');
      return false;
    }
    try {
      await this.camera.producer.start(this.camera.settings);
    } catch (error) {
      this.logger.error({ err: error }, 'camera failed to start');
    }
    const running = this.camera.producer.isRunning();
    if (running) {
      this.logger.info('camera running');
    } else {
      this.logger.warn('camera not running, video will show the offline placeholder');
    }
    return running;
  }

  /** Opens the tunnel (when enabled) and tells the operator where to connect. */
  async announce(port: number): Promise<string> {
    let accessUrl = this.localUrl;

    if (this.tunnel && !this.shuttingDown) {
      try {
        if (await this.checkInternet()) {
          const url = await this.tunnel.start(port);
          if (url) accessUrl = url;
        } else {
          this.logger.warn('no internet connection, skipping tunnel');
        }
      } catch (error) {
        this.logger.error({ err: error }, 'tunnel startup failed');
      }
    }

    if (this.notifier) {
      try {
        await this.notifier.notifyReady(accessUrl, this.localUrl);
      } catch (error) {
        this.logger.error({ err: error }, 'notification failed');
      }
    }
    return accessUrl;
  }

  /** Runs `task`; when it throws, shuts everything down before rethrowing. */
  async shutdownOnFailure<T>(task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      this.logger.error({ err: error }, 'startup failed, shutting down');
      await this.shutdown();
      throw error;
    }
  }

  onShutdown(name: string, step: ShutdownStep): void {
    this.extraSteps.push({ name, step });
  }

  shutdown(): Promise<void> {
    if (!this.shuttingDown) {
      this.shuttingDown = this.runShutdown();
    }
    return this.shuttingDown;
  }

  private async runShutdown(): Promise<void> {
    this.logger.info('shutting down');
    this.streams.abort();

    if (this.camera.kind === 'available') {
      const { producer } = this.camera;
      await this.isolate('camera', () => producer.stop());
    }
    if (this.tunnel) {
      const { tunnel } = this;
      await this.isolate('tunnel', () => tunnel.stop());
    }
    for (const { name, step } of this.extraSteps) {
      await this.isolate(name, step);
    }
    this.logger.info('shutdown complete');
  }

  private async isolate(name: string, step: ShutdownStep): Promise<void> {
    try {
      await step();
    } catch (error) {
      this.logger.error({ err: error, step: name }, 'shutdown step failed');
    }
  }
}
