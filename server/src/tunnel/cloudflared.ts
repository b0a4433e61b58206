import readline from 'readline';
import type { Logger } from 'pino';
import {
  hasExited,
  spawnChild,
  terminate,
  waitForSpawn,
  type ChildHandle,
  type SpawnChild
} from '../process/child.js';

export const TUNNEL_URL_PATTERN = /(https:\/\/[-a-zA-Z0-9._]+\.trycloudflare\.com)/;

export type TunnelOptions = {
  command: string;
  timeoutMs: number;
  logger: Logger;
  spawn?: SpawnChild;
  /** Grace period before SIGKILL when a launch is abandoned. */
  abortGraceMs?: number;
  /** Grace period before SIGKILL at shutdown. */
  stopGraceMs?: number;
};

/**
 * Runs a cloudflared quick tunnel and picks the public URL out of its log
 * output. At most one tunnel process exists at a time.
 */
export class TunnelService {
  private readonly options: TunnelOptions;
  private readonly spawn: SpawnChild;
  private proc: ChildHandle | null = null;
  private readers: readline.Interface[] = [];
  private url: string | null = null;

  constructor(options: TunnelOptions) {
    this.options = options;
    this.spawn = options.spawn ?? spawnChild;
  }

  getUrl(): string | null {
    return this.url;
  }

  isRunning(): boolean {
    return this.proc !== null;
  }

  async start(localPort: number): Promise<string | null> {
    if (this.proc) return this.url;
    const { command, logger } = this.options;
    const args = ['tunnel', '--url', `http://localhost:${localPort}`, '--no-autoupdate'];

    logger.info({ command, args }, 'starting tunnel');
    const proc = this.spawn(command, args);
    this.proc = proc;
    try {
      await waitForSpawn(proc);
    } catch (error) {
      logger.error({ err: error, command }, 'could not launch cloudflared, is it installed and on PATH?');
      if (this.proc === proc) this.proc = null;
      return null;
    }
    if (this.proc !== proc) {
      logger.info('tunnel stopped while launching');
      return null;
    }

    const url = await this.waitForUrl(proc);
    if (this.proc !== proc) {
      logger.info('tunnel stopped while waiting for its URL');
      return null;
    }
    if (!url) {
      logger.error('failed to obtain a tunnel URL');
      await this.release(this.options.abortGraceMs ?? 2000);
      return null;
    }
    this.url = url;
    logger.info({ url }, 'tunnel established');
    return url;
  }

  async stop(): Promise<void> {
    if (!this.proc) return;
    this.options.logger.info('terminating tunnel');
    await this.release(this.options.stopGraceMs ?? 3000);
    this.options.logger.info('tunnel terminated');
  }

  private async release(graceMs: number): Promise<void> {
    const proc = this.proc;
    this.proc = null;
    this.url = null;
    for (const reader of this.readers) reader.close();
    this.readers = [];
    if (proc) {
      await terminate(proc, graceMs);
    }
  }

  private waitForUrl(proc: ChildHandle): Promise<string | null> {
    const { logger, timeoutMs } = this.options;
    return new Promise((resolve) => {
      let pending = true;
      const finish = (url: string | null) => {
        if (!pending) return;
        pending = false;
        clearTimeout(timer);
        proc.off('exit', onExit);
        resolve(url);
      };

      // both streams keep being drained after the URL shows up
      const onLine = (raw: string) => {
        const line = raw.trim();
        if (!line) return;
        if (!pending) {
          logger.debug({ line }, 'tunnel output');
          return;
        }
        logger.info({ line }, 'tunnel output');
        const match = line.match(TUNNEL_URL_PATTERN);
        if (match) {
          finish(match[1]);
          return;
        }
        const lowered = line.toLowerCase();
        if (lowered.includes('failed') || lowered.includes('error')) {
          logger.error({ line }, 'cloudflared reported an error');
          finish(null);
        }
      };

      const onExit = (code: number | null) => {
        logger.error({ code }, 'cloudflared exited before publishing a URL');
        finish(null);
      };

      const timer = setTimeout(() => {
        logger.warn({ timeoutMs }, 'timed out waiting for the tunnel URL');
        finish(null);
      }, timeoutMs);

      if (hasExited(proc)) {
        onExit(proc.exitCode);
        return;
      }
      proc.once('exit', onExit);
      this.readers = [proc.stdout, proc.stderr].map((input) => {
        const reader = readline.createInterface({ input });
        reader.on('line', onLine);
        return reader;
      });
    });
  }
}
