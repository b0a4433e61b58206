import net from 'net';
import type { Logger } from 'pino';
import type { MotorCommand } from './commands.js';
import { canConnect } from '../net/network.js';

export type RelayResult =
  | { ok: true; message: string }
  | { ok: false; error: 'timeout' | 'socket_error'; message: string };

/** Point-to-point link to the motor controller. */
export interface MotorRelay {
  readonly target: string;
  send(command: MotorCommand): Promise<RelayResult>;
  isReachable(): Promise<boolean>;
}

export type TcpRelayOptions = {
  host: string;
  port: number;
  timeoutMs?: number;
  probeTimeoutMs?: number;
  logger: Logger;
};

/**
 * Sends each command as a single ASCII byte over its own short-lived TCP
 * connection. Nothing is retried; callers re-issue on failure.
 */
export class TcpMotorRelay implements MotorRelay {
  private readonly options: TcpRelayOptions;

  constructor(options: TcpRelayOptions) {
    this.options = options;
  }

  get target(): string {
    return `${this.options.host}:${this.options.port}`;
  }

  send(command: MotorCommand): Promise<RelayResult> {
    const { host, port, logger } = this.options;
    return new Promise((resolve) => {
      const socket = net.createConnection({ host, port });
      let settled = false;
      const finish = (result: RelayResult) => {
        if (settled) return;
        settled = true;
        socket.destroy();
        if (!result.ok) {
          logger.error({ command, target: this.target, error: result.error }, result.message);
        }
        resolve(result);
      };

      socket.setTimeout(this.options.timeoutMs ?? 1000);
      socket.once('connect', () => {
        socket.end(Buffer.from(command, 'ascii'), () => {
          finish({ ok: true, message: `Command '${command}' sent to motor controller.` });
        });
      });
      socket.on('timeout', () => {
        finish({ ok: false, error: 'timeout', message: `Timeout sending '${command}' to motor controller.` });
      });
      socket.on('error', (error) => {
        finish({ ok: false, error: 'socket_error', message: `Socket error sending '${command}': ${error.message}` });
      });
    });
  }

  isReachable(): Promise<boolean> {
    return canConnect(this.options.host, this.options.port, this.options.probeTimeoutMs ?? 500);
  }
}
