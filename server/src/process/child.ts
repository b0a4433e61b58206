import { spawn } from 'child_process';
import type { Readable } from 'stream';

/** The slice of a spawned child process the camera and tunnel code rely on. */
export interface ChildHandle {
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  off(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnChild = (command: string, args: string[]) => ChildHandle;

export const spawnChild: SpawnChild = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

export function hasExited(child: ChildHandle): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

/** Resolves once the child is running, rejects if it could not be spawned. */
export function waitForSpawn(child: ChildHandle): Promise<void> {
  return new Promise((resolve, reject) => {
    child.once('spawn', () => resolve());
    child.once('error', reject);
  });
}

/** Resolves true if the child exited within `timeoutMs`. */
export function waitForExit(child: ChildHandle, timeoutMs: number): Promise<boolean> {
  if (hasExited(child)) return Promise.resolve(true);
  return new Promise((resolve) => {
    const onExit = () => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      child.off('exit', onExit);
      resolve(false);
    }, timeoutMs);
    child.once('exit', onExit);
  });
}

/** SIGTERM, then SIGKILL if the child is still alive after `graceMs`. */
export async function terminate(child: ChildHandle, graceMs: number): Promise<void> {
  if (hasExited(child)) return;
  child.kill('SIGTERM');
  if (await waitForExit(child, graceMs)) return;
  child.kill('SIGKILL');
  await waitForExit(child, graceMs);
}
