import { describe, it, expect } from 'vitest';
import { setImmediate as tick } from 'timers/promises';
import { FfmpegCaptureDevice, buildFfmpegArgs, toFfmpegQuality } from '../camera/ffmpeg_device.js';
import { DeviceFaultError, DeviceUnavailableError } from '../camera/errors.js';
import { FakeProcess, SETTINGS, jpeg, silentLogger } from './helpers/fakes.js';

function createDevice(proc: FakeProcess) {
  const calls: Array<{ command: string; args: string[] }> = [];
  const device = new FfmpegCaptureDevice({
    ffmpegPath: 'ffmpeg',
    inputFormat: 'v4l2',
    device: '/dev/video0',
    settings: SETTINGS,
    logger: silentLogger,
    closeGraceMs: 50,
    spawn: (command, args) => {
      calls.push({ command, args });
      setImmediate(() => proc.emit('spawn'));
      return proc;
    }
  });
  return { device, calls };
}

describe('toFfmpegQuality', () => {
  it('maps the JPEG quality range onto mjpeg q:v', () => {
    expect(toFfmpegQuality(100)).toBe(2);
    expect(toFfmpegQuality(1)).toBe(31);
    expect(toFfmpegQuality(85)).toBe(6);
    expect(toFfmpegQuality(500)).toBe(2);
  });
});

describe('buildFfmpegArgs', () => {
  it('requests MJPEG at the configured geometry and rate', () => {
    const args = buildFfmpegArgs({ inputFormat: 'v4l2', device: '/dev/video0', settings: SETTINGS });
    expect(args.slice(0, 4)).toEqual(['-hide_banner', '-loglevel', 'error', '-f']);
    expect(args).toContain('640x480');
    expect(args.slice(args.indexOf('-q:v'), args.indexOf('-q:v') + 2)).toEqual(['-q:v', '6']);
    expect(args.slice(args.indexOf('-i'), args.indexOf('-i') + 2)).toEqual(['-i', '/dev/video0']);
    expect(args.at(-1)).toBe('pipe:1');
  });
});

describe('FfmpegCaptureDevice', () => {
  it('spawns the configured binary and resolves grabs with decoded images', async () => {
    const proc = new FakeProcess();
    const { device, calls } = createDevice(proc);
    await device.open();
    expect(calls[0].command).toBe('ffmpeg');
    expect(device.isAlive()).toBe(true);

    const pending = device.grab();
    proc.stdout.write(jpeg(1, 2, 3));
    await expect(pending).resolves.toEqual(jpeg(1, 2, 3));
  });

  it('keeps only the newest unread frame', async () => {
    const proc = new FakeProcess();
    const { device } = createDevice(proc);
    await device.open();

    proc.stdout.write(Buffer.concat([jpeg(1), jpeg(2), jpeg(3)]));
    await tick();

    await expect(device.grab()).resolves.toEqual(jpeg(3));
  });

  it('reports a missing binary as unavailable', async () => {
    const proc = new FakeProcess();
    const device = new FfmpegCaptureDevice({
      ffmpegPath: 'ffmpeg',
      inputFormat: 'v4l2',
      device: '/dev/video0',
      settings: SETTINGS,
      logger: silentLogger,
      spawn: () => {
        setImmediate(() => proc.emit('error', new Error('spawn ffmpeg ENOENT')));
        return proc;
      }
    });

    await expect(device.open()).rejects.toBeInstanceOf(DeviceUnavailableError);
  });

  it('fails a pending grab when ffmpeg exits', async () => {
    const proc = new FakeProcess();
    const { device } = createDevice(proc);
    await device.open();

    const pending = device.grab();
    proc.exit(1);

    await expect(pending).rejects.toBeInstanceOf(DeviceFaultError);
    expect(device.isAlive()).toBe(false);
    await expect(device.grab()).rejects.toBeInstanceOf(DeviceFaultError);
  });

  it('terminates the process once however often it is closed', async () => {
    const proc = new FakeProcess();
    const { device } = createDevice(proc);
    await device.open();

    const failed = expect(device.grab()).rejects.toBeInstanceOf(DeviceFaultError);
    await Promise.all([device.close(), device.close()]);

    await failed;
    expect(proc.kills).toEqual(['SIGTERM']);
  });

  it('escalates to SIGKILL when ffmpeg ignores SIGTERM', async () => {
    const proc = new FakeProcess({ ignoreSigterm: true });
    const { device } = createDevice(proc);
    await device.open();

    await device.close();

    expect(proc.kills).toEqual(['SIGTERM', 'SIGKILL']);
  });
});
