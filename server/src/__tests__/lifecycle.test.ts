import { describe, it, expect, vi } from 'vitest';
import { CaptureProducer } from '../camera/capture_producer.js';
import { FrameSlot } from '../camera/frame_slot.js';
import type { AvailableCamera, CameraProvider } from '../camera/provider.js';
import { LifecycleController } from '../lifecycle/controller.js';
import type { Notifier } from '../notify/email.js';
import { TunnelService } from '../tunnel/cloudflared.js';
import { FakeCaptureDevice, SETTINGS, silentLogger, type FakeDeviceBehaviour } from './helpers/fakes.js';

const LOCAL_URL = 'http://192.168.1.50:5000';

function camera(behaviour: FakeDeviceBehaviour = {}): AvailableCamera {
  const slot = new FrameSlot();
  const producer = new CaptureProducer({
    createDevice: () => new FakeCaptureDevice(behaviour),
    slot,
    logger: silentLogger,
    warmupMs: 0,
    stopTimeoutMs: 50
  });
  return { kind: 'available', producer, slot, settings: SETTINGS };
}

function tunnel(): TunnelService {
  return new TunnelService({ command: 'cloudflared', timeoutMs: 100, logger: silentLogger });
}

function notifier() {
  const notifyReady = vi.fn(async (_accessUrl: string, _localUrl: string) => ({ ok: true }));
  const value: Notifier = { notifyReady };
  return { notifyReady, value };
}

describe('LifecycleController.startup', () => {
  it('reports false without a camera', async () => {
    const unavailable: CameraProvider = { kind: 'unavailable', reason: 'disabled', settings: SETTINGS };
    const lifecycle = new LifecycleController({ camera: unavailable, logger: silentLogger, localUrl: LOCAL_URL });
    await expect(lifecycle.startup()).resolves.toBe(false);
  });

  it('reports false when the camera cannot be opened', async () => {
    const lifecycle = new LifecycleController({
      camera: camera({ openError: new Error('busy') }),
      logger: silentLogger,
      localUrl: LOCAL_URL
    });
    await expect(lifecycle.startup()).resolves.toBe(false);
  });

  it('starts the camera', async () => {
    const cam = camera();
    const lifecycle = new LifecycleController({ camera: cam, logger: silentLogger, localUrl: LOCAL_URL });

    await expect(lifecycle.startup()).resolves.toBe(true);
    expect(cam.producer.isRunning()).toBe(true);
    await lifecycle.shutdown();
    expect(cam.producer.getState()).toBe('stopped');
  });
});

describe('LifecycleController.shutdown', () => {
  it('stops streams, camera, tunnel and then the registered steps', async () => {
    const cam = camera();
    const tun = tunnel();
    const order: string[] = [];
    const lifecycle = new LifecycleController({ camera: cam, tunnel: tun, logger: silentLogger, localUrl: LOCAL_URL });

    lifecycle.streamSignal.addEventListener('abort', () => order.push('streams'));
    vi.spyOn(cam.producer, 'stop').mockImplementation(async () => {
      order.push('camera');
    });
    vi.spyOn(tun, 'stop').mockImplementation(async () => {
      order.push('tunnel');
    });
    lifecycle.onShutdown('http', () => {
      order.push('http');
    });

    expect(lifecycle.isAcceptingStreams()).toBe(true);
    await lifecycle.shutdown();

    expect(order).toEqual(['streams', 'camera', 'tunnel', 'http']);
    expect(lifecycle.isAcceptingStreams()).toBe(false);
  });

  it('keeps going when a step fails and runs only once', async () => {
    const cam = camera();
    const lifecycle = new LifecycleController({ camera: cam, logger: silentLogger, localUrl: LOCAL_URL });
    const stop = vi.spyOn(cam.producer, 'stop').mockRejectedValue(new Error('stuck'));
    const http = vi.fn();
    lifecycle.onShutdown('http', http);

    await Promise.all([lifecycle.shutdown(), lifecycle.shutdown()]);
    await lifecycle.shutdown();

    expect(stop).toHaveBeenCalledTimes(1);
    expect(http).toHaveBeenCalledTimes(1);
  });
});

describe('LifecycleController.shutdownOnFailure', () => {
  it('releases the camera when boot fails after startup', async () => {
    const devices: FakeCaptureDevice[] = [];
    const slot = new FrameSlot();
    const producer = new CaptureProducer({
      createDevice: () => {
        const device = new FakeCaptureDevice();
        devices.push(device);
        return device;
      },
      slot,
      logger: silentLogger,
      warmupMs: 0,
      stopTimeoutMs: 50
    });
    const lifecycle = new LifecycleController({
      camera: { kind: 'available', producer, slot, settings: SETTINGS },
      logger: silentLogger,
      localUrl: LOCAL_URL
    });
    await lifecycle.startup();
    const listenError = new Error('listen EADDRINUSE: address already in use 0.0.0.0:5000');

    await expect(
      lifecycle.shutdownOnFailure(async () => {
        throw listenError;
      })
    ).rejects.toBe(listenError);

    expect(producer.getState()).toBe('stopped');
    expect(devices.map((device) => device.closeCalls)).toEqual([1]);
    expect(lifecycle.isAcceptingStreams()).toBe(false);
  });

  it('passes through a successful boot untouched', async () => {
    const lifecycle = new LifecycleController({ camera: camera(), logger: silentLogger, localUrl: LOCAL_URL });

    await expect(lifecycle.shutdownOnFailure(async () => 5000)).resolves.toBe(5000);
    expect(lifecycle.isAcceptingStreams()).toBe(true);
  });
});

describe('LifecycleController.announce', () => {
  it('announces the tunnel URL when one is established', async () => {
    const tun = tunnel();
    vi.spyOn(tun, 'start').mockResolvedValue('https://quiet-river-demo.trycloudflare.com');
    const { notifyReady, value } = notifier();
    const lifecycle = new LifecycleController({
      camera: camera(),
      tunnel: tun,
      notifier: value,
      logger: silentLogger,
      localUrl: LOCAL_URL,
      checkInternet: async () => true
    });

    await expect(lifecycle.announce(5000)).resolves.toBe('https://quiet-river-demo.trycloudflare.com');
    expect(tun.start).toHaveBeenCalledWith(5000);
    expect(notifyReady).toHaveBeenCalledWith('https://quiet-river-demo.trycloudflare.com', LOCAL_URL);
  });

  it('falls back to the local URL without internet', async () => {
    const tun = tunnel();
    const start = vi.spyOn(tun, 'start');
    const { notifyReady, value } = notifier();
    const lifecycle = new LifecycleController({
      camera: camera(),
      tunnel: tun,
      notifier: value,
      logger: silentLogger,
      localUrl: LOCAL_URL,
      checkInternet: async () => false
    });

    await expect(lifecycle.announce(5000)).resolves.toBe(LOCAL_URL);
    expect(start).not.toHaveBeenCalled();
    expect(notifyReady).toHaveBeenCalledWith(LOCAL_URL, LOCAL_URL);
  });

  it('survives a notifier that throws', async () => {
    const failing: Notifier = {
      notifyReady: async () => {
        throw new Error('smtp down');
      }
    };
    const lifecycle = new LifecycleController({
      camera: camera(),
      notifier: failing,
      logger: silentLogger,
      localUrl: LOCAL_URL
    });

    await expect(lifecycle.announce(5000)).resolves.toBe(LOCAL_URL);
  });
});
