import { describe, it, expect, vi } from 'vitest';
import { CaptureProducer } from '../camera/capture_producer.js';
import { FrameSlot } from '../camera/frame_slot.js';
import type { AvailableCamera, CameraProvider } from '../camera/provider.js';
import { encodePart } from '../stream/multipart.js';
import type { PlaceholderKind, PlaceholderSource } from '../stream/placeholder.js';
import { StreamSession, type StreamPacing } from '../stream/stream_session.js';
import {
  FakeCaptureDevice,
  SETTINGS,
  StaticPlaceholders,
  silentLogger,
  type FakeDeviceBehaviour
} from './helpers/fakes.js';

const PACING: StreamPacing = { maxFps: 50, offlineIntervalMs: 50, freshnessMs: 1000 };

const unavailable: CameraProvider = { kind: 'unavailable', reason: 'disabled', settings: SETTINGS };

// by default grabs never return, so the test decides what is in the slot
function availableCamera(clock: () => number, behaviour: FakeDeviceBehaviour = { hang: true }): AvailableCamera {
  const slot = new FrameSlot(clock);
  const producer = new CaptureProducer({
    createDevice: () => new FakeCaptureDevice(behaviour),
    slot,
    logger: silentLogger,
    warmupMs: 0,
    stopTimeoutMs: 20
  });
  return { kind: 'available', producer, slot, settings: SETTINGS };
}

function session(camera: CameraProvider, placeholders: PlaceholderSource = new StaticPlaceholders()) {
  return new StreamSession({ camera, placeholders, pacing: PACING, logger: silentLogger });
}

describe('StreamSession', () => {
  it('sends the missing-camera placeholder when there is no camera', async () => {
    const placeholders = new StaticPlaceholders();
    const controller = new AbortController();
    const frames = session(unavailable, placeholders).frames(controller.signal);

    const first = await frames.next();
    expect(first.value).toEqual(encodePart(Buffer.from('placeholder:missing')));

    const before = performance.now();
    await frames.next();
    expect(performance.now() - before).toBeGreaterThanOrEqual(45);
    expect(placeholders.requests).toEqual(['missing', 'missing']);

    controller.abort();
    await expect(frames.next()).resolves.toEqual({ done: true, value: undefined });
  });

  it('sends the offline placeholder while an available camera is stopped', async () => {
    const controller = new AbortController();
    const frames = session(availableCamera(() => 0)).frames(controller.signal);

    const first = await frames.next();
    expect(first.value).toEqual(encodePart(Buffer.from('placeholder:offline')));
    controller.abort();
  });

  it('sends a fresh frame exactly as captured', async () => {
    let clock = 1000;
    const camera = availableCamera(() => clock);
    await camera.producer.start(SETTINGS);
    const bytes = Buffer.from([0xff, 0xd8, 0x10, 0x20, 0xff, 0xd9]);
    camera.slot.publish(bytes);
    clock = 1200;

    const controller = new AbortController();
    const live = session(camera);
    const first = await live.frames(controller.signal).next();

    expect(first.value).toEqual(encodePart(bytes));
    expect(live.lastSent).not.toBeNull();
    controller.abort();
    await camera.producer.stop();
  });

  it('holds back stale frames until the client goes away', async () => {
    let clock = 0;
    const camera = availableCamera(() => clock);
    await camera.producer.start(SETTINGS);
    camera.slot.publish(Buffer.from('old'));
    clock = 5000;

    const controller = new AbortController();
    const live = session(camera);
    const pending = live.frames(controller.signal).next();
    setTimeout(() => controller.abort(), 60);

    await expect(pending).resolves.toEqual({ done: true, value: undefined });
    expect(live.lastSent).toBeNull();
    await camera.producer.stop();
  });

  it('switches an open stream to the offline placeholder after a device fault', async () => {
    const camera = availableCamera(() => performance.now(), { frameIntervalMs: 5, failOnGrab: 20 });
    const placeholders = new StaticPlaceholders();
    await camera.producer.start(SETTINGS);
    await vi.waitFor(() => expect(camera.slot.hasFrame()).toBe(true), { interval: 2 });

    const controller = new AbortController();
    const frames = session(camera, placeholders).frames(controller.signal);
    const live = await frames.next();
    expect(live.done).toBe(false);
    if (live.done) return;
    expect(live.value.toString('latin1')).toMatch(/\r\nframe-\d+\r\n$/);
    expect(placeholders.requests).toEqual([]);

    await vi.waitFor(() => expect(camera.producer.getState()).toBe('stopped'), { interval: 5 });
    const fallback = await frames.next();

    expect(fallback.value).toEqual(encodePart(Buffer.from('placeholder:offline')));
    expect(placeholders.requests).toEqual(['offline']);
    controller.abort();
  });

  it('never emits an empty part when the placeholder cannot be drawn', async () => {
    const empty: PlaceholderSource = { render: async () => null };
    const controller = new AbortController();
    const live = session(unavailable, empty);
    const pending = live.frames(controller.signal).next();
    setTimeout(() => controller.abort(), 120);

    await expect(pending).resolves.toEqual({ done: true, value: undefined });
    expect(live.lastSent).toBeNull();
  });

  it('ends cleanly when rendering throws', async () => {
    const broken: PlaceholderSource = {
      render: async (kind: PlaceholderKind) => {
        throw new Error(`cannot draw ${kind}`);
      }
    };
    const frames = session(unavailable, broken).frames(new AbortController().signal);

    await expect(frames.next()).resolves.toEqual({ done: true, value: undefined });
  });

  it('paces live frames to the configured rate', () => {
    expect(session(unavailable).minIntervalMs).toBe(20);
  });
});
