import { execFile } from 'child_process';
import type { Logger } from 'pino';
import type { CaptureSettings } from './capture_device.js';
import { CaptureProducer } from './capture_producer.js';
import { FfmpegCaptureDevice } from './ffmpeg_device.js';
import { FrameSlot, type FrameReading } from './frame_slot.js';

export type AvailableCamera = {
  kind: 'available';
  producer: CaptureProducer;
  slot: FrameSlot;
  settings: CaptureSettings;
};

export type UnavailableCamera = {
  kind: 'unavailable';
  reason: string;
  settings: CaptureSettings;
};

/** Result of the one-time capability check made at startup. */
export type CameraProvider = AvailableCamera | UnavailableCamera;

export function isCameraLive(camera: CameraProvider): boolean {
  return camera.kind === 'available' && camera.producer.isRunning();
}

export function latestFrame(camera: CameraProvider): FrameReading | null {
  return camera.kind === 'available' ? camera.slot.read() : null;
}

export type CameraConfig = CaptureSettings & {
  enabled: boolean;
  ffmpegPath: string;
  device: string;
  inputFormat: string;
  warmupMs: number;
  stopTimeoutMs: number;
};

export function toCaptureSettings(config: CaptureSettings): CaptureSettings {
  return {
    width: config.width,
    height: config.height,
    frameRate: config.frameRate,
    quality: config.quality
  };
}

/** Checks that the ffmpeg binary can be run at all. */
export function probeFfmpeg(ffmpegPath: string, timeoutMs = 5000): Promise<{ ok: boolean; error?: string }> {
  return new Promise((resolve) => {
    execFile(ffmpegPath, ['-hide_banner', '-version'], { timeout: timeoutMs }, (error) => {
      resolve(error ? { ok: false, error: error.message } : { ok: true });
    });
  });
}

export async function detectCamera(
  config: CameraConfig,
  logger: Logger,
  probe: (ffmpegPath: string) => Promise<{ ok: boolean; error?: string }> = probeFfmpeg
): Promise<CameraProvider> {
  const settings = toCaptureSettings(config);
  if (!config.enabled) {
    logger.warn('camera disabled by configuration');
    return { kind: 'unavailable', reason: 'disabled', settings };
  }

  const result = await probe(config.ffmpegPath);
  if (!result.ok) {
    logger.error({ ffmpegPath: config.ffmpegPath, error: result.error }, 'ffmpeg not available, camera features disabled');
    return { kind: 'unavailable', reason: result.error ?? 'ffmpeg_missing', settings };
  }

  const slot = new FrameSlot();
  const deviceLogger = logger.child({ component: 'ffmpeg' });
  const producer = new CaptureProducer({
    slot,
    logger,
    warmupMs: config.warmupMs,
    stopTimeoutMs: config.stopTimeoutMs,
    createDevice: (captureSettings) =>
      new FfmpegCaptureDevice({
        ffmpegPath: config.ffmpegPath,
        inputFormat: config.inputFormat,
        device: config.device,
        settings: captureSettings,
        logger: deviceLogger
      })
  });
  logger.info({ ffmpegPath: config.ffmpegPath, device: config.device }, 'camera capability available');
  return { kind: 'available', producer, slot, settings };
}
