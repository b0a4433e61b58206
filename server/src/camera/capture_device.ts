export type CaptureSettings = {
  width: number;
  height: number;
  frameRate: number;
  /** JPEG quality, 1-100. */
  quality: number;
};

/**
 * A camera that yields JPEG-encoded frames. `grab` suspends until the device
 * has produced the next frame; `close` must be safe to call more than once.
 */
export interface CaptureDevice {
  open(): Promise<void>;
  grab(): Promise<Buffer>;
  /** False once the device has failed or been closed. */
  isAlive(): boolean;
  close(): Promise<void>;
}

export type CaptureDeviceFactory = (settings: CaptureSettings) => CaptureDevice;
