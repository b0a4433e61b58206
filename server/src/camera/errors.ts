export class DeviceUnavailableError extends Error {
  readonly code = 'device_unavailable';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeviceUnavailableError';
  }
}

export class DeviceFaultError extends Error {
  readonly code = 'device_fault';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeviceFaultError';
  }
}
