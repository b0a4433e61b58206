export type FrameReading = {
  bytes: Buffer;
  capturedAt: number;
  ageMs: number;
};

type StoredFrame = Readonly<{ bytes: Buffer; capturedAt: number }>;

/**
 * Holds the latest encoded frame. Bytes and timestamp live in one frozen
 * record that is swapped as a whole, so a reader only ever sees a pair
 * written by a single publish.
 */
export class FrameSlot {
  private current: StoredFrame | null = null;
  private readonly now: () => number;

  constructor(now: () => number = () => performance.now()) {
    this.now = now;
  }

  publish(bytes: Buffer): void {
    this.current = Object.freeze({ bytes, capturedAt: this.now() });
  }

  read(): FrameReading | null {
    const frame = this.current;
    if (!frame) return null;
    return {
      bytes: frame.bytes,
      capturedAt: frame.capturedAt,
      ageMs: Math.max(0, this.now() - frame.capturedAt)
    };
  }

  clear(): void {
    this.current = null;
  }

  hasFrame(): boolean {
    return this.current !== null;
  }
}
