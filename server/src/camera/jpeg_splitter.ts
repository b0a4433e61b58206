const SOI = Buffer.from([0xff, 0xd8]);
const EOI = Buffer.from([0xff, 0xd9]);

/**
 * Cuts a concatenated MJPEG byte stream (ffmpeg `image2pipe`) into whole JPEG
 * images. Bytes before a start-of-image marker are dropped.
 */
export class JpegSplitter {
  private pending: Buffer = Buffer.alloc(0);
  private readonly maxPendingBytes: number;

  constructor(maxPendingBytes = 16 * 1024 * 1024) {
    this.maxPendingBytes = maxPendingBytes;
  }

  push(chunk: Buffer): Buffer[] {
    this.pending = this.pending.length ? Buffer.concat([this.pending, chunk]) : chunk;
    const images: Buffer[] = [];

    for (;;) {
      const start = this.pending.indexOf(SOI);
      if (start === -1) {
        // keep a trailing 0xff, it may be the first half of a marker
        this.pending = this.pending.subarray(Math.max(0, this.pending.length - 1));
        break;
      }
      const end = this.pending.indexOf(EOI, start + SOI.length);
      if (end === -1) {
        this.pending = this.pending.subarray(start);
        break;
      }
      const stop = end + EOI.length;
      images.push(Buffer.from(this.pending.subarray(start, stop)));
      this.pending = this.pending.subarray(stop);
    }

    if (this.pending.length > this.maxPendingBytes) {
      this.pending = Buffer.alloc(0);
    }
    return images;
  }

  reset(): void {
    this.pending = Buffer.alloc(0);
  }
}
