import sharp from 'sharp';
import type { Logger } from 'pino';

export type PlaceholderKind = 'missing' | 'offline';

export const PLACEHOLDER_MESSAGES: Record<PlaceholderKind, string> = {
  missing: 'Camera Library Missing',
  offline: 'Camera Offline'
};

/** Supplies the image shown while no live frame is available; null when none could be produced. */
export interface PlaceholderSource {
  render(kind: PlaceholderKind): Promise<Buffer | null>;
}

export type PlaceholderOptions = {
  width: number;
  height: number;
  quality: number;
  imagePath?: string;
  logger: Logger;
};

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Inserts a COM segment carrying `text` after SOI (and after the JFIF APP0
 * segment when there is one).
 */
export function embedJpegComment(jpeg: Buffer, text: string): Buffer {
  if (jpeg.length < 4 || jpeg[0] !== 0xff || jpeg[1] !== 0xd8) {
    throw new Error('Not a JPEG image');
  }
  const payload = Buffer.from(text, 'latin1').subarray(0, 0xfffd);
  const segment = Buffer.alloc(4 + payload.length);
  segment[0] = 0xff;
  segment[1] = 0xfe;
  segment.writeUInt16BE(payload.length + 2, 2);
  payload.copy(segment, 4);

  let offset = 2;
  if (jpeg[2] === 0xff && jpeg[3] === 0xe0 && jpeg.length >= 6) {
    offset = 4 + jpeg.readUInt16BE(4);
  }
  return Buffer.concat([jpeg.subarray(0, offset), segment, jpeg.subarray(offset)]);
}

export class PlaceholderRenderer implements PlaceholderSource {
  private readonly options: PlaceholderOptions;
  private readonly cache = new Map<PlaceholderKind, Buffer>();

  constructor(options: PlaceholderOptions) {
    this.options = options;
  }

  async render(kind: PlaceholderKind): Promise<Buffer | null> {
    const cached = this.cache.get(kind);
    if (cached) return cached;

    const message = PLACEHOLDER_MESSAGES[kind];
    try {
      const jpeg = embedJpegComment(await this.draw(message), message);
      this.cache.set(kind, jpeg);
      return jpeg;
    } catch (error) {
      this.options.logger.error({ err: error, kind }, 'failed to render placeholder frame');
      return null;
    }
  }

  private async draw(message: string): Promise<Buffer> {
    const { imagePath, logger } = this.options;
    if (imagePath) {
      try {
        return await this.compose(sharp(imagePath).resize(this.options.width, this.options.height, { fit: 'cover' }), message);
      } catch (error) {
        logger.warn({ err: error, imagePath }, 'placeholder image unusable, using a blank canvas');
      }
    }
    const canvas = sharp({
      create: {
        width: this.options.width,
        height: this.options.height,
        channels: 3,
        background: { r: 20, g: 20, b: 20 }
      }
    });
    return this.compose(canvas, message);
  }

  private compose(base: sharp.Sharp, message: string): Promise<Buffer> {
    const { width, height, quality } = this.options;
    const fontSize = Math.max(12, Math.round((24 * width) / 640));
    const overlay = Buffer.from(
      `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">` +
        `<text x="30" y="${Math.floor(height / 2)}" font-family="sans-serif" font-size="${fontSize}" fill="rgb(220,220,220)">` +
        `${escapeXml(message)}</text></svg>`
    );
    return base
      .composite([{ input: overlay, top: 0, left: 0 }])
      .jpeg({ quality: Math.max(1, Math.floor(quality / 2)) })
      .toBuffer();
  }
}
