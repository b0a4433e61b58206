export const STREAM_BOUNDARY = 'frame';

export const STREAM_CONTENT_TYPE = `multipart/x-mixed-replace; boundary=${STREAM_BOUNDARY}`;

const PART_HEADER = Buffer.from(`--${STREAM_BOUNDARY}\r\nContent-Type: image/jpeg\r\n\r\n`, 'ascii');
const PART_TRAILER = Buffer.from('\r\n', 'ascii');

export function encodePart(jpeg: Buffer): Buffer {
  return Buffer.concat([PART_HEADER, jpeg, PART_TRAILER]);
}
