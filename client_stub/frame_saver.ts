import fs from 'fs/promises';
import path from 'path';

const baseUrl = (process.argv[2] ?? 'http://localhost:5000').replace(/\/$/, '');
const outputPath = process.argv[3] ?? './captures/frame.jpg';
const timeoutMs = Number(process.argv[4] ?? 10000);

const SOI = Buffer.from([0xff, 0xd8]);
const EOI = Buffer.from([0xff, 0xd9]);

async function saveFirstFrame() {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const response = await fetch(`${baseUrl}/video_feed`, { signal: controller.signal });
  if (!response.ok || !response.body) {
    throw new Error(`Unexpected response ${response.status}`);
  }
  console.log('content-type', response.headers.get('content-type'));

  let buffer = Buffer.alloc(0);
  const reader = response.body.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      buffer = Buffer.concat([buffer, Buffer.from(value)]);
      const start = buffer.indexOf(SOI);
      const end = start === -1 ? -1 : buffer.indexOf(EOI, start + 2);
      if (end !== -1) {
        const jpeg = buffer.subarray(start, end + 2);
        const resolved = path.resolve(outputPath);
        await fs.mkdir(path.dirname(resolved), { recursive: true });
        await fs.writeFile(resolved, jpeg);
        console.log(`saved ${jpeg.length} bytes to ${resolved}`);
        return;
      }
    }
    throw new Error('Stream ended before a full frame arrived');
  } finally {
    clearTimeout(timer);
    controller.abort();
  }
}

saveFirstFrame().catch((error) => {
  console.error('Frame saver failed', error);
  process.exit(1);
});
