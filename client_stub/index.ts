import { setTimeout as wait } from 'timers/promises';

const baseUrl = (process.argv[2] ?? 'http://localhost:5000').replace(/\/$/, '');
const sequence = (process.argv[3] ?? 'up,left,right,down,stop').split(',').map((entry) => entry.trim()).filter(Boolean);
const stepMs = Number(process.argv[4] ?? 500);

async function drive() {
  for (const direction of sequence) {
    const response = await fetch(`${baseUrl}/api/control/${direction}`, { method: 'POST' });
    console.log(`>> ${direction}`, response.status, await response.json());
    await wait(stepMs);
  }

  const response = await fetch(`${baseUrl}/api/control/stop`, { method: 'POST' });
  console.log('>> stop', response.status);

  const status = await fetch(`${baseUrl}/api/status`);
  console.log('<< status', await status.json());
}

drive().catch((error) => {
  console.error('Drive stub failed', error);
  process.exit(1);
});
