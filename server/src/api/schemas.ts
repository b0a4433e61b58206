import { z } from 'zod';
import { DIRECTIONS } from '../relay/commands.js';

export const ControlParamsSchema = z.object({
  direction: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(DIRECTIONS))
});

export type ApiResult = {
  status: 'success' | 'error';
  message: string;
};

export type StatusSnapshot = {
  camera_available: boolean;
  camera_running: boolean;
  camera_resolution: [number, number];
  camera_target_fps: number;
  relay_status: 'Connected' | 'Disconnected';
  relay_target: string;
  local_ip: string;
  web_port: number;
  tunnel_url: string | null;
};

export const apiResultJsonSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['success', 'error'] },
    message: { type: 'string' }
  }
} as const;

export const statusJsonSchema = {
  type: 'object',
  properties: {
    camera_available: { type: 'boolean' },
    camera_running: { type: 'boolean' },
    camera_resolution: { type: 'array', items: { type: 'number' }, minItems: 2, maxItems: 2 },
    camera_target_fps: { type: 'number' },
    relay_status: { type: 'string', enum: ['Connected', 'Disconnected'] },
    relay_target: { type: 'string' },
    local_ip: { type: 'string' },
    web_port: { type: 'number' },
    tunnel_url: { type: ['string', 'null'] }
  }
} as const;
