import { z } from 'zod';

const flag = z
  .union([z.boolean(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === 'boolean') return value;
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
    if (['false', '0', 'no', 'off', ''].includes(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${value}"` });
    return z.NEVER;
  });

const envSchema = z.object({
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CAMERA_ENABLED: flag.default(true),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  CAMERA_DEVICE: z.string().min(1).default('/dev/video0'),
  CAMERA_INPUT_FORMAT: z.string().min(1).default('v4l2'),
  CAMERA_WIDTH: z.coerce.number().int().positive().default(640),
  CAMERA_HEIGHT: z.coerce.number().int().positive().default(480),
  CAMERA_FPS: z.coerce.number().positive().max(120).default(20),
  JPEG_QUALITY: z.coerce.number().int().min(1).max(100).default(85),
  CAMERA_WARMUP_MS: z.coerce.number().int().nonnegative().default(2000),
  CAPTURE_STOP_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  STREAM_MAX_FPS: z.coerce.number().positive().max(120).default(30),
  STREAM_OFFLINE_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  FRAME_FRESHNESS_MS: z.coerce.number().int().positive().default(1000),
  PLACEHOLDER_IMAGE: z.string().optional(),
  RELAY_HOST: z.string().min(1).default('localhost'),
  RELAY_PORT: z.coerce.number().int().min(1).max(65535).default(9000),
  RELAY_TIMEOUT_MS: z.coerce.number().int().positive().default(1000),
  RELAY_PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(500),
  TUNNEL_ENABLED: flag.default(true),
  CLOUDFLARED_PATH: z.string().min(1).default('cloudflared'),
  TUNNEL_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SMTP_HOST: z.string().default('smtp.gmail.com'),
  SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(465),
  SMTP_USER: z.string().optional().default(''),
  SMTP_PASSWORD: z.string().optional().default(''),
  NOTIFY_TO: z.string().optional().default('')
});

export type AppConfig = ReturnType<typeof toConfig>;

function toConfig(env: z.infer<typeof envSchema>) {
  return {
    host: env.HOST,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    camera: {
      enabled: env.CAMERA_ENABLED,
      ffmpegPath: env.FFMPEG_PATH,
      device: env.CAMERA_DEVICE,
      inputFormat: env.CAMERA_INPUT_FORMAT,
      width: env.CAMERA_WIDTH,
      height: env.CAMERA_HEIGHT,
      frameRate: env.CAMERA_FPS,
      quality: env.JPEG_QUALITY,
      warmupMs: env.CAMERA_WARMUP_MS,
      stopTimeoutMs: env.CAPTURE_STOP_TIMEOUT_MS
    },
    stream: {
      maxFps: env.STREAM_MAX_FPS,
      offlineIntervalMs: env.STREAM_OFFLINE_INTERVAL_MS,
      freshnessMs: env.FRAME_FRESHNESS_MS,
      placeholderImage: env.PLACEHOLDER_IMAGE || undefined
    },
    relay: {
      host: env.RELAY_HOST,
      port: env.RELAY_PORT,
      timeoutMs: env.RELAY_TIMEOUT_MS,
      probeTimeoutMs: env.RELAY_PROBE_TIMEOUT_MS
    },
    tunnel: {
      enabled: env.TUNNEL_ENABLED,
      command: env.CLOUDFLARED_PATH,
      timeoutMs: env.TUNNEL_TIMEOUT_MS
    },
    notify: {
      smtpHost: env.SMTP_HOST,
      smtpPort: env.SMTP_PORT,
      user: env.SMTP_USER,
      password: env.SMTP_PASSWORD,
      recipients: env.NOTIFY_TO.split(',')
        .map((entry) => entry.trim())
        .filter(Boolean)
    }
  };
}

export function parseConfig(source: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    console.error('Invalid environment variables', parsed.error.format());
    throw new Error('Invalid environment');
  }
  return toConfig(parsed.data);
}
