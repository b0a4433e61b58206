import { Readable } from 'stream';
import Fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import type { Logger } from 'pino';
import { isCameraLive, type CameraProvider } from './camera/provider.js';
import type { LifecycleController } from './lifecycle/controller.js';
import { DIRECTION_COMMANDS } from './relay/commands.js';
import type { MotorRelay } from './relay/motor_relay.js';
import { STREAM_CONTENT_TYPE } from './stream/multipart.js';
import type { PlaceholderSource } from './stream/placeholder.js';
import { StreamSession, type StreamPacing } from './stream/stream_session.js';
import {
  ControlParamsSchema,
  apiResultJsonSchema,
  statusJsonSchema,
  type ApiResult,
  type StatusSnapshot
} from './api/schemas.js';
import { buildControlPage } from './pages.js';

export type AppDeps = {
  logger: Logger;
  camera: CameraProvider;
  placeholders: PlaceholderSource;
  pacing: StreamPacing;
  relay: MotorRelay;
  lifecycle: LifecycleController;
  localIp: string;
  port: number;
};

export async function buildApp(deps: AppDeps) {
  const { camera, relay, lifecycle } = deps;
  const fastify = Fastify({ logger: deps.logger });
  const streamLogger = deps.logger.child({ component: 'stream' });

  await fastify.register(swagger, {
    openapi: {
      info: {
        title: 'Rover Cam',
        version: '0.1.0'
      }
    }
  });
  await fastify.register(swaggerUI, { routePrefix: '/docs' });

  fastify.get('/health', {
    schema: {
      description: 'Basic health check',
      response: {
        200: {
          type: 'object',
          properties: { ok: { type: 'boolean' } }
        }
      }
    }
  }, async () => ({ ok: true }));

  fastify.get('/', {
    schema: {
      description: 'Control panel',
      response: {
        200: { type: 'string' }
      }
    }
  }, async (_, reply) => {
    reply.type('text/html').send(buildControlPage());
  });

  fastify.get('/favicon.ico', { schema: { hide: true } }, async (_, reply) => {
    reply.code(204).send();
  });

  fastify.get('/video_feed', {
    schema: {
      description: 'Live camera feed as multipart/x-mixed-replace JPEG parts (boundary "frame")',
      response: {
        503: apiResultJsonSchema
      }
    }
  }, async (request, reply) => {
    if (!lifecycle.isAcceptingStreams()) {
      const body: ApiResult = { status: 'error', message: 'Server is shutting down' };
      return reply.code(503).send(body);
    }

    const client = new AbortController();
    reply.raw.once('close', () => client.abort());
    const signal = AbortSignal.any([lifecycle.streamSignal, client.signal]);
    const session = new StreamSession({
      camera,
      placeholders: deps.placeholders,
      pacing: deps.pacing,
      logger: streamLogger.child({ reqId: request.id })
    });

    request.log.info('video client connected');
    signal.addEventListener('abort', () => request.log.info('video client disconnected'), { once: true });

    return reply
      .header('Content-Type', STREAM_CONTENT_TYPE)
      .header('Cache-Control', 'no-cache, private')
      .header('Pragma', 'no-cache')
      .send(Readable.from(session.frames(signal)));
  });

  fastify.post('/api/control/:direction', {
    schema: {
      description: 'Send a drive command to the motor controller',
      params: {
        type: 'object',
        properties: { direction: { type: 'string' } },
        required: ['direction']
      },
      response: {
        200: apiResultJsonSchema,
        400: apiResultJsonSchema,
        502: apiResultJsonSchema
      }
    }
  }, async (request, reply) => {
    const parsed = ControlParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      request.log.warn({ params: request.params }, 'invalid control direction');
      const body: ApiResult = { status: 'error', message: 'Invalid direction' };
      return reply.code(400).send(body);
    }

    const { direction } = parsed.data;
    const command = DIRECTION_COMMANDS[direction];
    const result = await relay.send(command);
    request.log.info({ direction, command, ok: result.ok }, result.message);

    const body: ApiResult = { status: result.ok ? 'success' : 'error', message: result.message };
    return reply.code(result.ok ? 200 : 502).send(body);
  });

  fastify.get('/api/status', {
    schema: {
      description: 'Camera, relay and reachability snapshot',
      response: {
        200: statusJsonSchema
      }
    }
  }, async () => {
    const reachable = await relay.isReachable();
    const running = isCameraLive(camera);
    const settings = camera.kind === 'available'
      ? camera.producer.getSettings() ?? camera.settings
      : camera.settings;

    const snapshot: StatusSnapshot = {
      camera_available: camera.kind === 'available',
      camera_running: running,
      camera_resolution: [settings.width, settings.height],
      camera_target_fps: settings.frameRate,
      relay_status: reachable ? 'Connected' : 'Disconnected',
      relay_target: relay.target,
      local_ip: deps.localIp,
      web_port: deps.port,
      tunnel_url: lifecycle.getTunnelUrl()
    };
    return snapshot;
  });

  return fastify;
}
