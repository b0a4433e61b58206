import { loadEnv } from './load_env.js';
import { parseConfig } from './config.js';
import { createLogger } from './logger.js';
import { buildApp } from './app.js';
import { detectCamera } from './camera/provider.js';
import { LifecycleController } from './lifecycle/controller.js';
import { TcpMotorRelay } from './relay/motor_relay.js';
import { PlaceholderRenderer } from './stream/placeholder.js';
import { TunnelService } from './tunnel/cloudflared.js';
import { EmailNotifier } from './notify/email.js';
import { getLocalIp, hasInternet } from './net/network.js';

async function boot() {
  const envFile = loadEnv();
  const config = parseConfig(process.env);
  const logger = createLogger(config.logLevel);
  if (envFile) {
    logger.info({ envFile }, 'loaded environment file');
  }

  const localIp = getLocalIp();
  const localUrl = `http://${localIp}:${config.port}`;

  const camera = await detectCamera(config.camera, logger.child({ component: 'capture' }));
  const relay = new TcpMotorRelay({ ...config.relay, logger: logger.child({ component: 'relay' }) });
  const placeholders = new PlaceholderRenderer({
    width: config.camera.width,
    height: config.camera.height,
    quality: config.camera.quality,
    imagePath: config.stream.placeholderImage,
    logger: logger.child({ component: 'placeholder' })
  });
  const tunnel = config.tunnel.enabled
    ? new TunnelService({
      command: config.tunnel.command,
      timeoutMs: config.tunnel.timeoutMs,
      logger: logger.child({ component: 'tunnel' })
    })
    : null;
  if (!tunnel) {
    logger.info('tunnel disabled');
  }
  const notifier = new EmailNotifier({
    ...config.notify,
    logger: logger.child({ component: 'notify' })
  });

  const lifecycle = new LifecycleController({
    camera,
    tunnel,
    notifier,
    localUrl,
    checkInternet: () => hasInternet(),
    logger: logger.child({ component: 'lifecycle' })
  });

  await lifecycle.startup();

  await lifecycle.shutdownOnFailure(async () => {
    const fastify = await buildApp({
      logger,
      camera,
      placeholders,
      pacing: config.stream,
      relay,
      lifecycle,
      localIp,
      port: config.port
    });
    lifecycle.onShutdown('http', () => fastify.close());

    let exiting = false;
    const exit = (signal: NodeJS.Signals) => {
      if (exiting) return;
      exiting = true;
      logger.info({ signal }, 'shutdown requested');
      lifecycle
        .shutdown()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ err: error }, 'shutdown failed');
          process.exit(1);
        });
    };
    process.on('SIGINT', exit);
    process.on('SIGTERM', exit);

    await fastify.listen({ port: config.port, host: config.host });
    fastify.log.info(`Server listening on :${config.port}`);

    const accessUrl = await lifecycle.announce(config.port);
    logger.info(
      {
        localUrl,
        accessUrl,
        tunnelUrl: lifecycle.getTunnelUrl(),
        relay: relay.target,
        camera: camera.kind === 'available' ? camera.producer.getState() : camera.reason
      },
      'rover control server ready'
    );
  });
}

boot().catch((error) => {
  console.error('Fatal boot error', error);
  process.exit(1);
});
