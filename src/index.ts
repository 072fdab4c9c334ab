import config from './config/index.js';
import logger from './utils/logger.js';
import { createApp } from './app.js';
import { MqttTransport } from './services/mqtt-client.js';
import { FileDeviceRegistry } from './services/device-registry.js';
import { LocalMediaSource } from './services/media-source.js';
import { ThumbnailStore } from './services/thumbnail-store.js';
import { MediaPlayerManager } from './services/media-player-manager.js';

async function startServer() {
  const transport = new MqttTransport();
  const registry = new FileDeviceRegistry(config.devices.file);
  const thumbnails = new ThumbnailStore();
  const manager = new MediaPlayerManager({
    transport,
    registry,
    thumbnails,
    resolver: new LocalMediaSource(config.media.dir, config.media.publicUrl),
    defaultTitle: config.media.defaultTitle,
  });

  manager.on('state_changed', (view) => {
    logger.debug(`State of ${view.entityId} changed`, { state: view.state, available: view.available });
  });

  const app = createApp({ manager, thumbnails, mediaDir: config.media.dir });

  // Start server on all interfaces
  const server = app.listen(config.server.port, '0.0.0.0', () => {
    logger.info(`Media bridge running on port ${config.server.port}`);
    logger.info(`Environment: ${config.server.nodeEnv}`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    const force = setTimeout(() => {
      logger.warn('Force exiting after timeout');
      process.exit(0);
    }, 1500);

    try {
      await new Promise<void>((resolve) => {
        server.close(() => {
          logger.info('HTTP server closed');
          resolve();
        });
      });
      await manager.shutdown();
      await transport.disconnect();
    } catch (e) {
      logger.warn('Error during shutdown cleanup', e);
    } finally {
      clearTimeout(force);
      process.exit(0);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Subscriptions are queued by the MQTT client until the broker connection is up
  const devices = await registry.listDevices();
  const players = await manager.setup(devices.map((device) => device.uniqueId));
  logger.info(`Set up ${players.length} of ${devices.length} media player(s)`);
}

// Start the server
startServer().catch((error) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
