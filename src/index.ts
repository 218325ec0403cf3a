import http from 'http';
import path from 'path';
import chokidar from 'chokidar';
import { Server as SocketIOServer } from 'socket.io';
import { config } from './config';
import { createApp } from './app';
import { logger } from './utils/logger';
import { createAirPrintAutoEnsurer, createRootHelper } from './services/airprint.service';
import { createBroadcaster } from './services/broadcaster.service';
import { createConfigStore } from './services/config-store.service';
import { createCupsGateway } from './services/cups.service';
import { createPrintService } from './services/print.service';
import { createRenderer } from './services/render.service';
import { createStatusAggregator } from './services/status.service';
import { createUploadStore } from './services/upload.service';

async function main(): Promise<void> {
  const configStore = createConfigStore(config.configPath);
  const settings = await configStore.load();
  const getConfig = () => configStore.current();

  const gateway = createCupsGateway();
  const rootHelper = createRootHelper();
  const uploads = createUploadStore(config.uploadsDir);
  const renderer = createRenderer();
  const status = createStatusAggregator({
    gateway,
    getConfig,
    airprint: createAirPrintAutoEnsurer(rootHelper),
  });
  const printer = createPrintService({ uploads, renderer, gateway, getConfig });
  const broadcaster = createBroadcaster({
    intervalMs: config.eventIntervalMs,
    buildPayload: async () => {
      const [files, snapshot] = await Promise.all([uploads.list(25), status.getSnapshot()]);
      return { ts: Math.floor(Date.now() / 1000), files, status: snapshot };
    },
  });

  const app = createApp({
    configStore,
    uploads,
    gateway,
    status,
    printer,
    renderer,
    rootHelper,
    broadcaster,
    uploadTempDir: path.join(config.cacheDir, 'incoming'),
  });
  const server = http.createServer(app);
  const io = new SocketIOServer(server, {
    cors: { origin: '*' },
  });

  // Socket.IO clients get the same `status` events as /events
  io.on('connection', (socket) => {
    logger.info({ id: socket.id }, 'Client connected');
    const unsubscribe = broadcaster.subscribe({
      id: `io-${socket.id}`,
      send: (event, data) => {
        if (socket.disconnected) throw new Error('Socket disconnected');
        socket.emit(event, data);
      },
    });

    socket.on('disconnect', () => {
      unsubscribe();
      logger.info({ id: socket.id }, 'Client disconnected');
    });
  });

  // Push immediately when uploads appear or disappear instead of waiting for the tick
  const watcher = chokidar.watch(config.uploadsDir, { ignoreInitial: true, depth: 0 });
  watcher.on('all', (event, filePath) => {
    logger.debug({ event, filePath }, 'Upload directory changed');
    broadcaster.publish().catch((error: unknown) => logger.error({ error }, 'Publish after upload change failed'));
  });
  watcher.on('error', (error: unknown) => {
    logger.error({ error }, 'Upload watcher error');
  });

  // Best-effort AirPrint on startup
  if (settings.airprint.auto_enable) {
    rootHelper.ensureAirprint().catch((error: unknown) => {
      logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'AirPrint ensure failed at startup');
    });
  }

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    broadcaster.stop();
    io.close();
    watcher.close().catch((error: unknown) => logger.error({ error }, 'Failed to close watcher'));
    server.close(() => process.exit(0));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  server.listen(config.port, config.host, () => {
    logger.info({ port: config.port, host: config.host, version: config.version }, 'PrinterPal server started');
    logger.info(`Dashboard: http://localhost:${config.port}`);
  });
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'PrinterPal failed to start');
  process.exit(1);
});
