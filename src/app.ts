import express from 'express';
import cors from 'cors';
import { config } from './config';
import type { Broadcaster } from './services/broadcaster.service';
import type { ConfigStore } from './services/config-store.service';
import type { PrinterGateway } from './services/cups.service';
import type { PrintService } from './services/print.service';
import type { Renderer } from './services/render.service';
import type { RootHelper } from './services/airprint.service';
import type { StatusAggregator } from './services/status.service';
import type { UploadStore } from './services/upload.service';
import { errorHandler } from './middleware/error.middleware';

// Routes
import { createFilesRouter } from './routes/files.routes';
import { createUploadRouter } from './routes/upload.routes';
import { createStatusRouter } from './routes/status.routes';
import { createConfigRouter } from './routes/config.routes';
import { createPrintRouter } from './routes/print.routes';
import { createPreviewRouter } from './routes/preview.routes';
import { createSystemRouter } from './routes/system.routes';
import { createEventsRouter } from './routes/events.routes';

export interface AppDeps {
  readonly configStore: ConfigStore;
  readonly uploads: UploadStore;
  readonly gateway: PrinterGateway;
  readonly status: StatusAggregator;
  readonly printer: PrintService;
  readonly renderer: Renderer;
  readonly rootHelper: RootHelper;
  readonly broadcaster: Broadcaster;
  /** Where multer writes incoming files before they are moved into the store */
  readonly uploadTempDir: string;
  readonly publicDir?: string;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const getConfig = () => deps.configStore.current();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Static files (Web UI bundle)
  app.use(express.static(deps.publicDir ?? config.publicDir));

  // Health check
  app.get('/healthz', async (_req, res) => {
    res.json({ ok: true, cups: await deps.gateway.isAvailable(), version: config.version });
  });

  // API Routes
  app.use('/api/files', createFilesRouter(deps.uploads, getConfig));
  app.use('/api/config', createConfigRouter(deps.configStore, deps.rootHelper));
  app.use('/api/print', createPrintRouter(deps.printer, deps.configStore));
  app.use('/api/preview', createPreviewRouter(deps.uploads, deps.renderer, deps.configStore));
  app.use('/api', createStatusRouter(deps.status, deps.gateway, getConfig));
  app.use('/api', createSystemRouter(deps.rootHelper, getConfig));
  app.use('/events', createEventsRouter(deps.broadcaster));
  app.use('/', createUploadRouter(deps.uploads, getConfig, deps.uploadTempDir));

  app.use(errorHandler);

  return app;
}
