import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { vi } from 'vitest';
import { createApp } from '../../app';
import { type AppConfig, defaultConfig } from '../../models/config.model';
import type { RootHelper } from '../../services/airprint.service';
import { createBroadcaster } from '../../services/broadcaster.service';
import type { ConfigStore } from '../../services/config-store.service';
import type { PrinterGateway } from '../../services/cups.service';
import type { PrintService } from '../../services/print.service';
import type { Renderer } from '../../services/render.service';
import { createStatusAggregator } from '../../services/status.service';
import { createUploadStore } from '../../services/upload.service';
import { normalizeConfig } from '../../validators/config.validator';
import { fakeGateway, statusUpdate } from '../../services/__tests__/fakes';

export const PREVIEW_PNG = Buffer.from('test-png');

/** Config kept in memory; updates go through the same validation as the file store */
export function memoryConfigStore(initial: AppConfig = defaultConfig()): ConfigStore {
  let cached = initial;
  return {
    path: 'memory',
    load: async () => cached,
    current: () => cached,
    update: async (mutate) => {
      cached = normalizeConfig(mutate(cached));
      return cached;
    },
  };
}

export interface TestAppOptions {
  readonly config?: AppConfig;
  readonly gateway?: PrinterGateway;
}

/** Full app over a temp upload directory with every external tool faked */
export async function createTestApp(options: TestAppOptions = {}) {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'printerpal-app-'));
  const uploadsDir = path.join(root, 'uploads');
  await fs.mkdir(uploadsDir);

  const configStore = memoryConfigStore(options.config);
  const gateway = options.gateway ?? fakeGateway();
  const uploadTempDir = path.join(root, 'incoming');
  const uploads = createUploadStore(uploadsDir);
  const printer: PrintService = {
    submit: vi.fn(async () => 'request id is Office_Laser-13 (1 file(s))'),
  };
  const renderer: Renderer = {
    renderPreview: vi.fn(async () => PREVIEW_PNG),
    preparePrintFile: vi.fn(async (filePath: string) => ({
      path: filePath,
      prepared: false,
      cleanup: async () => undefined,
    })),
  };
  const rootHelper: RootHelper = {
    ensureAirprint: vi.fn(async () => 'AirPrint ok'),
    restartHost: vi.fn(async () => ''),
  };
  const broadcaster = createBroadcaster({ buildPayload: async () => statusUpdate(), intervalMs: 60_000 });

  const app = createApp({
    configStore,
    uploads,
    gateway,
    status: createStatusAggregator({ gateway, getConfig: () => configStore.current() }),
    printer,
    renderer,
    rootHelper,
    broadcaster,
    uploadTempDir,
    publicDir: path.join(root, 'public'),
  });

  return {
    app,
    uploadsDir,
    uploadTempDir,
    configStore,
    printer,
    renderer,
    rootHelper,
    cleanup: () => fs.rm(root, { recursive: true, force: true }),
  };
}

export type TestApp = Awaited<ReturnType<typeof createTestApp>>;
