import express from 'express';
import type { Express } from 'express';
import type { TransferConfig } from './config';
import type { DownloadCatalog } from './downloadCatalog';
import { UPLOAD_PAGE_HTML } from './pages/uploadPage';
import { downloadHandler, downloadPageHandler } from './routes/download';
import { errorHandler, onlyAllow } from './routes/http';
import { progressHandler } from './routes/progress';
import { uploadHandler } from './routes/upload';
import { DOWNLOAD_PAGE_PATH, UPLOAD_PAGE_PATH } from './sessionUrl';
import type { UploadSessionRegistry } from './uploadSessions';

export interface AppDeps {
  catalog: DownloadCatalog;
  registry: UploadSessionRegistry;
  config: Pick<TransferConfig, 'uploadDir' | 'maxUploadBytes'>;
}

/**
 * Build the Express application without starting a listener.
 * No body-parsing middleware: the upload route reads its own stream.
 */
export function createApp({ catalog, registry, config }: AppDeps): Express {
  const app = express();
  app.disable('x-powered-by');

  app.get(UPLOAD_PAGE_PATH, (_req, res) => {
    res.type('html').send(UPLOAD_PAGE_HTML);
  });

  app.get(DOWNLOAD_PAGE_PATH, downloadPageHandler(catalog));

  app.post(
    '/upload',
    uploadHandler({ registry, uploadDir: config.uploadDir, maxUploadBytes: config.maxUploadBytes }),
  );
  app.all('/upload', onlyAllow('POST'));

  app.get('/progress', progressHandler(registry));

  app.get('/download', downloadHandler(catalog));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      activeUploads: registry.size,
      catalogFiles: catalog.size,
      timestamp: new Date().toISOString(),
    });
  });

  app.use(errorHandler);

  return app;
}
