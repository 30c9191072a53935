import fs from 'fs';
import type { RequestHandler } from 'express';
import { pipeline } from 'stream/promises';
import type { DownloadCatalog } from '../downloadCatalog';
import { BadRequestError, NotFoundError, errorMessage } from '../errors';
import { renderDownloadPage } from '../pages/downloadPage';
import { asyncHandler, readQueryString } from './http';

export function downloadPageHandler(catalog: DownloadCatalog): RequestHandler {
  return (_req, res) => {
    res.type('html').send(renderDownloadPage(catalog.list()));
  };
}

/**
 * Download route: GET /download?file=<display name>
 *
 * Streams a catalog file from disk. Once bytes have gone out a read
 * failure can only be logged and the connection dropped.
 */
export function downloadHandler(catalog: DownloadCatalog): RequestHandler {
  return asyncHandler(async (req, res) => {
    const name = readQueryString(req.query.file);
    if (!name) {
      throw new BadRequestError('Missing file parameter');
    }

    const file = catalog.find(name);
    if (!file) {
      throw new NotFoundError(`File not found: ${name}`);
    }

    const stats = await fs.promises.stat(file.absolutePath);

    res.attachment(file.displayName);
    res.setHeader('Content-Type', 'application/octet-stream');
    res.setHeader('Content-Length', String(stats.size));
    res.setHeader('Cache-Control', 'no-cache');

    try {
      await pipeline(fs.createReadStream(file.absolutePath), res);
    } catch (err) {
      console.error(`Download of ${file.displayName} failed: ${errorMessage(err)}`);
      if (!res.headersSent) {
        throw err;
      }
      res.destroy();
    }
  });
}
