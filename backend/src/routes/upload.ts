import type { Request, RequestHandler } from 'express';
import { BadRequestError, LengthRequiredError, PayloadTooLargeError } from '../errors';
import { receiveUpload } from '../multipartUpload';
import type { SavedUpload } from '../multipartUpload';
import type { UploadSessionRegistry } from '../uploadSessions';
import { asyncHandler, readQueryString } from './http';

export interface UploadRouteOptions {
  registry: UploadSessionRegistry;
  uploadDir: string;
  maxUploadBytes: number;
}

function readContentLength(req: Request): number | undefined {
  const raw = req.headers['content-length'];
  return raw && /^\d+$/.test(raw) ? Number(raw) : undefined;
}

/**
 * Declared size of the incoming file: the size parameter sent by the
 * upload page, else the request's Content-Length.
 */
function readDeclaredSize(req: Request): number | undefined {
  const size = readQueryString(req.query.size);
  if (size === undefined || size === '') {
    return readContentLength(req);
  }
  if (!/^\d+$/.test(size)) {
    throw new BadRequestError(`Invalid size parameter: ${size}`);
  }
  return Number(size);
}

/**
 * Upload route: POST /upload?uploadId=<id>[&size=<bytes>]
 *
 * Flow:
 * 1. Validate the uploadId and the declared size
 * 2. Register the upload session so /progress can report it
 * 3. Stream the "file" field through the byte counter into uploadDir
 * 4. End the session, whatever the outcome, then answer
 */
export function uploadHandler({ registry, uploadDir, maxUploadBytes }: UploadRouteOptions): RequestHandler {
  return asyncHandler(async (req, res) => {
    const uploadId = readQueryString(req.query.uploadId);
    if (!uploadId) {
      throw new BadRequestError('Missing uploadId parameter');
    }

    const declaredSize = readDeclaredSize(req);
    if (declaredSize === undefined) {
      throw new LengthRequiredError();
    }
    const contentLength = readContentLength(req) ?? 0;
    if (declaredSize > maxUploadBytes || contentLength > maxUploadBytes) {
      throw new PayloadTooLargeError(maxUploadBytes);
    }

    registry.begin(uploadId, declaredSize);

    // Server-side failures are logged once, by the error middleware
    let saved: SavedUpload;
    try {
      saved = await receiveUpload(req, {
        uploadDir,
        maxFileBytes: maxUploadBytes,
        onProgress: (bytes) => registry.advance(uploadId, bytes),
      });
    } finally {
      registry.end(uploadId);
    }

    console.log(`Upload ${uploadId} saved as ${saved.filePath} (${saved.bytes} bytes)`);
    res.json({ status: 'ok', filename: saved.filename, uploadedBytes: saved.bytes });
  });
}
