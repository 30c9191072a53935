import busboy from 'busboy';
import fs from 'fs';
import type { IncomingMessage } from 'http';
import path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { BadRequestError, PayloadTooLargeError, errorCode, errorMessage } from './errors';
import { ProgressTrackingStream } from './progressStream';
import type { ProgressListener } from './progressStream';

/** Multipart field holding the uploaded file */
export const FILE_FIELD = 'file';

export interface ReceiveOptions {
  uploadDir: string;
  maxFileBytes: number;
  onProgress: ProgressListener;
}

export interface SavedUpload {
  filename: string;
  filePath: string;
  bytes: number;
}

/**
 * Reduce a client-supplied file name to its last path segment.
 * Both separators count, since browsers on Windows may send backslashes.
 */
export function safeBasename(rawName: string): string | undefined {
  const base = (rawName.replace(/\\/g, '/').split('/').pop() ?? '').trim();
  if (!base || /^\.+$/.test(base) || base.includes('\0')) {
    return undefined;
  }
  return base;
}

async function removePartialFile(filePath: string): Promise<void> {
  try {
    await fs.promises.unlink(filePath);
  } catch (err) {
    if (errorCode(err) !== 'ENOENT') {
      console.error(`Error deleting partial file ${filePath}:`, err);
    }
  }
}

async function saveFile(file: Readable, rawName: string, options: ReceiveOptions): Promise<SavedUpload> {
  const filename = safeBasename(rawName);
  if (!filename) {
    file.resume();
    throw new BadRequestError(`Invalid file name: "${rawName}"`);
  }

  let truncated = false;
  file.once('limit', () => {
    truncated = true;
  });

  const filePath = path.join(options.uploadDir, filename);
  const counter = new ProgressTrackingStream(options.onProgress);

  try {
    await pipeline(file, counter, fs.createWriteStream(filePath));
  } catch (err) {
    await removePartialFile(filePath);
    throw err;
  }

  if (truncated) {
    await removePartialFile(filePath);
    throw new PayloadTooLargeError(options.maxFileBytes);
  }

  return { filename, filePath, bytes: counter.bytesTransferred };
}

/**
 * Stream the single "file" field of a multipart request to disk.
 * Resolves once the file is fully written; other fields and extra files
 * are drained and ignored.
 */
export function receiveUpload(req: IncomingMessage, options: ReceiveOptions): Promise<SavedUpload> {
  return new Promise<SavedUpload>((resolve, reject) => {
    let parser: busboy.Busboy;
    try {
      parser = busboy({ headers: req.headers, limits: { fileSize: options.maxFileBytes } });
    } catch (err) {
      reject(new BadRequestError(`Expected a multipart/form-data body: ${errorMessage(err)}`));
      return;
    }

    let saving: Promise<SavedUpload> | null = null;

    parser.on('file', (field: string, file: Readable, info: busboy.FileInfo) => {
      if (field !== FILE_FIELD || saving) {
        file.resume();
        return;
      }
      saving = saveFile(file, info.filename, options);
      saving.then(resolve, reject);
    });

    parser.on('close', () => {
      if (!saving) {
        reject(new BadRequestError(`Missing "${FILE_FIELD}" field in multipart body`));
      }
    });

    // A client disconnect destroys the parser, which destroys the open file stream
    pipeline(req, parser).catch((err: unknown) => {
      reject(req.complete ? new BadRequestError(`Malformed multipart body: ${errorMessage(err)}`) : err);
    });
  });
}
