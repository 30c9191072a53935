import type { RequestHandler } from 'express';
import { BadRequestError } from '../errors';
import type { ProgressSnapshot } from '../types';
import type { UploadSessionRegistry } from '../uploadSessions';
import { readQueryString } from './http';

/** Answer for an upload that has not started yet or has already finished */
export const UNKNOWN_SESSION: Readonly<ProgressSnapshot> = { total: 0, uploaded: 0 };

/**
 * Progress route: GET /progress?uploadId=<id>
 */
export function progressHandler(registry: UploadSessionRegistry): RequestHandler {
  return (req, res) => {
    const uploadId = readQueryString(req.query.uploadId);
    if (!uploadId) {
      throw new BadRequestError('Missing uploadId parameter');
    }

    res.setHeader('Cache-Control', 'no-store');
    res.json(registry.snapshot(uploadId) ?? UNKNOWN_SESSION);
  };
}
