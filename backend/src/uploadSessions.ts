import { SessionInUseError } from './errors';
import type { ProgressSnapshot, UploadProgress } from './types';

/**
 * In-memory progress of active uploads.
 * uploadId -> UploadProgress
 *
 * Every method is synchronous, so each call completes on the event loop
 * before any other request handler can observe the map.
 */
export class UploadSessionRegistry {
  private readonly sessions = new Map<string, UploadProgress>();

  /**
   * Start tracking an upload. Only one active upload per uploadId.
   */
  begin(sessionId: string, totalSize: number): void {
    if (!Number.isSafeInteger(totalSize) || totalSize < 0) {
      throw new RangeError(`totalSize must be a non-negative integer, got ${totalSize}`);
    }
    if (this.sessions.has(sessionId)) {
      throw new SessionInUseError(sessionId);
    }
    this.sessions.set(sessionId, { totalSize, uploadedSoFar: 0 });
  }

  /**
   * Count bytes written for an upload. Ignores unknown ids and never moves
   * the counter backwards or past totalSize.
   */
  advance(sessionId: string, deltaBytes: number): void {
    const progress = this.sessions.get(sessionId);
    if (!progress || !(deltaBytes > 0)) {
      return;
    }
    progress.uploadedSoFar = Math.min(progress.totalSize, progress.uploadedSoFar + deltaBytes);
  }

  snapshot(sessionId: string): ProgressSnapshot | undefined {
    const progress = this.sessions.get(sessionId);
    if (!progress) {
      return undefined;
    }
    return { total: progress.totalSize, uploaded: progress.uploadedSoFar };
  }

  /**
   * Stop tracking an upload. Ending an unknown id is a no-op.
   */
  end(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
