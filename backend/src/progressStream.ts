import { Transform } from 'stream';
import type { TransformCallback } from 'stream';

export type ProgressListener = (bytes: number) => void;

/**
 * Pass-through stream that reports the size of every chunk before handing
 * the same buffer on. Sits between the multipart file stream and the disk.
 */
export class ProgressTrackingStream extends Transform {
  private transferred = 0;

  constructor(private readonly onProgress: ProgressListener) {
    super();
  }

  get bytesTransferred(): number {
    return this.transferred;
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.transferred += chunk.length;
    try {
      this.onProgress(chunk.length);
    } catch (err) {
      callback(err instanceof Error ? err : new Error(String(err)));
      return;
    }
    callback(null, chunk);
  }
}
