/**
 * Progress of one in-flight upload.
 * Owned by the UploadSessionRegistry entry for its uploadId.
 */
export interface UploadProgress {
  /** Declared size of the incoming file in bytes */
  totalSize: number;
  /** Bytes written so far, never more than totalSize */
  uploadedSoFar: number;
}

/**
 * Wire shape of GET /progress.
 * An unknown uploadId answers { total: 0, uploaded: 0 }.
 */
export interface ProgressSnapshot {
  total: number;
  uploaded: number;
}

/**
 * A file the operator offers for download.
 */
export interface DownloadFile {
  /** Basename shown on the download page and used by GET /download?file= */
  displayName: string;
  /** Resolved when the file was added, never changes afterwards */
  absolutePath: string;
  /** Byte size divided by 1024, rounded up */
  sizeInKB: number;
}

export type ServerState = 'stopped' | 'starting' | 'running';

export type StopResult = 'stopped' | 'not-running';

/** Which page the advertised URL opens */
export type SessionPage = 'upload' | 'download';

/**
 * What a successful start hands back to the operator.
 */
export interface StartedSession {
  /** The port actually bound, useful when 0 was requested */
  port: number;
  url: string;
  page: SessionPage;
}

/**
 * Resolves the address other devices on the LAN reach this machine at.
 */
export type LanAddressResolver = () => Promise<string>;
