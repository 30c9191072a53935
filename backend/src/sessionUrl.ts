import type { SessionPage } from './types';

export const UPLOAD_PAGE_PATH = '/';
export const DOWNLOAD_PAGE_PATH = '/download-page';

export interface SessionUrlInput {
  host: string;
  port: number;
  catalogEmpty: boolean;
}

export interface SessionUrl {
  url: string;
  page: SessionPage;
}

/**
 * URL to put in the QR code: the download list when files are on offer,
 * the upload page otherwise.
 */
export function buildSessionUrl({ host, port, catalogEmpty }: SessionUrlInput): SessionUrl {
  const page: SessionPage = catalogEmpty ? 'upload' : 'download';
  const pathname = page === 'download' ? DOWNLOAD_PAGE_PATH : UPLOAD_PAGE_PATH;
  return { url: `http://${host}:${port}${pathname}`, page };
}
