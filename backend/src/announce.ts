import QRCode from 'qrcode';
import { errorMessage } from './errors';
import type { StartedSession } from './types';

export type QrRenderer = (url: string) => Promise<string>;

export function renderTerminalQr(url: string): Promise<string> {
  return QRCode.toString(url, { type: 'terminal', errorCorrectionLevel: 'M' });
}

export function describeSession(session: StartedSession): string {
  if (session.page === 'download') {
    return `Download service started\nDownload list: ${session.url}\nScan the code to open the download page`;
  }
  return `Upload service started\nUpload page: ${session.url}\nScan the code to open the upload page`;
}

/**
 * Print the session URL and its QR code. A rendering failure leaves the
 * server running; the URL is still printed.
 */
export async function announceSession(session: StartedSession, render: QrRenderer = renderTerminalQr): Promise<void> {
  console.log(`\n${describeSession(session)}`);
  try {
    console.log(await render(session.url));
  } catch (err) {
    console.error(`Failed to render QR code: ${errorMessage(err)}`);
  }
}
