import type { DownloadFile } from '../types';
import { PAGE_STYLES, escapeHtml } from './layout';

export const EMPTY_CATALOG_TEXT = 'No files available for download';

function renderRow(file: DownloadFile): string {
  const name = escapeHtml(file.displayName);
  const href = `/download?file=${encodeURIComponent(file.displayName)}`;
  return `
      <div class="file-list-item">
        <div class="col-name">${name}</div>
        <div class="col-size">${file.sizeInKB}</div>
        <div class="col-op"><a href="${escapeHtml(href)}" class="download-btn" download>Download</a></div>
      </div>`;
}

export function renderDownloadPage(files: readonly DownloadFile[]): string {
  const rows =
    files.length === 0 ? `\n      <div class="empty-tip">${EMPTY_CATALOG_TEXT}</div>` : files.map(renderRow).join('');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Downloads</title>
  <style>${PAGE_STYLES}
    .file-list-container { margin-top: 2rem; border: 1px solid #eee; border-radius: 8px; overflow: hidden; }
    .file-list-header { display: flex; background: #4285f4; color: white; font-weight: bold; font-size: 16px; }
    .file-list-item { display: flex; border-bottom: 1px solid #eee; align-items: stretch; }
    .file-list-item:last-child { border-bottom: none; }
    .col-name { flex: 1; padding: 1.2rem 1rem; font-size: 16px; line-height: 1.6; word-break: break-all; align-self: center; }
    .col-size { width: 100px; padding: 1.2rem 1rem; text-align: center; white-space: nowrap; align-self: center; }
    .col-op { width: 120px; padding: 1.2rem 1rem; text-align: center; align-self: center; }
    .download-btn { display: inline-block; background: #4285f4; color: white; padding: 0.8rem 1rem; text-decoration: none; border-radius: 6px; }
    .empty-tip { padding: 2rem; text-align: center; color: #999; font-size: 16px; }
  </style>
</head>
<body>
  <h1>Downloads</h1>
  <div class="file-list-container">
    <div class="file-list-header">
      <div class="col-name">File</div>
      <div class="col-size">Size (KB)</div>
      <div class="col-op"></div>
    </div>${rows}
  </div>
  <div class="nav-link"><a href="/">Go to upload page</a></div>
</body>
</html>
`;
}
