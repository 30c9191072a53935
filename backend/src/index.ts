export { createApp } from './app';
export type { AppDeps } from './app';
export { loadConfig, parsePort } from './config';
export type { TransferConfig } from './config';
export { DownloadCatalog, describeDownloadFile } from './downloadCatalog';
export * from './errors';
export { discoverLanAddress } from './lanAddress';
export { receiveUpload } from './multipartUpload';
export { ProgressTrackingStream } from './progressStream';
export { TransferServer } from './server';
export type { TransferServerOptions } from './server';
export { buildSessionUrl } from './sessionUrl';
export type * from './types';
export { UploadSessionRegistry } from './uploadSessions';
