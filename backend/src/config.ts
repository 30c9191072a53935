import path from 'path';
import { ConfigError, InvalidPortError } from './errors';

export const DEFAULT_PORT = 1082;
export const DEFAULT_MAX_UPLOAD_MB = 100;

export interface TransferConfig {
  /** Interface the listener binds to */
  host: string;
  port: number;
  /** Directory uploaded files are written into */
  uploadDir: string;
  maxUploadBytes: number;
  /** How long in-flight requests may run after a stop before their sockets are destroyed */
  shutdownGraceMs: number;
  /** Overrides LAN discovery for the advertised URL */
  publicHost?: string;
}

/**
 * Parse a port number typed by the operator or read from the environment.
 * 0 asks the OS for any free port.
 */
export function parsePort(input: string | number): number {
  if (typeof input === 'string' && !/^\d+$/.test(input.trim())) {
    throw new InvalidPortError(input);
  }
  const port = typeof input === 'number' ? input : Number(input.trim());
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidPortError(input);
  }
  return port;
}

function readPositiveNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive number, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TransferConfig {
  const maxUploadMb = readPositiveNumber(env, 'MAX_UPLOAD_MB', DEFAULT_MAX_UPLOAD_MB);

  return {
    host: env.HOST || '0.0.0.0',
    port: env.PORT ? parsePort(env.PORT) : DEFAULT_PORT,
    uploadDir: path.resolve(env.UPLOADS_DIR || process.cwd()),
    maxUploadBytes: Math.floor(maxUploadMb * 1024 * 1024),
    shutdownGraceMs: readPositiveNumber(env, 'SHUTDOWN_GRACE_MS', 5000),
    publicHost: env.PUBLIC_HOST || undefined,
  };
}
