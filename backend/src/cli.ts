import { ArgumentParser } from 'argparse';
import path from 'path';
import { parsePort } from './config';
import type { TransferConfig } from './config';

export interface CliOptions {
  port: number;
  host: string;
  uploadDir: string;
  files: string[];
  interactive: boolean;
}

function readString(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function readStringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

/**
 * Command-line flags override the environment-derived config.
 */
export function parseCliArgs(argv: string[], config: TransferConfig): CliOptions {
  const parser = new ArgumentParser({
    prog: 'qrdrop',
    description: 'Share files with devices on the same network through the browser',
  });

  parser.add_argument('-p', '--port', { help: `port to listen on (default ${config.port})` });
  parser.add_argument('--host', { help: `interface to bind (default ${config.host})` });
  parser.add_argument('-d', '--upload-dir', { help: 'directory uploaded files are saved in' });
  parser.add_argument('--no-console', {
    action: 'store_true',
    help: 'do not read operator commands from stdin',
  });
  parser.add_argument('files', { nargs: '*', help: 'files to offer for download' });

  const args: Record<string, unknown> = parser.parse_args(argv);

  return {
    port: args.port === undefined || args.port === null ? config.port : parsePort(readString(args.port, '')),
    host: readString(args.host, config.host),
    uploadDir: path.resolve(readString(args.upload_dir, config.uploadDir)),
    files: readStringList(args.files),
    interactive: args.no_console !== true,
  };
}
