#!/usr/bin/env node
import { announceSession } from './announce';
import { parseCliArgs } from './cli';
import { loadConfig } from './config';
import { DownloadCatalog, describeDownloadFile } from './downloadCatalog';
import { startOperatorConsole } from './operatorConsole';
import { TransferServer } from './server';
import { UploadSessionRegistry } from './uploadSessions';

async function main(): Promise<void> {
  const env = loadConfig();
  const options = parseCliArgs(process.argv.slice(2), env);
  const config = { ...env, port: options.port, host: options.host, uploadDir: options.uploadDir };

  const catalog = new DownloadCatalog();
  for (const file of options.files) {
    catalog.add(await describeDownloadFile(file));
  }

  const server = new TransferServer({ catalog, registry: new UploadSessionRegistry(), config });
  await announceSession(await server.start());

  let shuttingDown = false;
  const shutdown = (reason: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`${reason}, closing server...`);
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('Failed to stop server:', err);
        process.exit(1);
      },
    );
  };

  // Graceful shutdown
  process.on('SIGTERM', () => shutdown('SIGTERM received'));
  process.on('SIGINT', () => shutdown('SIGINT received'));

  if (options.interactive && process.stdin.isTTY) {
    startOperatorConsole({ server, catalog, announce: (session) => announceSession(session) }, () =>
      shutdown('Console closed'),
    );
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
