import readline from 'readline';
import type { DownloadCatalog } from './downloadCatalog';
import { describeDownloadFile } from './downloadCatalog';
import { errorMessage } from './errors';
import type { TransferServer } from './server';
import type { StartedSession } from './types';

export const HELP_TEXT = [
  'Commands:',
  '  add <path>     offer a file for download',
  '  files          list the files on offer',
  '  start [port]   start the service (restarts it when running)',
  '  stop           stop the service',
  '  restart        stop, then start on the same port',
  '  url            show the session URL',
  '  quit           stop the service and exit',
].join('\n');

export interface ConsoleContext {
  server: TransferServer;
  catalog: DownloadCatalog;
  announce: (session: StartedSession) => Promise<void>;
}

export interface CommandResult {
  output: string;
  quit?: boolean;
}

export function describeCatalog(catalog: DownloadCatalog): string {
  const files = catalog.list();
  if (files.length === 0) {
    return 'No files selected';
  }
  return files.map((file, i) => `${i + 1}. ${file.displayName} (${file.sizeInKB} KB)`).join('\n');
}

async function startAndAnnounce(ctx: ConsoleContext, start: () => Promise<StartedSession>): Promise<string> {
  const session = await start();
  await ctx.announce(session);
  return `Listening on port ${session.port}`;
}

async function dispatch(command: string, arg: string, ctx: ConsoleContext): Promise<CommandResult> {
  switch (command) {
    case '':
      return { output: '' };
    case 'help':
      return { output: HELP_TEXT };
    case 'add': {
      if (!arg) {
        return { output: 'Usage: add <path>' };
      }
      const file = await describeDownloadFile(arg);
      ctx.catalog.add(file);
      const note = ctx.server.status === 'running' ? '\nRestart the service to advertise the download page' : '';
      return { output: `Added ${file.displayName} (${file.sizeInKB} KB)${note}` };
    }
    case 'files':
      return { output: describeCatalog(ctx.catalog) };
    case 'start':
      return { output: await startAndAnnounce(ctx, () => (arg ? ctx.server.start(arg) : ctx.server.start())) };
    case 'restart':
      return { output: await startAndAnnounce(ctx, () => ctx.server.restart()) };
    case 'stop': {
      const result = await ctx.server.stop();
      return { output: result === 'stopped' ? 'Service stopped' : 'No service is running' };
    }
    case 'url': {
      const session = ctx.server.currentSession;
      return { output: session ? session.url : 'No service is running' };
    }
    case 'quit':
    case 'exit':
      await ctx.server.stop();
      return { output: 'Bye', quit: true };
    default:
      return { output: `Unknown command: ${command}\n${HELP_TEXT}` };
  }
}

/**
 * Run one operator command. Failures are reported back as text; the
 * operator decides whether to retry.
 */
export async function runCommand(line: string, ctx: ConsoleContext): Promise<CommandResult> {
  const trimmed = line.trim();
  const space = trimmed.indexOf(' ');
  const command = (space === -1 ? trimmed : trimmed.slice(0, space)).toLowerCase();
  const arg = space === -1 ? '' : trimmed.slice(space + 1).trim();

  try {
    return await dispatch(command, arg, ctx);
  } catch (err) {
    return { output: `Error: ${errorMessage(err)}` };
  }
}

/**
 * Read commands from stdin one at a time until quit or end of input.
 */
export function startOperatorConsole(ctx: ConsoleContext, onClose: () => void): readline.Interface {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: 'qrdrop> ' });
  let queue = Promise.resolve();

  rl.on('line', (line) => {
    queue = queue.then(async () => {
      const result = await runCommand(line, ctx);
      if (result.output) {
        console.log(result.output);
      }
      if (result.quit) {
        rl.close();
      } else {
        rl.prompt();
      }
    });
  });
  rl.once('close', onClose);

  console.log(HELP_TEXT);
  rl.prompt();
  return rl;
}
