import http from 'http';
import type { Express } from 'express';
import { createApp } from './app';
import { parsePort } from './config';
import type { TransferConfig } from './config';
import type { DownloadCatalog } from './downloadCatalog';
import { ServerStartError, errorMessage } from './errors';
import { LOOPBACK_LABEL, discoverLanAddress } from './lanAddress';
import { buildSessionUrl } from './sessionUrl';
import type { LanAddressResolver, ServerState, StartedSession, StopResult } from './types';
import type { UploadSessionRegistry } from './uploadSessions';

export interface TransferServerOptions {
  catalog: DownloadCatalog;
  registry: UploadSessionRegistry;
  config: TransferConfig;
  /** Defaults to gateway-based LAN discovery */
  resolveLanAddress?: LanAddressResolver;
}

function listen(server: http.Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      server.off('listening', onListening);
      reject(err);
    };
    const onListening = () => {
      server.off('error', onError);
      const address = server.address();
      resolve(typeof address === 'object' && address ? address.port : port);
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port, host);
  });
}

/**
 * Owns the HTTP listener of the transfer service.
 *
 * Routes are wired once, when the server object is built; start and stop
 * only create and tear down the listening socket. Lifecycle calls run one
 * after another, so two starts never race for the same port.
 */
export class TransferServer {
  private readonly app: Express;
  private readonly catalog: DownloadCatalog;
  private readonly config: TransferConfig;
  private readonly resolveLanAddress: LanAddressResolver;
  private server: http.Server | null = null;
  private state: ServerState = 'stopped';
  private boundPort: number | null = null;
  private lastRequestedPort: number;
  private session: StartedSession | null = null;
  private transition: Promise<unknown> = Promise.resolve();

  constructor({ catalog, registry, config, resolveLanAddress }: TransferServerOptions) {
    this.catalog = catalog;
    this.config = config;
    this.lastRequestedPort = config.port;
    this.resolveLanAddress =
      resolveLanAddress ?? (() => discoverLanAddress({ publicHost: config.publicHost }));
    this.app = createApp({ catalog, registry, config });
  }

  get status(): ServerState {
    return this.state;
  }

  /** Bound port while running */
  get port(): number | null {
    return this.boundPort;
  }

  /** URL computed at the last successful start; catalog changes after that do not move it */
  get currentSession(): StartedSession | null {
    return this.session;
  }

  /**
   * Bind a listener on the given port, closing the current one first.
   */
  async start(port: number | string = this.config.port): Promise<StartedSession> {
    const requested = parsePort(port);
    return this.serialize(() => this.doStart(requested));
  }

  stop(): Promise<StopResult> {
    return this.serialize(() => this.doStop());
  }

  /** Rebinds on the port of the latest start, including one still queued */
  restart(): Promise<StartedSession> {
    return this.serialize(() => this.doStart(this.lastRequestedPort));
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.transition.then(task);
    this.transition = run.catch(() => undefined);
    return run;
  }

  private async doStart(port: number): Promise<StartedSession> {
    if (this.server) {
      try {
        await this.closeListener();
      } catch (err) {
        console.error(`Failed to stop previous server: ${errorMessage(err)}`);
      }
    }

    this.state = 'starting';
    this.lastRequestedPort = port;
    const server = http.createServer(this.app);

    const boundPort = await listen(server, port, this.config.host).catch((err: unknown) => {
      this.state = 'stopped';
      throw new ServerStartError(port, err instanceof Error ? err : new Error(String(err)));
    });

    server.on('error', (err) => {
      console.error(`Server error on port ${boundPort}: ${err.message}`);
    });
    this.server = server;
    this.boundPort = boundPort;
    this.state = 'running';

    const host = await this.resolveLanAddress().catch((err: unknown) => {
      console.warn(`LAN address discovery failed: ${errorMessage(err)}`);
      return LOOPBACK_LABEL;
    });
    const { url, page } = buildSessionUrl({ host, port: boundPort, catalogEmpty: this.catalog.isEmpty() });
    this.session = { port: boundPort, url, page };

    console.log(`Server listening on http://${this.config.host}:${boundPort}`);
    console.log(`Uploads directory: ${this.config.uploadDir}`);
    console.log(`Session URL (${page} page): ${url}`);
    return this.session;
  }

  private async doStop(): Promise<StopResult> {
    if (!this.server) {
      return 'not-running';
    }
    await this.closeListener();
    console.log('Server stopped');
    return 'stopped';
  }

  /**
   * Stop accepting connections, drop idle keep-alive sockets at once and
   * give in-flight requests shutdownGraceMs before destroying them.
   */
  private async closeListener(): Promise<void> {
    const server = this.server;
    this.server = null;
    this.boundPort = null;
    this.session = null;
    this.state = 'stopped';
    if (!server) {
      return;
    }

    const grace = setTimeout(() => server.closeAllConnections(), this.config.shutdownGraceMs);
    grace.unref();
    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeIdleConnections();
      });
    } finally {
      clearTimeout(grace);
    }
  }
}
