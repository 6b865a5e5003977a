import type http from 'http';
import type { AddressInfo } from 'net';

import type { AudioDecoder } from './audio/types';
import type { ModelOptionsProvider } from './config/modelOptions';
import { log } from './log';
import { buildServer } from './server';
import { EngineGateway } from './transcription/engineGateway';
import type { TranscriptionEngine } from './transcription/types';

export type ServerState = 'stopped' | 'starting' | 'running' | 'stopping';

export interface ApiServerOptions {
  host: string;
  port: number;
  /** Absent means no model is loaded: transcription answers 503. */
  engine: TranscriptionEngine | null;
  decoder: AudioDecoder;
  modelOptions: ModelOptionsProvider;
  maxUploadBytes: number;
  shutdownGraceMs: number;
  engineTimeoutMs?: number;
  metricsEnabled?: boolean;
}

function listen(server: http.Server, host: string, port: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onError = (error: Error): void => {
      server.off('listening', onListening);
      reject(error);
    };
    const onListening = (): void => {
      server.off('error', onError);
      resolve();
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port, host);
  });
}

/**
 * Start/stop handle for the HTTP API, meant to be driven by a host process.
 * The engine gateway lives exactly as long as one running period.
 */
export class ApiServer {
  private state: ServerState = 'stopped';
  private server: http.Server | null = null;
  private gateway: EngineGateway | null = null;
  private transition: Promise<unknown> | null = null;

  constructor(private readonly options: ApiServerOptions) {}

  public get status(): ServerState {
    return this.state;
  }

  public address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  /** Resolves true once listening; false when the socket could not be bound. */
  public async start(): Promise<boolean> {
    if (this.state === 'running') return true;
    if (this.transition) {
      await this.transition;
      return this.start();
    }

    const starting = this.doStart();
    this.transition = starting;
    try {
      return await starting;
    } finally {
      this.transition = null;
    }
  }

  public async stop(): Promise<void> {
    if (this.state === 'stopped') return;
    if (this.transition) {
      await this.transition;
      return this.stop();
    }

    const stopping = this.doStop();
    this.transition = stopping;
    try {
      await stopping;
    } finally {
      this.transition = null;
    }
  }

  private async doStart(): Promise<boolean> {
    const { host, port } = this.options;
    this.state = 'starting';

    const gateway = new EngineGateway(this.options.engine, { timeoutMs: this.options.engineTimeoutMs });
    const { server } = buildServer({
      gateway,
      decoder: this.options.decoder,
      modelOptions: this.options.modelOptions,
      maxUploadBytes: this.options.maxUploadBytes,
      metricsEnabled: this.options.metricsEnabled,
    });

    try {
      await listen(server, host, port);
    } catch (error) {
      gateway.close();
      this.state = 'stopped';
      log.error({ event: 'api_server_start_failed', host, port, err: error }, 'failed to start api server');
      return false;
    }

    server.on('error', (error) => {
      log.error({ event: 'api_server_error', err: error }, 'api server error');
    });
    // Keep-alive sockets that go idle while stopping would otherwise hold close() open.
    server.on('request', (_req: http.IncomingMessage, res: http.ServerResponse) => {
      res.on('finish', () => {
        if (this.state === 'stopping') {
          setImmediate(() => server.closeIdleConnections());
        }
      });
    });
    server.on('clientError', (error, socket) => {
      log.warn({ event: 'api_client_error', err: error }, 'malformed http request');
      if (socket.writable) {
        socket.end('HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n');
      } else {
        socket.destroy();
      }
    });

    this.server = server;
    this.gateway = gateway;
    this.state = 'running';

    const bound = this.address();
    log.info(
      {
        event: 'api_server_started',
        url: `http://${host}:${bound?.port ?? port}`,
        engine: this.options.engine?.id ?? null,
      },
      'api server started',
    );
    return true;
  }

  private async doStop(): Promise<void> {
    const server = this.server;
    const gateway = this.gateway;
    this.state = 'stopping';

    if (server) {
      const closed = new Promise<void>((resolve) => {
        server.close((error) => {
          if (error) {
            log.warn({ event: 'api_server_close_error', err: error }, 'api server close error');
          }
          resolve();
        });
      });
      server.closeIdleConnections();

      // In-flight requests get the grace period, then their sockets are dropped.
      const forceClose = setTimeout(() => {
        log.warn(
          { event: 'api_server_force_close', grace_ms: this.options.shutdownGraceMs },
          'dropping connections still open after grace period',
        );
        server.closeAllConnections();
      }, this.options.shutdownGraceMs);

      await closed;
      clearTimeout(forceClose);
    }

    // Accepted requests keep the engine until their connection is finished or dropped.
    gateway?.close();

    this.server = null;
    this.gateway = null;
    this.state = 'stopped';
    log.info({ event: 'api_server_stopped' }, 'api server stopped');
  }
}
