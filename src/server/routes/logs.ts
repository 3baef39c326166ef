import { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import logger from '../../logger.js';
import metricsModule, { type MetricsRegistry } from '../../metrics/index.js';
import type { LogBuffer } from '../logBuffer.js';

const DEFAULT_HEARTBEAT_MS = 15000;
const DEFAULT_RETRY_MS = 3000;

export interface LogsRouterOptions {
  buffer: LogBuffer;
  metrics?: MetricsRegistry;
  getState?: () => string;
  heartbeatMs?: number;
}

type Handler = (req: IncomingMessage, res: ServerResponse, url: URL) => boolean;

type ClientState = {
  heartbeat: NodeJS.Timeout;
  /** Set when an update was skipped while the client's socket buffer was full. */
  stale: boolean;
};

export class LogsRouter {
  private readonly buffer: LogBuffer;
  private readonly clients = new Map<ServerResponse, ClientState>();
  private readonly handlers: Handler[];
  private readonly heartbeatMs: number;
  private readonly metrics: MetricsRegistry;
  private readonly getState: () => string;

  constructor(options: LogsRouterOptions) {
    this.buffer = options.buffer;
    this.metrics = options.metrics ?? metricsModule;
    this.getState = options.getState ?? (() => 'unknown');
    this.heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
    this.handlers = [
      (req, res, url) => this.handleStream(req, res, url),
      (req, res, url) => this.handleList(req, res, url),
      (req, res, url) => this.handleHealth(req, res, url)
    ];
    this.buffer.on('change', this.handleBufferChange);
  }

  get clientCount() {
    return this.clients.size;
  }

  handle(req: IncomingMessage, res: ServerResponse): boolean {
    if (!req.url) {
      return false;
    }

    const url = new URL(req.url, 'http://localhost');
    for (const handler of this.handlers) {
      if (handler(req, res, url)) {
        return true;
      }
    }

    return false;
  }

  close() {
    this.buffer.off('change', this.handleBufferChange);
    for (const [client, state] of this.clients) {
      clearInterval(state.heartbeat);
      client.end();
    }
    this.clients.clear();
  }

  private readonly handleBufferChange = (entries: string[]) => {
    const payload = JSON.stringify(entries);
    for (const [client, state] of this.clients) {
      if (client.writableEnded) {
        this.dropClient(client, state);
        continue;
      }
      // Every event carries the whole buffer, so a client that has not drained
      // only needs the latest one.
      if (client.writableNeedDrain) {
        state.stale = true;
        continue;
      }
      if (!writeData(client, payload)) {
        this.dropClient(client, state);
      }
    }
  };

  private dropClient(client: ServerResponse, state: ClientState) {
    clearInterval(state.heartbeat);
    this.clients.delete(client);
  }

  private readonly handleDrain = (client: ServerResponse) => {
    const state = this.clients.get(client);
    if (!state?.stale) {
      return;
    }
    state.stale = false;
    if (!writeData(client, JSON.stringify(this.buffer.snapshot()))) {
      this.dropClient(client, state);
    }
  };

  private handleList(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/logs') {
      return false;
    }

    sendJson(res, 200, { items: this.buffer.snapshot() });
    return true;
  }

  private handleHealth(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/health') {
      return false;
    }

    sendJson(res, 200, {
      status: 'ok',
      state: this.getState(),
      streamClients: this.clients.size,
      metrics: this.metrics.snapshot()
    });
    return true;
  }

  private handleStream(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/stream') {
      return false;
    }

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive'
    });
    res.write(': connected\n');
    res.write(`retry: ${DEFAULT_RETRY_MS}\n\n`);

    const entries = this.buffer.snapshot();
    if (entries.length > 0) {
      writeData(res, JSON.stringify(entries));
    }

    const heartbeat = setInterval(() => {
      if (res.writableEnded || !sendHeartbeat(res)) {
        clearInterval(heartbeat);
        this.clients.delete(res);
      }
    }, this.heartbeatMs);

    if (typeof heartbeat.unref === 'function') {
      heartbeat.unref();
    }

    this.clients.set(res, { heartbeat, stale: false });
    const onDrain = () => this.handleDrain(res);
    res.on('drain', onDrain);
    logger.debug({ clients: this.clients.size }, 'Log stream client connected');

    let cleanedUp = false;
    const cleanup = () => {
      if (cleanedUp) {
        return;
      }
      cleanedUp = true;

      req.off('close', cleanup);
      req.off('error', cleanup);
      res.off('error', cleanup);
      res.off('close', cleanup);
      res.off('drain', onDrain);

      const client = this.clients.get(res);
      if (client) {
        clearInterval(client.heartbeat);
      }
      this.clients.delete(res);
    };

    req.on('close', cleanup);
    req.on('error', cleanup);
    res.on('error', cleanup);
    res.on('close', cleanup);
    return true;
  }
}

function writeData(res: ServerResponse, payload: string): boolean {
  try {
    res.write(`data: ${payload}\n\n`);
    return true;
  } catch (error) {
    logger.debug({ err: error }, 'Failed to write to log stream client');
    return false;
  }
}

function sendHeartbeat(res: ServerResponse): boolean {
  try {
    res.write(`: heartbeat ${Date.now()}\n\n`);
    return true;
  } catch (error) {
    logger.debug({ err: error }, 'Failed to send log stream heartbeat');
    return false;
  }
}

function sendJson(res: ServerResponse, status: number, payload: Record<string, unknown>) {
  if (!res.headersSent) {
    res.writeHead(status, { 'Content-Type': 'application/json' });
  }
  res.end(JSON.stringify(payload));
}

export function createLogsRouter(options: LogsRouterOptions) {
  return new LogsRouter(options);
}
