import http, { IncomingMessage, ServerResponse } from 'node:http';
import fs from 'node:fs';
import path from 'node:path';
import { URL } from 'node:url';
import logger from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { LogBuffer } from './logBuffer.js';
import { createLogsRouter } from './routes/logs.js';

export interface HttpServerOptions {
  buffer: LogBuffer;
  port?: number;
  host?: string;
  staticDir?: string;
  metrics?: MetricsRegistry;
  getState?: () => string;
  heartbeatMs?: number;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const port = options.port ?? 5000;
  const host = options.host ?? '127.0.0.1';
  const staticDir = options.staticDir ?? path.resolve(process.cwd(), 'public');

  const logsRouter = createLogsRouter({
    buffer: options.buffer,
    metrics: options.metrics ?? metrics,
    getState: options.getState,
    heartbeatMs: options.heartbeatMs
  });

  const server = http.createServer((req, res) => {
    try {
      if (logsRouter.handle(req, res)) {
        return;
      }

      if (serveStatic(req, res, staticDir)) {
        return;
      }

      res.statusCode = 404;
      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify({ error: 'Not found' }));
    } catch (error) {
      logger.error({ err: error }, 'HTTP request failed');
      if (!res.headersSent) {
        res.statusCode = 500;
        res.setHeader('Content-Type', 'application/json');
      }
      res.end(JSON.stringify({ error: 'Internal server error' }));
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  logger.info({ port: actualPort, host }, 'HTTP server listening');

  let closing: Promise<void> | null = null;

  return {
    server,
    port: actualPort,
    close: () => {
      if (closing) {
        return closing;
      }
      // Streaming responses never finish on their own, so end them before close.
      logsRouter.close();
      closing = new Promise<void>((resolve, reject) => {
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
        server.closeAllConnections();
      });
      return closing;
    }
  };
}

function serveStatic(req: IncomingMessage, res: ServerResponse, directory: string): boolean {
  if (!req.url) {
    return false;
  }

  if (req.method !== 'GET' && req.method !== 'HEAD') {
    return false;
  }

  const url = new URL(req.url, 'http://localhost');
  let pathname: string;
  try {
    pathname = decodeURIComponent(url.pathname);
  } catch {
    return false;
  }
  if (pathname === '/' || pathname === '') {
    pathname = '/index.html';
  }

  const normalized = path.normalize(pathname).replace(/^[/\\]+/, '');
  const root = path.resolve(directory);
  const candidatePath = path.resolve(root, normalized);
  const rootWithSep = root.endsWith(path.sep) ? root : `${root}${path.sep}`;
  if (!candidatePath.startsWith(rootWithSep)) {
    return false;
  }

  let stats: fs.Stats;
  try {
    stats = fs.statSync(candidatePath);
  } catch {
    return false;
  }

  if (!stats.isFile()) {
    return false;
  }

  res.writeHead(200, { 'Content-Type': getContentType(candidatePath) });

  if (req.method === 'HEAD') {
    res.end();
    return true;
  }

  const stream = fs.createReadStream(candidatePath);
  stream.on('error', error => {
    logger.error({ err: error }, 'Failed to read static asset');
    res.end();
  });

  stream.pipe(res);
  return true;
}

function getContentType(filePath: string): string {
  switch (path.extname(filePath).toLowerCase()) {
    case '.html':
      return 'text/html; charset=utf-8';
    case '.js':
      return 'application/javascript; charset=utf-8';
    case '.css':
      return 'text/css; charset=utf-8';
    case '.json':
      return 'application/json; charset=utf-8';
    default:
      return 'application/octet-stream';
  }
}

export default startHttpServer;
