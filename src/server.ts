import type { Server } from 'node:http';

import express, { type Express } from 'express';

import { config } from './config/index.js';
import { MethodNotAllowedError, NotFoundError } from './errors/app-error.js';
import { createExtractHandler } from './http/extract-route.js';
import { registerHealthRoute } from './http/health.js';
import { errorHandler } from './middleware/error-handler.js';
import { createSecurityHeadersMiddleware } from './middleware/security-headers.js';
import { ArticleFetcher } from './services/article-fetcher.js';
import { readabilityExtractor } from './services/extractor.js';
import { SafeTransport } from './services/fetcher.js';
import { logInfo } from './services/logger.js';
import { linkedomParser } from './services/parser.js';

export interface AppDependencies {
  transport: SafeTransport;
  fetcher: ArticleFetcher;
}

export function createDefaultDependencies(): AppDependencies {
  const transport = new SafeTransport({
    timeoutMs: config.fetcher.timeoutMs,
    connectTimeoutMs: config.fetcher.connectTimeoutMs,
    maxRedirects: config.fetcher.maxRedirects,
  });
  const fetcher = new ArticleFetcher({
    transport,
    parser: linkedomParser,
    extractor: readabilityExtractor,
    config: config.fetcher,
  });
  return { transport, fetcher };
}

export function createApp(deps: AppDependencies): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(createSecurityHeadersMiddleware(config.security));

  app.get('/', createExtractHandler(deps.fetcher));
  app.all('/', (req, _res, next) => {
    next(new MethodNotAllowedError(req.method));
  });

  registerHealthRoute(app);

  app.use((req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path}`));
  });
  app.use(errorHandler);

  return app;
}

export interface RunningServer {
  server: Server;
  deps: AppDependencies;
}

export async function startServer(
  deps: AppDependencies = createDefaultDependencies()
): Promise<RunningServer> {
  const app = createApp(deps);
  const { host, port } = config.server;

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, host, () => {
      resolve(listening);
    });
    listening.once('error', reject);
  });

  logInfo(`${config.server.name} listening on http://${host}:${port}`);
  return { server, deps };
}
