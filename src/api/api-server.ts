import express, { Express, NextFunction, Request, Response } from 'express';
import * as http from 'http';
import { ArtworkRegistry } from '../registry';
import { StructuredLogger, logger as defaultLogger } from '../logging/structured-logger';
import { RegistryAPI } from './registry-api';
import { CALLER_HEADER } from './request-params';

const COMPONENT = 'APIServer';

export class RegistryAPIServer {
  private readonly app: Express;
  private readonly registryAPI: RegistryAPI;
  private httpServer?: http.Server;

  constructor(
    private readonly registry: ArtworkRegistry,
    private readonly logger: StructuredLogger = defaultLogger
  ) {
    this.app = express();
    this.registryAPI = new RegistryAPI(registry, logger);
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(express.json({ limit: '256kb' }));

    this.app.use((req, res, next) => {
      res.header('Access-Control-Allow-Origin', '*');
      res.header('Access-Control-Allow-Methods', 'GET, POST, PUT, OPTIONS');
      res.header('Access-Control-Allow-Headers', `Content-Type, ${CALLER_HEADER}`);

      if (req.method === 'OPTIONS') {
        res.sendStatus(200);
      } else {
        next();
      }
    });

    this.app.use((req, res, next) => {
      const startedAt = Date.now();
      res.on('finish', () => {
        this.logger.debug(COMPONENT, `${req.method} ${req.path}`, {
          status: res.statusCode,
          ms: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  private setupRoutes(): void {
    const api = this.registryAPI;

    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', latestId: this.registry.getLatestId() });
    });

    // Static paths first so they are not captured by /:id
    this.app.post('/api/artworks/batch', api.batchMint.bind(api));
    this.app.post('/api/artworks/reserve', api.reserveIds.bind(api));
    this.app.get('/api/artworks/transferred', api.listTransferred.bind(api));
    this.app.get('/api/artworks/pagination', api.paginateInfo.bind(api));

    this.app.post('/api/artworks', api.addArtwork.bind(api));
    this.app.get('/api/artworks', api.listArtworks.bind(api));
    this.app.get('/api/artworks/:id', api.getArtwork.bind(api));
    this.app.post('/api/artworks/:id/transfer', api.transfer.bind(api));
    this.app.put('/api/artworks/:id/details', api.updateDetails.bind(api));
    this.app.put('/api/artworks/:id/details/secure', api.secureUpdateDetails.bind(api));

    this.app.get('/api/registry/stats', api.getStats.bind(api));

    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ success: false, error: 'Not found' });
    });

    // Malformed JSON bodies land here
    this.app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
        ? err.status
        : 500;
      const message = err instanceof Error ? err.message : String(err);
      if (status >= 500) {
        this.logger.error(COMPONENT, 'Request failed', { error: message });
      }
      res.status(status).json({ success: false, error: message });
    });
  }

  start(port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, () => {
        this.logger.info(COMPONENT, 'Listening', { port });
        resolve();
      });
      server.once('error', reject);
      this.httpServer = server;
    });
  }

  stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return Promise.resolve();
    this.httpServer = undefined;

    return new Promise((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
  }
}
