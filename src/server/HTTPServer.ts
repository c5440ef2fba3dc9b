import express, { Request, Response, NextFunction } from 'express';
import { Server } from 'http';
import { IStorageEngine } from '../interfaces/Storage';
import { StorageEngineStoppedError, ValueTooLongError } from '../common/Errors';
import { MAX_VALUE_LENGTH } from '../common/Config';

export interface HTTPServerConfig {
  readonly port: number;
  readonly host?: string | undefined;
  readonly maxValueLength?: number | undefined;
}

/**
 * JSON surface over the same storage engine the TCP listener uses. Every
 * route goes through the engine's inbox like any connection handler.
 * Values cross JSON as UTF-8 text.
 */
export class HTTPServer {
  private readonly app: express.Application;
  private readonly store: IStorageEngine;
  private readonly config: HTTPServerConfig;
  private server: Server | null = null;

  constructor(store: IStorageEngine, config: HTTPServerConfig) {
    this.store = store;
    this.config = config;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    this.app.use(express.json({ limit: '10mb' }));
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', running: this.store.isRunning(), timestamp: Date.now() });
    });

    this.app.post('/set', this.handleSet.bind(this));

    this.app.get('/get/:key', this.handleGet.bind(this));

    this.app.delete('/delete/:key', this.handleDelete.bind(this));

    this.app.get('/stats', this.handleStats.bind(this));
  }

  private setupErrorHandling(): void {
    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      console.error('HTTPServer: Unhandled error:', err);
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  private async handleSet(req: Request, res: Response): Promise<void> {
    try {
      const body: unknown = req.body;
      const key = isRecord(body) ? body['key'] : undefined;
      const value = isRecord(body) ? body['value'] : undefined;

      if (typeof key !== 'string' || key.length === 0) {
        res.status(400).json({ error: 'Invalid key: must be non-empty string' });
        return;
      }

      if (value === undefined || value === null) {
        res.status(400).json({ error: 'Invalid value: must not be null or undefined' });
        return;
      }

      const bytes = Buffer.from(String(value), 'utf8');
      const maxValueLength = this.config.maxValueLength ?? MAX_VALUE_LENGTH;
      if (bytes.length > maxValueLength) {
        res.status(413).json({ error: new ValueTooLongError(maxValueLength).message });
        return;
      }

      await this.store.set(key, bytes);
      res.json({ success: true });
    } catch (err) {
      this.handleStoreError(res, 'SET', err);
    }
  }

  private async handleGet(req: Request, res: Response): Promise<void> {
    try {
      const key = req.params['key'];

      if (!key) {
        res.status(400).json({ error: 'Key parameter required' });
        return;
      }

      const result = await this.store.get(key);

      if (!result.found) {
        res.status(404).json({ error: 'Key not found', key });
        return;
      }

      res.json({ key, value: result.value.toString('utf8') });
    } catch (err) {
      this.handleStoreError(res, 'GET', err);
    }
  }

  private async handleDelete(req: Request, res: Response): Promise<void> {
    try {
      const key = req.params['key'];

      if (!key) {
        res.status(400).json({ error: 'Key parameter required' });
        return;
      }

      await this.store.delete(key);
      res.json({ success: true });
    } catch (err) {
      this.handleStoreError(res, 'DELETE', err);
    }
  }

  private async handleStats(_req: Request, res: Response): Promise<void> {
    try {
      res.json(await this.store.stats());
    } catch (err) {
      this.handleStoreError(res, 'STATS', err);
    }
  }

  private handleStoreError(res: Response, operation: string, err: unknown): void {
    if (err instanceof StorageEngineStoppedError) {
      res.status(503).json({ error: err.message });
      return;
    }

    console.error(`HTTPServer: ${operation} error:`, err);
    res.status(500).json({ error: 'Internal server error' });
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host ?? '127.0.0.1', () => {
        console.log(`HTTPServer: Listening on port ${this.getPort()}`);
        resolve();
      });
      this.server = server;

      server.on('error', (err: Error) => {
        reject(err);
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.server;
      if (server) {
        server.closeAllConnections();
        server.close(() => {
          this.server = null;
          console.log('HTTPServer: Stopped');
          resolve();
        });
      } else {
        resolve();
      }
    });
  }

  getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
