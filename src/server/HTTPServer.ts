import express, { Request, Response, NextFunction } from 'express';
import {
  InvalidArgumentError,
  NotFoundError,
  OutOfRangeError,
  UnderflowError,
} from '../common/Errors';
import type { IOrderedSymbolTable } from '../interfaces/SymbolTable';

export interface HTTPServerOptions {
  port: number;
  jsonBodyLimit?: string;
}

/**
 * JSON front end over a single symbol table.
 *
 * Every handler runs synchronously against the table, so requests are
 * applied one at a time on the event loop and never interleave.
 */
export class HTTPServer {
  private readonly app: express.Application;
  private readonly table: IOrderedSymbolTable<string, string>;
  private readonly options: HTTPServerOptions;
  private server: ReturnType<express.Application['listen']> | null = null;

  constructor(table: IOrderedSymbolTable<string, string>, options: HTTPServerOptions) {
    this.table = table;
    this.options = options;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  /**
   * Bound port once listening (useful with port 0), else the configured one.
   */
  get port(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.options.port;
  }

  private setupMiddleware(): void {
    this.app.use(express.json({ limit: this.options.jsonBodyLimit ?? '1mb' }));
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', timestamp: Date.now() });
    });

    this.app.post('/put', this.handlePut.bind(this));
    this.app.get('/get/:key', this.handleGet.bind(this));
    this.app.delete('/delete/:key', this.handleDelete.bind(this));
    this.app.get('/contains/:key', this.handleContains.bind(this));
    this.app.get('/size', this.handleSize.bind(this));

    this.app.get('/min', (_req: Request, res: Response) => {
      res.json({ key: this.table.min() });
    });
    this.app.get('/max', (_req: Request, res: Response) => {
      res.json({ key: this.table.max() });
    });
    this.app.delete('/min', (_req: Request, res: Response) => {
      res.json({ key: this.table.deleteMin() });
    });
    this.app.delete('/max', (_req: Request, res: Response) => {
      res.json({ key: this.table.deleteMax() });
    });

    this.app.get('/floor/:key', (req: Request, res: Response) => {
      res.json({ key: this.table.floor(req.params.key) });
    });
    this.app.get('/ceil/:key', (req: Request, res: Response) => {
      res.json({ key: this.table.ceil(req.params.key) });
    });
    this.app.get('/rank/:key', (req: Request, res: Response) => {
      res.json({ key: req.params.key, rank: this.table.rank(req.params.key) });
    });
    this.app.get('/select/:rank', this.handleSelect.bind(this));

    this.app.get('/keys', (_req: Request, res: Response) => {
      const keys = this.table.keys();
      res.json({ count: keys.length, keys });
    });
    this.app.get('/range', this.handleRange.bind(this));
    this.app.get('/level-order', (_req: Request, res: Response) => {
      res.json({ height: this.table.height(), levels: this.table.levelOrder() });
    });
    this.app.get('/check', (_req: Request, res: Response) => {
      res.json(this.table.check());
    });
  }

  private setupErrorHandling(): void {
    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      const status = statusFor(err);
      if (status === 500) {
        console.error('Unhandled error:', err);
        res.status(500).json({ error: 'Internal server error' });
        return;
      }
      res.status(status).json({ error: err.message, type: err.name });
    });
  }

  private handlePut(req: Request, res: Response): void {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      res.status(400).json({ error: 'Invalid request body: expected a JSON object' });
      return;
    }

    const { key, value } = body;
    if (typeof key !== 'string' || key.length === 0) {
      res.status(400).json({ error: 'Invalid key: must be non-empty string' });
      return;
    }
    if (value === undefined || value === null) {
      res.status(400).json({ error: 'Invalid value: must not be null or undefined' });
      return;
    }

    const existed = this.table.contains(key);
    this.table.put(key, String(value));
    res.json({ success: true, created: !existed, size: this.table.size() });
  }

  private handleGet(req: Request, res: Response): void {
    const key = req.params.key;
    const value = this.table.get(key);

    if (value === undefined) {
      res.status(404).json({ error: 'Key not found', key });
      return;
    }

    res.json({ key, value });
  }

  private handleDelete(req: Request, res: Response): void {
    const deleted = this.table.delete(req.params.key);
    res.json({ success: true, deleted, size: this.table.size() });
  }

  private handleContains(req: Request, res: Response): void {
    const key = req.params.key;
    res.json({ key, contains: this.table.contains(key) });
  }

  private handleSize(_req: Request, res: Response): void {
    res.json({
      size: this.table.size(),
      empty: this.table.isEmpty(),
      height: this.table.height(),
    });
  }

  private handleSelect(req: Request, res: Response): void {
    const raw = req.params.rank;
    if (!/^-?\d+$/.test(raw)) {
      res.status(400).json({ error: 'Invalid rank: must be an integer' });
      return;
    }

    const rank = parseInt(raw, 10);
    res.json({ rank, key: this.table.select(rank) });
  }

  private handleRange(req: Request, res: Response): void {
    const { start, end } = req.query;

    if (typeof start !== 'string' || start.length === 0) {
      res.status(400).json({ error: 'Invalid start: must be non-empty string' });
      return;
    }

    if (typeof end !== 'string' || end.length === 0) {
      res.status(400).json({ error: 'Invalid end: must be non-empty string' });
      return;
    }

    const keys = this.table.rangeKeys(start, end);
    res.json({ count: keys.length, keys });
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = this.app.listen(this.options.port, () => {
        console.log(`HTTP server listening on port ${this.port}`);
        resolve();
      });

      this.server.on('error', (err: Error) => {
        reject(err);
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server;
      if (server === null) {
        resolve();
        return;
      }

      server.close((err?: Error) => {
        if (err) {
          reject(err);
          return;
        }
        this.server = null;
        console.log('HTTP server stopped');
        resolve();
      });
    });
  }
}

function statusFor(err: Error): number {
  if (err instanceof InvalidArgumentError || err instanceof OutOfRangeError) return 400;
  if (err instanceof NotFoundError) return 404;
  if (err instanceof UnderflowError) return 409;
  // body-parser errors (malformed JSON, oversized body) carry their own client status
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return 500;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
