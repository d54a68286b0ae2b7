/**
 * HTTP Transport - Express application over the actor's dispatcher
 *
 * Endpoint format:
 * POST /<method>
 *
 * Examples:
 * POST /add     {"a": 10, "b": 5}   → 15
 * POST /ping    {}                   → "pong"
 *
 * Request body: JSON params object, any content type, read as UTF-8
 * Response: dispatcher reply, always 200 once the body was read
 *
 * Key features:
 * - CORS headers on every reply, OPTIONS preflight on any path
 * - 405 for every verb other than POST and OPTIONS
 * - 400 for bodies that are not valid UTF-8
 * - Keep-alive: one connection may carry many requests
 */

import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { DispatchTarget } from '../Dispatcher.js';
import { TransportReadError } from '../errors.js';
import { Transport } from './Transport.js';
import type { Listener } from './Transport.js';

/**
 * HTTP Transport Configuration
 */
export interface HttpTransportConfig {
  /** Request body size limit (default: '10mb') */
  bodyLimit?: string;

  /** Log every request with status and duration at debug level (default: true) */
  logging?: boolean;
}

export const CORS_ALLOW_METHODS = 'POST, OPTIONS';
export const CORS_ALLOW_HEADERS = 'Content-Type';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Method name from a request path: leading slashes stripped, nothing else interpreted
 */
export function methodNameFromPath(path: string): string {
  return path.replace(/^\/+/, '');
}

/**
 * HTTP Transport
 *
 * Exposes the dispatcher as `POST /<method>`.
 */
export class HttpTransport extends Transport {
  readonly app: Express;
  private readonly config: Required<HttpTransportConfig>;
  private listener?: Listener;

  constructor(dispatcher: DispatchTarget, config: HttpTransportConfig = {}) {
    super(dispatcher, 'http');
    this.config = {
      bodyLimit: config.bodyLimit ?? '10mb',
      logging: config.logging ?? true
    };
    this.app = this.createApp();
  }

  protected onAttach(listener: Listener): void {
    this.listener = listener;
    listener.on('request', this.app);
  }

  protected async onClose(): Promise<void> {
    if (this.listener) {
      this.listener.off('request', this.app);
      this.listener = undefined;
    }
  }

  private createApp(): Express {
    const app = express();
    app.disable('x-powered-by');

    if (this.config.logging) {
      app.use(this.loggingMiddleware.bind(this));
    }

    // Preflight for any path; sets Allow-Origin on everything else
    app.use(
      cors({
        origin: '*',
        methods: CORS_ALLOW_METHODS,
        allowedHeaders: CORS_ALLOW_HEADERS,
        optionsSuccessStatus: 200
      })
    );

    app.use(this.methodGuard.bind(this));
    app.use(express.raw({ type: () => true, limit: this.config.bodyLimit }));
    app.use((req: Request, res: Response, next: NextFunction) => {
      this.operationHandler(req, res).catch(next);
    });
    app.use(this.errorHandler.bind(this));

    return app;
  }

  /**
   * Reject every verb except POST (OPTIONS never gets here)
   */
  private methodGuard(req: Request, res: Response, next: NextFunction): void {
    if (req.method === 'POST') {
      next();
      return;
    }

    res.statusCode = 405;
    res.setHeader('Content-Type', 'text/plain');
    res.end('Method Not Allowed');
  }

  /**
   * Operation handler: body → dispatcher → 200
   */
  private async operationHandler(req: Request, res: Response): Promise<void> {
    // express.raw leaves a non-Buffer body when the request carries none
    const body: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

    let rawJson: string;
    try {
      rawJson = utf8.decode(body);
    } catch {
      throw new TransportReadError('Invalid UTF-8 in request body', 400);
    }

    const reply = await this.invoke(methodNameFromPath(req.path), rawJson);

    res.statusCode = 200;
    res.setHeader('Content-Type', 'application/json');
    res.setHeader('Access-Control-Allow-Methods', CORS_ALLOW_METHODS);
    res.setHeader('Access-Control-Allow-Headers', CORS_ALLOW_HEADERS);
    res.end(reply);
  }

  /**
   * Error handler middleware
   */
  private errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
    const failure = toReadError(err);
    this.log.warn(`${req.method} ${req.path} rejected: ${failure.message}`);

    if (res.headersSent) {
      res.end();
      return;
    }

    res.statusCode = failure.status;
    res.setHeader('Content-Type', 'text/plain');
    res.end(failure.message);
  }

  /**
   * Logging middleware
   */
  private loggingMiddleware(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      this.log.debug(`${req.method} ${req.path} ${res.statusCode} - ${duration}ms`);
    });

    next();
  }
}

/**
 * Normalize body-reader failures (aborted, too large, bad encoding)
 */
function toReadError(err: unknown): TransportReadError {
  if (err instanceof TransportReadError) {
    return err;
  }

  const status = readStatus(err);
  return new TransportReadError('Failed to read request body', status, {
    reason: err instanceof Error ? err.message : String(err)
  });
}

function readStatus(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : 400;
  }
  return 400;
}
