/**
 * Actor Client
 *
 * Clients for calling a served actor over HTTP or WebSocket. Both send the
 * same params object and return the parsed JSON reply, so a caller can swap
 * transports without changing call sites.
 *
 * The wire protocol carries no request ids. The WebSocket client relies on
 * the server answering frames in arrival order and matches replies FIFO.
 */

import WebSocket from 'ws';
import type { RawData } from 'ws';
import { TransportError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('WebSocketActorClient');

export interface ClientConfig {
  /** Request timeout in milliseconds (default: none) */
  timeout?: number;

  /** Extra CA certificates in PEM, for servers with self-signed certificates (WebSocket only) */
  ca?: string | string[];
}

/**
 * Common surface of both clients
 */
export interface ActorClient {
  /**
   * Call a method
   *
   * @returns Parsed JSON reply (result, or an error message string)
   */
  call(method: string, params?: Record<string, unknown>): Promise<unknown>;

  close(): Promise<void>;
}

/**
 * HTTP Client
 *
 * `POST <baseUrl>/<method>` with the params as body.
 */
export class HttpActorClient implements ActorClient {
  private readonly baseUrl: string;

  constructor(private readonly config: ClientConfig & { baseUrl: string }) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  async call(method: string, params: Record<string, unknown> = {}): Promise<unknown> {
    const url = `${this.baseUrl}/${method}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json'
        },
        body: JSON.stringify(params),
        signal: this.config.timeout ? AbortSignal.timeout(this.config.timeout) : undefined
      });
    } catch (error) {
      throw new TransportError(`Request to ${url} failed: ${errorMessage(error)}`, { url });
    }

    if (!response.ok) {
      throw new TransportError(`HTTP ${response.status}: ${await response.text()}`, {
        url,
        status: response.status
      });
    }

    const result: unknown = await response.json();
    return result;
  }

  async close(): Promise<void> {
    // No persistent connection to close
  }
}

interface PendingCall {
  method: string;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timeout?: NodeJS.Timeout;
}

/**
 * WebSocket Client
 *
 * One persistent session; calls may be pipelined.
 */
export class WebSocketActorClient implements ActorClient {
  private ws: WebSocket | null = null;
  private connecting: Promise<void> | null = null;
  private readonly pending: PendingCall[] = [];

  constructor(private readonly config: ClientConfig & { url: string }) {}

  /**
   * Connect to server
   */
  async connect(): Promise<void> {
    if (this.ws && this.ws.readyState === WebSocket.OPEN) {
      return;
    }

    this.connecting ??= this.open().finally(() => {
      this.connecting = null;
    });
    return this.connecting;
  }

  private async open(): Promise<void> {
    const ws = new WebSocket(this.config.url, { ca: this.config.ca });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        reject(new TransportError(`WebSocket connection to ${this.config.url} failed: ${error.message}`));
      };
      ws.once('error', onError);
      ws.once('open', () => {
        ws.off('error', onError);
        resolve();
      });
    });

    ws.on('message', (data: RawData, isBinary: boolean) => {
      if (!isBinary) {
        this.handleMessage(data.toString());
      }
    });
    ws.on('error', error => this.failAll(new TransportError(`WebSocket error: ${error.message}`)));
    ws.on('close', () => {
      this.ws = null;
      this.failAll(new TransportError('WebSocket connection closed'));
    });

    this.ws = ws;
  }

  async call(method: string, params: Record<string, unknown> = {}): Promise<unknown> {
    await this.connect();
    const ws = this.ws;
    if (!ws) {
      throw new TransportError('WebSocket connection closed');
    }

    return new Promise<unknown>((resolve, reject) => {
      const call: PendingCall = { method, resolve, reject };
      if (this.config.timeout) {
        call.timeout = setTimeout(() => {
          // Later replies can no longer be matched; drop the session
          this.failAll(new TransportError(`Request timeout: ${method}`));
          ws.terminate();
        }, this.config.timeout);
      }

      this.pending.push(call);
      ws.send(JSON.stringify({ method, params }), error => {
        if (error) {
          this.failAll(new TransportError(`Failed to send ${method}: ${error.message}`));
        }
      });
    });
  }

  /**
   * Number of calls awaiting a reply
   */
  get pendingCount(): number {
    return this.pending.length;
  }

  async close(): Promise<void> {
    const ws = this.ws;
    this.ws = null;
    if (!ws || ws.readyState === WebSocket.CLOSED) {
      return;
    }

    await new Promise<void>(resolve => {
      ws.once('close', () => resolve());
      ws.close();
    });
  }

  private handleMessage(data: string): void {
    const call = this.pending.shift();
    if (!call) {
      log.warn('Received reply with no call pending');
      return;
    }

    if (call.timeout) {
      clearTimeout(call.timeout);
    }

    try {
      call.resolve(JSON.parse(data));
    } catch (error) {
      call.reject(new TransportError(`Invalid reply to ${call.method}: ${errorMessage(error)}`));
    }
  }

  private failAll(error: Error): void {
    for (const call of this.pending.splice(0)) {
      if (call.timeout) {
        clearTimeout(call.timeout);
      }
      call.reject(error);
    }
  }
}
