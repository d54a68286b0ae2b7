/**
 * WebSocket Transport
 *
 * Exposes the dispatcher over a persistent WebSocket session. Every text
 * frame carries one call; the reply goes back as one text frame.
 *
 * Request:
 * {
 *   "method": "add",
 *   "params": { "a": 5, "b": 3 }
 * }
 *
 * Response: the dispatcher's reply text, e.g. 8
 *
 * Frames on one connection are answered strictly in arrival order. Binary
 * frames are ignored; ping/pong is answered by `ws` itself.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import type { RawData } from 'ws';
import type { DispatchTarget } from '../Dispatcher.js';
import { errorMessage } from '../errors.js';
import { Transport } from './Transport.js';
import type { Listener } from './Transport.js';

/**
 * How frames that are not a complete `{method, params}` envelope are treated
 *
 * - strict: reply `{"error": ...}` without dispatching
 * - lenient: missing params become `{}`, a missing method never resolves
 */
export const ENVELOPE_POLICIES = ['strict', 'lenient'] as const;

export type EnvelopePolicy = (typeof ENVELOPE_POLICIES)[number];

/**
 * WebSocket Transport Configuration
 */
export interface WebSocketTransportConfig {
  /** Envelope policy (default: 'strict') */
  envelope?: EnvelopePolicy;

  /** Largest accepted frame in bytes (default: 10 MiB) */
  maxPayload?: number;
}

/**
 * Method name used when a lenient envelope has none; never a registrable name
 */
export const MISSING_METHOD = '<missing>';

export const INVALID_ENVELOPE_MESSAGE =
  'Invalid message format. Expected {"method": ..., "params": {...}}';

/**
 * Parsed envelope, or the reply to send instead of dispatching
 */
type Envelope = { method: string; params: string } | { reply: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function frameText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * WebSocket Transport
 */
export class WebSocketTransport extends Transport {
  private readonly envelope: EnvelopePolicy;
  private readonly maxPayload: number;
  private wss?: WebSocketServer;
  private listener?: Listener;
  private readonly rejectPlainRequest = (_req: IncomingMessage, res: ServerResponse): void => {
    res.statusCode = 426;
    res.setHeader('Content-Type', 'text/plain');
    res.end('Upgrade Required');
  };

  constructor(dispatcher: DispatchTarget, config: WebSocketTransportConfig = {}) {
    super(dispatcher, 'websocket');
    this.envelope = config.envelope ?? 'strict';
    this.maxPayload = config.maxPayload ?? 10 * 1024 * 1024;
  }

  get policy(): EnvelopePolicy {
    return this.envelope;
  }

  /**
   * Number of open sessions
   */
  get connectionCount(): number {
    return this.wss ? this.wss.clients.size : 0;
  }

  /**
   * Compute the reply to one text frame
   */
  async handleFrame(text: string): Promise<string> {
    const envelope = this.readEnvelope(text);
    if ('reply' in envelope) {
      return envelope.reply;
    }
    return this.invoke(envelope.method, envelope.params);
  }

  protected onAttach(listener: Listener): void {
    this.listener = listener;
    this.wss = new WebSocketServer({ server: listener, maxPayload: this.maxPayload });
    this.wss.on('connection', (socket, request) => this.handleConnection(socket, request));
    this.wss.on('error', error => {
      this.log.error(`WebSocket server error: ${error.message}`);
    });
    listener.on('request', this.rejectPlainRequest);
  }

  protected async onClose(): Promise<void> {
    const wss = this.wss;
    this.wss = undefined;

    if (this.listener) {
      this.listener.off('request', this.rejectPlainRequest);
      this.listener = undefined;
    }

    if (!wss) {
      return;
    }

    for (const client of wss.clients) {
      client.terminate();
    }

    await new Promise<void>((resolve, reject) => {
      wss.close(error => (error ? reject(error) : resolve()));
    });
  }

  private handleConnection(socket: WebSocket, request: IncomingMessage): void {
    const peer = `${request.socket.remoteAddress ?? 'unknown'}:${request.socket.remotePort ?? 0}`;
    this.log.debug(`Connection opened from ${peer}`);

    // Chain frames so replies keep arrival order
    let queue: Promise<void> = Promise.resolve();

    socket.on('message', (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        return;
      }
      const text = frameText(data);
      queue = queue.then(() => this.answer(socket, text, peer));
    });

    socket.on('close', (code: number) => {
      this.log.debug(`Connection from ${peer} closed (${code})`);
    });

    socket.on('error', (error: Error) => {
      this.log.error(`WebSocket connection error from ${peer}: ${error.message}`);
    });
  }

  private async answer(socket: WebSocket, text: string, peer: string): Promise<void> {
    let reply: string;
    try {
      reply = await this.handleFrame(text);
    } catch (error) {
      this.log.error(`Failed to handle frame from ${peer}: ${errorMessage(error)}`);
      socket.close(1011, 'Internal error');
      return;
    }

    if (socket.readyState !== WebSocket.OPEN) {
      this.log.debug(`Dropping reply to ${peer}: connection no longer open`);
      return;
    }

    socket.send(reply, error => {
      if (error) {
        this.log.error(`Failed to send WebSocket response to ${peer}: ${error.message}`);
      }
    });
  }

  private readEnvelope(text: string): Envelope {
    let message: unknown;
    try {
      message = JSON.parse(text);
    } catch (error) {
      if (this.envelope === 'lenient') {
        return { reply: JSON.stringify('Invalid JSON') };
      }
      return { reply: JSON.stringify({ error: `JSON parse error: ${errorMessage(error)}` }) };
    }

    const fields = isRecord(message) ? message : {};
    const method = typeof fields.method === 'string' ? fields.method : undefined;
    const hasParams = 'params' in fields;

    if (this.envelope === 'strict') {
      if (method === undefined || !hasParams) {
        return { reply: JSON.stringify({ error: INVALID_ENVELOPE_MESSAGE }) };
      }
      return { method, params: JSON.stringify(fields.params) };
    }

    const params = hasParams ? JSON.stringify(fields.params) : '{}';
    return { method: method ?? MISSING_METHOD, params };
  }
}
