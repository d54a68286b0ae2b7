/**
 * Transport - Base class for all transport adapters
 *
 * A transport turns the requests arriving on a listener into dispatch
 * calls and writes the replies back on the same connection. Each adapter
 * (HTTP, WebSocket) extends this class.
 *
 * Responsibilities:
 * - Attach protocol handlers to a Node HTTP/HTTPS server
 * - Extract (method name, raw params) from protocol-specific requests
 * - Route calls to the dispatcher
 * - Release live connections on close
 */

import type { Server as HttpServer } from 'http';
import type { DispatchTarget } from '../Dispatcher.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';

export type TransportKind = 'http' | 'websocket';

/**
 * Listener a transport can attach to (HTTPS servers are HTTP servers too)
 */
export type Listener = HttpServer;

/**
 * Base class for transports
 */
export abstract class Transport {
  protected readonly log: Logger;
  private attached = false;

  constructor(
    protected readonly dispatcher: DispatchTarget,
    readonly kind: TransportKind
  ) {
    this.log = createLogger(this.constructor.name);
  }

  /**
   * Hook this transport into a listener
   *
   * @throws Error if the transport is already attached
   */
  attach(listener: Listener): void {
    if (this.attached) {
      throw new Error(`${this.constructor.name} already attached`);
    }
    this.attached = true;
    this.onAttach(listener);
  }

  /**
   * Release protocol state (open sessions, subscriptions)
   */
  async close(): Promise<void> {
    if (!this.attached) {
      return;
    }
    await this.onClose();
    this.attached = false;
  }

  protected abstract onAttach(listener: Listener): void;

  protected abstract onClose(): Promise<void>;

  /**
   * Route one call to the dispatcher
   */
  protected async invoke(methodName: string, rawJson: string): Promise<string> {
    return this.dispatcher.dispatch(methodName, rawJson);
  }
}
