/**
 * Actor server lifecycle
 *
 * Binds one listener (plain or TLS) for one actor and one transport.
 * Starting a server consumes the actor handle: from then on the listener
 * is the only way to reach the actor.
 */

import http from 'http';
import https from 'https';
import type { AddressInfo, Socket } from 'net';
import type { Duplex } from 'stream';
import type { ActorHandle } from '../actor/Actor.js';
import type { ServerConfig } from '../config.js';
import { HandshakeError, ListenerBindError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { loadTlsIdentity, serverOptions } from '../tls/TlsIdentity.js';
import type { TlsIdentity } from '../tls/TlsIdentity.js';
import { HttpTransport } from '../transports/HttpTransport.js';
import type { HttpTransportConfig } from '../transports/HttpTransport.js';
import type { Listener, Transport, TransportKind } from '../transports/Transport.js';
import { WebSocketTransport } from '../transports/WebSocketTransport.js';
import type { WebSocketTransportConfig } from '../transports/WebSocketTransport.js';

const log = createLogger('ActorServer');

export const DEFAULT_HOST = '127.0.0.1';

export interface ServerOptions {
  /** Port to bind; 0 picks an ephemeral port */
  port: number;

  /** Interface to bind (default: 127.0.0.1) */
  host?: string;

  transport: TransportKind;

  /** Serve over TLS with this identity */
  tls?: TlsIdentity;

  http?: HttpTransportConfig;

  websocket?: WebSocketTransportConfig;
}

/**
 * A bound listener serving one actor
 */
export interface RunningServer {
  readonly transport: TransportKind;
  readonly secure: boolean;
  readonly port: number;
  readonly host: string;

  /** Base URL clients connect to (http, https, ws or wss) */
  readonly url: string;

  /**
   * Stop accepting, end live sessions and keep-alive sockets
   */
  close(): Promise<void>;
}

function scheme(transport: TransportKind, secure: boolean): string {
  if (transport === 'websocket') {
    return secure ? 'wss' : 'ws';
  }
  return secure ? 'https' : 'http';
}

function urlHost(host: string): string {
  return host.includes(':') ? `[${host}]` : host;
}

function createListener(tls: TlsIdentity | undefined): Listener {
  if (!tls) {
    return http.createServer();
  }

  const server = https.createServer(serverOptions(tls));
  server.on('tlsClientError', (error: Error, socket: Socket) => {
    const failure = new HandshakeError(errorMessage(error), socket.remoteAddress);
    log.warn(failure.message);
    socket.destroy();
  });
  return server;
}

function createTransport<TActor>(handle: ActorHandle<TActor>, options: ServerOptions): Transport {
  const dispatcher = handle.transfer();
  if (options.transport === 'websocket') {
    return new WebSocketTransport(dispatcher, options.websocket);
  }
  return new HttpTransport(dispatcher, options.http);
}

function listen(listener: Listener, port: number, host: string): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    const onError = (error: NodeJS.ErrnoException) => {
      listener.off('listening', onListening);
      reject(
        new ListenerBindError(`Failed to bind ${host}:${port}: ${error.message}`, 'LISTENER_BIND', {
          host,
          port,
          reason: error.code ?? error.message
        })
      );
    };
    const onListening = () => {
      listener.off('error', onError);
      const address = listener.address();
      if (address === null || typeof address === 'string') {
        reject(new ListenerBindError(`Listener on ${host}:${port} has no TCP address`));
        return;
      }
      resolve(address);
    };

    listener.once('error', onError);
    listener.once('listening', onListening);
    listener.listen(port, host);
  });
}

/**
 * Start serving an actor
 *
 * The handle is consumed before anything is bound, so a failed start
 * still leaves it unusable.
 *
 * @throws ActorConsumedError if the handle was already consumed
 * @throws ListenerBindError if the address cannot be bound
 */
export async function startServer<TActor>(
  handle: ActorHandle<TActor>,
  options: ServerOptions
): Promise<RunningServer> {
  const transport = createTransport(handle, options);
  const host = options.host ?? DEFAULT_HOST;
  const secure = options.tls !== undefined;

  const listener = createListener(options.tls);
  listener.on('clientError', (error: NodeJS.ErrnoException, socket: Duplex) => {
    if (error.code === 'ECONNRESET' || !socket.writable) {
      socket.destroy();
      return;
    }
    log.debug(`Malformed request: ${error.message}`);
    socket.end('HTTP/1.1 400 Bad Request\r\n\r\n');
  });

  transport.attach(listener);

  let address: AddressInfo;
  try {
    address = await listen(listener, options.port, host);
  } catch (error) {
    await transport.close();
    throw error;
  }

  listener.on('error', error => {
    log.error(`Listener error: ${error.message}`);
  });

  const url = `${scheme(options.transport, secure)}://${urlHost(host)}:${address.port}`;
  log.info(`${handle.name} listening on ${url}`);

  let closing: Promise<void> | undefined;

  return {
    transport: options.transport,
    secure,
    port: address.port,
    host,
    url,
    close(): Promise<void> {
      closing ??= (async () => {
        await transport.close();
        listener.closeAllConnections();
        await new Promise<void>((resolve, reject) => {
          listener.close(error => (error ? reject(error) : resolve()));
        });
        log.info(`${handle.name} stopped listening on ${url}`);
      })();
      return closing;
    }
  };
}

/**
 * Start serving an actor from a loaded configuration
 *
 * Loads the TLS identity when both certificate and key paths are set.
 */
export async function serveFromConfig<TActor>(
  handle: ActorHandle<TActor>,
  config: ServerConfig
): Promise<RunningServer> {
  const tls = config.tls ? await loadTlsIdentity(config.tls.certPath, config.tls.keyPath) : undefined;

  return startServer(handle, {
    port: config.server.port,
    host: config.server.host,
    transport: config.server.transport,
    tls,
    http: { bodyLimit: config.http.bodyLimit },
    websocket: { envelope: config.websocket.envelope }
  });
}
