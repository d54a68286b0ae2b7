import { once } from 'events';
import fs from 'fs';
import https from 'https';
import net from 'net';
import path from 'path';
import WebSocket from 'ws';
import type { RawData } from 'ws';
import { spawnActor } from '../actor/Actor.js';
import { defaultConfig } from '../config.js';
import type { ServerConfig } from '../config.js';
import { ActorConsumedError, ListenerBindError } from '../errors.js';
import { Calculator, CalculatorActor } from '../examples/Calculator.js';
import { Greeter, GreeterActor } from '../examples/Greeter.js';
import { setLogLevel } from '../logger.js';
import { loadTlsIdentity } from '../tls/TlsIdentity.js';
import type { TlsIdentity } from '../tls/TlsIdentity.js';
import { serveFromConfig, startServer } from './ActorServer.js';
import type { RunningServer } from './ActorServer.js';

const fixtures = path.join(__dirname, '..', '..', 'test', 'fixtures');
const certPath = path.join(fixtures, 'cert.pem');
const keyPath = path.join(fixtures, 'key.pem');
const ca = fs.readFileSync(certPath, 'utf-8');

function spawnGreeter() {
  return spawnActor(GreeterActor, () => new Greeter('test-server'));
}

function httpsPost(url: string, body: string): Promise<{ status: number; body: string }> {
  return new Promise((resolve, reject) => {
    const request = https.request(url, { method: 'POST', ca, agent: false }, response => {
      let text = '';
      response.setEncoding('utf8');
      response.on('data', (chunk: string) => {
        text += chunk;
      });
      response.on('end', () => resolve({ status: response.statusCode ?? 0, body: text }));
    });
    request.on('error', reject);
    request.end(body);
  });
}

async function roundTrip(socket: WebSocket, frame: string): Promise<string> {
  const reply = once(socket, 'message');
  socket.send(frame);
  const [data]: RawData[] = await reply;
  return data.toString();
}

describe('startServer', () => {
  const servers: RunningServer[] = [];

  afterEach(async () => {
    await Promise.all(servers.splice(0).map(server => server.close()));
  });

  describe('plain listeners', () => {
    it('should serve HTTP on an ephemeral port', async () => {
      const server = await startServer(spawnGreeter(), { port: 0, transport: 'http' });
      servers.push(server);

      expect(server.transport).toBe('http');
      expect(server.secure).toBe(false);
      expect(server.host).toBe('127.0.0.1');
      expect(server.port).toBeGreaterThan(0);
      expect(server.url).toBe(`http://127.0.0.1:${server.port}`);

      const response = await fetch(`${server.url}/add`, { method: 'POST', body: '{"a": 5, "b": 3}' });
      expect(await response.text()).toBe('8');
    });

    it('should serve WebSocket sessions', async () => {
      const server = await startServer(spawnGreeter(), { port: 0, transport: 'websocket' });
      servers.push(server);
      expect(server.url).toBe(`ws://127.0.0.1:${server.port}`);

      const socket = new WebSocket(server.url);
      await once(socket, 'open');
      try {
        await expect(roundTrip(socket, '{"method": "add", "params": {"a": 5, "b": 3}}')).resolves.toBe('8');
      } finally {
        socket.terminate();
      }
    });

    it('should pass the envelope policy to the WebSocket transport', async () => {
      const server = await startServer(spawnGreeter(), {
        port: 0,
        transport: 'websocket',
        websocket: { envelope: 'lenient' }
      });
      servers.push(server);

      const socket = new WebSocket(server.url);
      await once(socket, 'open');
      try {
        await expect(roundTrip(socket, 'not json')).resolves.toBe('"Invalid JSON"');
      } finally {
        socket.terminate();
      }
    });

    it('should serve identical replies over both transports', async () => {
      const httpServer = await startServer(spawnGreeter(), { port: 0, transport: 'http' });
      const wsServer = await startServer(spawnGreeter(), { port: 0, transport: 'websocket' });
      servers.push(httpServer, wsServer);

      const socket = new WebSocket(wsServer.url);
      await once(socket, 'open');
      try {
        for (const [method, params] of [
          ['add', '{"a": 5}'],
          ['divide', '{"a": 1, "b": 0}'],
          ['nonexistent', '{}']
        ]) {
          const response = await fetch(`${httpServer.url}/${method}`, { method: 'POST', body: params });
          const viaHttp = await response.text();
          const viaWebSocket = await roundTrip(socket, `{"method": "${method}", "params": ${params}}`);

          expect(viaWebSocket).toBe(viaHttp);
        }
      } finally {
        socket.terminate();
      }
    });
  });

  describe('ownership', () => {
    it('should consume the handle', async () => {
      const handle = spawnGreeter();
      servers.push(await startServer(handle, { port: 0, transport: 'http' }));

      expect(handle.consumed).toBe(true);
      await expect(handle.dispatch('ping', '{}')).rejects.toThrow(ActorConsumedError);
      await expect(startServer(handle, { port: 0, transport: 'http' })).rejects.toThrow(ActorConsumedError);
    });

    it('should share actor state across connections of one server', async () => {
      const server = await startServer(spawnActor(CalculatorActor, () => new Calculator()), {
        port: 0,
        transport: 'http'
      });
      servers.push(server);

      await Promise.all(
        Array.from({ length: 5 }, async () => {
          const response = await fetch(`${server.url}/accumulate`, { method: 'POST', body: '{"amount": 2}' });
          return response.text();
        })
      );

      const response = await fetch(`${server.url}/getMemory`, { method: 'POST', body: '{}' });
      expect(await response.text()).toBe('10');
    });
  });

  describe('bind failures', () => {
    it('should reject with ListenerBindError when the port is taken', async () => {
      const first = await startServer(spawnGreeter(), { port: 0, transport: 'http' });
      servers.push(first);

      const handle = spawnGreeter();
      const failure = await startServer(handle, { port: first.port, transport: 'http' }).catch(
        (error: unknown) => error
      );

      expect(failure).toBeInstanceOf(ListenerBindError);
      expect(failure).toMatchObject({
        code: 'LISTENER_BIND',
        details: { host: '127.0.0.1', port: first.port, reason: 'EADDRINUSE' }
      });
      expect(handle.consumed).toBe(true);
    });
  });

  describe('close', () => {
    it('should stop accepting connections', async () => {
      const server = await startServer(spawnGreeter(), { port: 0, transport: 'http' });
      const before = await fetch(`${server.url}/ping`, { method: 'POST', body: '{}' });
      expect(await before.text()).toBe('"pong"');

      await server.close();

      await expect(fetch(`${server.url}/ping`, { method: 'POST', body: '{}' })).rejects.toThrow();
    });

    it('should be safe to call twice', async () => {
      const server = await startServer(spawnGreeter(), { port: 0, transport: 'websocket' });
      const socket = new WebSocket(server.url);
      await once(socket, 'open');
      const closed = once(socket, 'close');

      await Promise.all([server.close(), server.close()]);

      await closed;
      expect(socket.readyState).toBe(WebSocket.CLOSED);
    });
  });

  describe('TLS', () => {
    let identity: TlsIdentity;

    beforeAll(async () => {
      identity = await loadTlsIdentity(certPath, keyPath);
    });

    afterEach(() => {
      jest.restoreAllMocks();
      setLogLevel('silent');
    });

    it('should serve HTTPS', async () => {
      const server = await startServer(spawnGreeter(), { port: 0, transport: 'http', tls: identity });
      servers.push(server);

      expect(server.secure).toBe(true);
      expect(server.url).toBe(`https://127.0.0.1:${server.port}`);
      await expect(httpsPost(`${server.url}/divide`, '{"a": 20, "b": 4}')).resolves.toEqual({
        status: 200,
        body: '{"Ok":5}'
      });
    });

    it('should serve secure WebSocket sessions', async () => {
      const server = await startServer(spawnGreeter(), { port: 0, transport: 'websocket', tls: identity });
      servers.push(server);
      expect(server.url).toBe(`wss://127.0.0.1:${server.port}`);

      const socket = new WebSocket(server.url, { ca });
      await once(socket, 'open');
      try {
        await expect(roundTrip(socket, '{"method": "ping", "params": {}}')).resolves.toBe('"pong"');
      } finally {
        socket.terminate();
      }
    });

    it('should drop a connection that fails the handshake and keep serving others', async () => {
      setLogLevel('warn');
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const server = await startServer(spawnGreeter(), { port: 0, transport: 'http', tls: identity });
      servers.push(server);

      const plain = net.connect(server.port, '127.0.0.1');
      await once(plain, 'connect');
      const closed = once(plain, 'close');
      plain.on('error', () => undefined);
      plain.write('POST /ping HTTP/1.1\r\nHost: localhost\r\n\r\n');
      await closed;

      expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^\[ActorServer\] TLS handshake error: /));
      await expect(httpsPost(`${server.url}/ping`, '{}')).resolves.toEqual({ status: 200, body: '"pong"' });
    });
  });
});

describe('serveFromConfig', () => {
  function config(overrides: Partial<ServerConfig>): ServerConfig {
    return { ...defaultConfig, server: { host: '127.0.0.1', port: 0, transport: 'http' }, ...overrides };
  }

  it('should start the configured transport', async () => {
    const server = await serveFromConfig(
      spawnGreeter(),
      config({
        server: { host: '127.0.0.1', port: 0, transport: 'websocket' },
        websocket: { envelope: 'lenient' }
      })
    );
    const socket = new WebSocket(server.url);
    try {
      await once(socket, 'open');
      await expect(roundTrip(socket, '{"method": "ping"}')).resolves.toBe('"pong"');
    } finally {
      socket.terminate();
      await server.close();
    }
  });

  it('should load TLS from the configured paths', async () => {
    const server = await serveFromConfig(spawnGreeter(), config({ tls: { certPath, keyPath } }));
    try {
      expect(server.url).toBe(`https://127.0.0.1:${server.port}`);
      await expect(httpsPost(`${server.url}/info`, '{}')).resolves.toEqual({
        status: 200,
        body: '"Test server: test-server"'
      });
    } finally {
      await server.close();
    }
  });

  it('should apply the configured body limit', async () => {
    const server = await serveFromConfig(spawnGreeter(), config({ http: { bodyLimit: '4b' } }));
    try {
      const response = await fetch(`${server.url}/echo`, { method: 'POST', body: '{"message": "hello"}' });
      expect(response.status).toBe(413);
    } finally {
      await server.close();
    }
  });
});
