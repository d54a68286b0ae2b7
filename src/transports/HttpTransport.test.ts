import http from 'http';
import { z } from 'zod';
import { defineActor, spawnActor } from '../actor/Actor.js';
import type { DispatchTarget } from '../Dispatcher.js';
import { Greeter, GreeterActor } from '../examples/Greeter.js';
import { HttpTransport, methodNameFromPath } from './HttpTransport.js';
import type { HttpTransportConfig } from './HttpTransport.js';

interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

function greeterTarget(): DispatchTarget {
  return spawnActor(GreeterActor, () => new Greeter('test-server')).transfer();
}

async function serve(config: HttpTransportConfig = {}, target: DispatchTarget = greeterTarget()): Promise<TestServer> {
  const transport = new HttpTransport(target, config);
  const server = http.createServer();
  transport.attach(server);

  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }
  const port = address.port;

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    async close() {
      await transport.close();
      server.closeAllConnections();
      await new Promise<void>(resolve => server.close(() => resolve()));
    }
  };
}

describe('methodNameFromPath', () => {
  it('should strip leading slashes only', () => {
    expect(methodNameFromPath('/add')).toBe('add');
    expect(methodNameFromPath('//add')).toBe('add');
    expect(methodNameFromPath('/a/b')).toBe('a/b');
    expect(methodNameFromPath('/')).toBe('');
  });
});

describe('HttpTransport', () => {
  let server: TestServer;

  beforeEach(async () => {
    server = await serve();
  });

  afterEach(async () => {
    await server.close();
  });

  it('should dispatch POST /<method> and reply 200 with JSON', async () => {
    const response = await fetch(`${server.baseUrl}/add`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ a: 5, b: 3 })
    });

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('application/json');
    expect(response.headers.get('access-control-allow-origin')).toBe('*');
    expect(response.headers.get('access-control-allow-methods')).toBe('POST, OPTIONS');
    expect(response.headers.get('access-control-allow-headers')).toBe('Content-Type');
    expect(await response.text()).toBe('8');
  });

  it('should read the body regardless of content type', async () => {
    const response = await fetch(`${server.baseUrl}/greet`, {
      method: 'POST',
      headers: { 'Content-Type': 'text/plain' },
      body: '{"name": "World"}'
    });

    expect(await response.text()).toBe('"Hello, World! I\'m test-server"');
  });

  it('should ignore the query string', async () => {
    const response = await fetch(`${server.baseUrl}/ping?verbose=1`, { method: 'POST', body: '{}' });

    expect(await response.text()).toBe('"pong"');
  });

  it('should reply 200 with the error message for an unknown method', async () => {
    const response = await fetch(`${server.baseUrl}/nonexistent`, { method: 'POST', body: '{}' });

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('"Unknown method: nonexistent"');
  });

  it('should treat nested paths as one method name', async () => {
    const response = await fetch(`${server.baseUrl}/add/extra`, { method: 'POST', body: '{}' });

    expect(await response.text()).toBe('"Unknown method: add/extra"');
  });

  it('should reply 200 with a parse error for malformed JSON', async () => {
    const response = await fetch(`${server.baseUrl}/add`, { method: 'POST', body: '{"a": 5' });

    expect(response.status).toBe(200);
    const message: unknown = await response.json();
    expect(message).toMatch(/^Failed to parse JSON: /);
  });

  it('should answer CORS preflight on any path', async () => {
    const response = await fetch(`${server.baseUrl}/anything`, { method: 'OPTIONS' });

    expect(response.status).toBe(200);
    expect(response.headers.get('access-control-allow-origin')).toBe('*');
    expect(response.headers.get('access-control-allow-methods')).toBe('POST, OPTIONS');
    expect(response.headers.get('access-control-allow-headers')).toBe('Content-Type');
    expect(await response.text()).toBe('');
  });

  it.each(['GET', 'PUT', 'DELETE', 'PATCH'])('should reply 405 to %s', async method => {
    const response = await fetch(`${server.baseUrl}/add`, { method });

    expect(response.status).toBe(405);
    expect(response.headers.get('content-type')).toBe('text/plain');
    expect(await response.text()).toBe('Method Not Allowed');
  });

  it('should reply 400 to a body that is not UTF-8', async () => {
    const response = await fetch(`${server.baseUrl}/add`, {
      method: 'POST',
      body: new Uint8Array([0x7b, 0xff, 0xfe, 0x7d])
    });

    expect(response.status).toBe(400);
    expect(response.headers.get('content-type')).toBe('text/plain');
    expect(await response.text()).toBe('Invalid UTF-8 in request body');
  });

  it('should serve several requests in a row', async () => {
    const replies: string[] = [];
    for (const a of [1, 2, 3]) {
      const response = await fetch(`${server.baseUrl}/add`, { method: 'POST', body: JSON.stringify({ a, b: 10 }) });
      replies.push(await response.text());
    }

    expect(replies).toEqual(['11', '12', '13']);
  });

  it('should serve concurrent requests', async () => {
    const replies = await Promise.all(
      ['Ada', 'Grace', 'Linus'].map(async name => {
        const response = await fetch(`${server.baseUrl}/echo`, {
          method: 'POST',
          body: JSON.stringify({ message: name })
        });
        return response.text();
      })
    );

    expect(replies).toEqual(['"Ada"', '"Grace"', '"Linus"']);
  });
});

describe('HttpTransport body limit', () => {
  it('should reject bodies over the limit', async () => {
    const server = await serve({ bodyLimit: '8b' });
    try {
      const response = await fetch(`${server.baseUrl}/echo`, {
        method: 'POST',
        body: JSON.stringify({ message: 'longer than eight bytes' })
      });

      expect(response.status).toBe(413);
      expect(await response.text()).toBe('Failed to read request body');
    } finally {
      await server.close();
    }
  });
});

describe('HttpTransport decoder failures', () => {
  class Strict {}

  const StrictActor = defineActor<Strict>('Strict')
    .expose(
      'parse',
      {
        params: {
          n: z.string().transform(value => {
            if (!/^\d+$/.test(value)) {
              throw new Error(`not a number: ${value}`);
            }
            return Number(value);
          })
        }
      },
      (_strict, { n }) => n
    )
    .build();

  it('should reply 200 with a deserialization error when a param transform throws', async () => {
    const server = await serve({}, spawnActor(StrictActor, () => new Strict()).transfer());
    try {
      const response = await fetch(`${server.baseUrl}/parse`, { method: 'POST', body: '{"n": "abc"}' });

      expect(response.status).toBe(200);
      expect(await response.text()).toBe('"Failed to deserialize parameters for parse: not a number: abc"');
    } finally {
      await server.close();
    }
  });
});
