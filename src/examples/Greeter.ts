/**
 * Greeter example actor
 *
 * A named server with greeting, echo and ping methods. `secret` and
 * `shout` exist on the class but are not exposed, so dispatch cannot
 * reach them.
 */

import { z } from 'zod';
import { defineActor } from '../actor/Actor.js';
import { err, ok, resultSchema } from '../types/responses.js';
import type { Result } from '../types/responses.js';

export class Greeter {
  constructor(readonly name: string) {}

  greet(name: string): string {
    return `Hello, ${name}! I'm ${this.name}`;
  }

  info(): string {
    return `Test server: ${this.name}`;
  }

  async ping(): Promise<string> {
    return 'pong';
  }

  divide(a: number, b: number): Result<number> {
    return b === 0 ? err('Division by zero') : ok(a / b);
  }

  shout(text: string): string {
    return text.toUpperCase();
  }

  private secret(): string {
    return `${this.name} keeps a secret`;
  }
}

export const GreeterActor = defineActor<Greeter>('Greeter', 'Greets callers and echoes messages')
  .expose(
    'add',
    {
      params: { a: z.number().int(), b: z.number().int() },
      returns: z.number().int(),
      description: 'Add two integers'
    },
    (_greeter, { a, b }) => a + b
  )
  .expose(
    'greet',
    {
      params: { name: z.string().describe('Who to greet') },
      returns: z.string(),
      description: 'Greet someone'
    },
    (greeter, { name }) => greeter.greet(name)
  )
  .expose(
    'info',
    { params: {}, returns: z.string(), description: 'Get server info' },
    greeter => greeter.info()
  )
  .expose(
    'echo',
    { params: { message: z.string() }, returns: z.string(), description: 'Echo back the input' },
    (_greeter, { message }) => message
  )
  .expose(
    'ping',
    { params: {}, returns: z.string(), description: 'Method with no parameters' },
    greeter => greeter.ping()
  )
  .expose(
    'divide',
    {
      params: { a: z.number().finite(), b: z.number().finite() },
      returns: resultSchema(z.number().finite(), z.string()),
      description: 'Method that returns a Result'
    },
    (greeter, { a, b }) => greeter.divide(a, b)
  )
  .build();
