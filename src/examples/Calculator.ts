/**
 * Calculator example actor
 *
 * Arithmetic plus a memory register. `divide` reports division by zero in
 * its Result rather than failing the call.
 */

import { z } from 'zod';
import { defineActor } from '../actor/Actor.js';
import { err, ok, resultSchema } from '../types/responses.js';
import type { Result } from '../types/responses.js';

export class Calculator {
  private memory: number;

  constructor(memory = 0) {
    this.memory = memory;
  }

  add(a: number, b: number): number {
    return a + b;
  }

  subtract(a: number, b: number): number {
    return a - b;
  }

  multiply(a: number, b: number): number {
    return a * b;
  }

  divide(a: number, b: number): Result<number> {
    return b === 0 ? err('Division by zero') : ok(a / b);
  }

  getMemory(): number {
    return this.memory;
  }

  /**
   * Add to memory across a suspension point; needs exclusive access
   */
  async accumulate(amount: number): Promise<number> {
    const current = this.memory;
    await new Promise<void>(resolve => setImmediate(resolve));
    this.memory = current + amount;
    return this.memory;
  }

  clearMemory(): string {
    this.memory = 0;
    return 'Memory cleared';
  }

  info(): string {
    return 'Simple JSON Calculator v1.0';
  }
}

export const CalculatorActor = defineActor<Calculator>('Calculator', 'A calculator with a memory register')
  .expose(
    'add',
    {
      params: { a: z.number().finite(), b: z.number().finite() },
      returns: z.number().finite(),
      description: 'Add two numbers'
    },
    (calc, { a, b }) => calc.add(a, b)
  )
  .expose(
    'subtract',
    {
      params: { a: z.number().finite(), b: z.number().finite() },
      returns: z.number().finite(),
      description: 'Subtract b from a'
    },
    (calc, { a, b }) => calc.subtract(a, b)
  )
  .expose(
    'multiply',
    {
      params: { a: z.number().finite(), b: z.number().finite() },
      returns: z.number().finite(),
      description: 'Multiply two numbers'
    },
    (calc, { a, b }) => calc.multiply(a, b)
  )
  .expose(
    'divide',
    {
      params: { a: z.number().finite(), b: z.number().finite() },
      returns: resultSchema(z.number().finite(), z.string()),
      description: 'Divide a by b'
    },
    (calc, { a, b }) => calc.divide(a, b)
  )
  .expose(
    'getMemory',
    { params: {}, returns: z.number().finite(), description: 'Get the current memory value' },
    calc => calc.getMemory()
  )
  .expose(
    'accumulate',
    {
      params: { amount: z.number().finite() },
      returns: z.number().finite(),
      mutates: true,
      description: 'Add an amount to memory and return the new value'
    },
    (calc, { amount }) => calc.accumulate(amount)
  )
  .expose(
    'clearMemory',
    { params: {}, returns: z.string(), mutates: true, description: 'Clear memory (set to 0)' },
    calc => calc.clearMemory()
  )
  .expose(
    'info',
    { params: {}, returns: z.string(), description: 'Get calculator info' },
    calc => calc.info()
  )
  .build();
