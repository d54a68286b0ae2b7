/**
 * Result-shaped return values for actor methods
 *
 * Dispatch never signals application failure out of band: a method that
 * can fail returns one of these and the caller inspects the shape.
 *
 * Wire format:
 * - success: {"Ok": <value>}
 * - failure: {"Err": <error>}
 */

import { z } from 'zod';

/**
 * Successful method outcome
 */
export interface Ok<T> {
  Ok: T;
}

/**
 * Failed method outcome
 */
export interface Err<E> {
  Err: E;
}

/**
 * Union type for method outcomes
 */
export type Result<T, E = string> = Ok<T> | Err<E>;

/**
 * Create a success outcome
 */
export function ok<T>(value: T): Ok<T> {
  return { Ok: value };
}

/**
 * Create a failure outcome
 */
export function err<E>(error: E): Err<E> {
  return { Err: error };
}

/**
 * Zod encoder for a Result, for use as a method's `returns`
 */
export function resultSchema<T extends z.ZodTypeAny, E extends z.ZodTypeAny>(okSchema: T, errSchema: E) {
  return z.union([z.object({ Ok: okSchema }).strict(), z.object({ Err: errSchema }).strict()]);
}
