/**
 * Method Registry
 *
 * Maps exposed method names to their parameter decoder, invocation and
 * result encoder. Built once per actor type and never mutated afterwards;
 * every transport resolves methods through the same table.
 *
 * Key principles:
 * - Only methods passed to `expose` exist for dispatch
 * - Duplicate or malformed names reject the build
 * - Parameters arrive as one JSON object keyed by parameter name
 */

import { z } from 'zod';
import { DuplicateMethodError, InvalidMethodNameError, errorMessage } from '../errors.js';
import { describeParams, describeType, exampleParams } from '../types/metadata.js';
import type { MethodMetadata } from '../types/metadata.js';

const METHOD_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Declaration of an exposed method
 */
export interface MethodSpec<TShape extends z.ZodRawShape, TResult> {
  /**
   * Parameter shape (`{}` for a method without parameters)
   */
  params: TShape;

  /**
   * Result encoder; the encoded value is what goes on the wire
   */
  returns?: z.ZodType<TResult>;

  description?: string;

  /**
   * Run with exclusive access to the actor's state (default: false)
   */
  mutates?: boolean;
}

export type MethodParams<TShape extends z.ZodRawShape> = z.infer<z.ZodObject<TShape>>;

export type MethodInvoker<TActor, TShape extends z.ZodRawShape, TResult> = (
  actor: TActor,
  params: MethodParams<TShape>
) => TResult | Promise<TResult>;

/**
 * Outcome of decoding a params object
 */
export type PreparedCall<TActor> =
  | { ok: true; invoke: (actor: TActor) => Promise<unknown> }
  | { ok: false; reason: string };

/**
 * Outcome of encoding a result
 */
export type EncodedResult = { ok: true; json: string } | { ok: false; reason: string };

/**
 * Registry entry for one exposed method
 */
export interface MethodDescriptor<TActor> {
  readonly name: string;
  readonly mutates: boolean;
  readonly metadata: MethodMetadata;

  /**
   * Decode raw params; on success the returned call is bound to them
   */
  prepare(params: unknown): PreparedCall<TActor>;

  /**
   * Encode a result to JSON text
   */
  encode(result: unknown): EncodedResult;
}

/**
 * Render zod issues as `path: message; path: message`
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

type Decoded<T> = { ok: true; data: T } | { ok: false; reason: string };

/**
 * Run a zod schema over a value
 *
 * Exceptions thrown by transforms and refinements, and async refinements
 * hit during a sync parse, come back as a failed decode.
 */
function decode<T extends z.ZodTypeAny>(schema: T, value: unknown): Decoded<z.output<T>> {
  try {
    const parsed = schema.safeParse(value);
    return parsed.success ? { ok: true, data: parsed.data } : { ok: false, reason: formatIssues(parsed.error) };
  } catch (error) {
    return { ok: false, reason: errorMessage(error) };
  }
}

/**
 * Create a registry entry from a method declaration
 */
export function createMethodDescriptor<TActor, TShape extends z.ZodRawShape, TResult>(
  name: string,
  spec: MethodSpec<TShape, TResult>,
  invoke: MethodInvoker<TActor, TShape, TResult>
): MethodDescriptor<TActor> {
  const paramsSchema = z.object(spec.params);
  const returns = spec.returns;

  return {
    name,
    mutates: spec.mutates ?? false,
    metadata: {
      name,
      description: spec.description,
      params: describeParams(spec.params),
      returns: returns ? describeType(returns) : 'unknown',
      mutates: spec.mutates ?? false,
      exampleParams: exampleParams(spec.params)
    },

    prepare(params: unknown): PreparedCall<TActor> {
      const parsed = decode(paramsSchema, params);
      if (!parsed.ok) {
        return parsed;
      }
      const decoded = parsed.data;
      return {
        ok: true,
        invoke: async (actor: TActor) => invoke(actor, decoded)
      };
    },

    encode(result: unknown): EncodedResult {
      let value = result;
      if (returns) {
        const checked = decode(returns, result);
        if (!checked.ok) {
          return checked;
        }
        value = checked.data;
      }

      // A method without a result encodes as null
      if (value === undefined) {
        return { ok: true, json: 'null' };
      }

      try {
        const json = JSON.stringify(value);
        if (json === undefined) {
          return { ok: false, reason: `value of type ${typeof value} is not JSON-serializable` };
        }
        return { ok: true, json };
      } catch (error) {
        return { ok: false, reason: errorMessage(error) };
      }
    }
  };
}

/**
 * Immutable name → method table for one actor type
 */
export class MethodRegistry<TActor> {
  private readonly methods: ReadonlyMap<string, MethodDescriptor<TActor>>;

  /**
   * @throws InvalidMethodNameError if a name is not an identifier
   * @throws DuplicateMethodError if two methods share a name
   */
  constructor(
    readonly actorName: string,
    descriptors: ReadonlyArray<MethodDescriptor<TActor>>
  ) {
    const methods = new Map<string, MethodDescriptor<TActor>>();

    for (const descriptor of descriptors) {
      if (!METHOD_NAME_PATTERN.test(descriptor.name)) {
        throw new InvalidMethodNameError(actorName, descriptor.name);
      }
      if (methods.has(descriptor.name)) {
        throw new DuplicateMethodError(actorName, descriptor.name);
      }
      methods.set(descriptor.name, descriptor);
    }

    this.methods = methods;
  }

  /**
   * Check whether a name can be registered at all
   */
  static isValidMethodName(name: string): boolean {
    return METHOD_NAME_PATTERN.test(name);
  }

  get(name: string): MethodDescriptor<TActor> | undefined {
    return this.methods.get(name);
  }

  has(name: string): boolean {
    return this.methods.has(name);
  }

  /**
   * Registered names in registration order
   */
  names(): string[] {
    return Array.from(this.methods.keys());
  }

  /**
   * Metadata of all registered methods in registration order
   */
  list(): MethodMetadata[] {
    return Array.from(this.methods.values()).map(descriptor => descriptor.metadata);
  }

  get size(): number {
    return this.methods.size;
  }
}
