/**
 * Dispatcher - the single behavioral contract shared by every transport
 *
 * Given a method name and the raw JSON text of its params, the dispatcher
 * parses, resolves, decodes, invokes and encodes. It never rejects: every
 * handled failure comes back as a JSON-encoded message string, so HTTP and
 * WebSocket callers observe identical replies for identical calls.
 */

import type { ActorLock } from './actor/ActorLock.js';
import {
  ActorWireError,
  InvocationError,
  MalformedEnvelopeError,
  ParamDeserializationError,
  ResultSerializationError,
  UnknownMethodError,
  errorMessage
} from './errors.js';
import { createLogger } from './logger.js';
import type { MethodRegistry } from './registry/MethodRegistry.js';

/**
 * Anything that turns a (method, raw params) pair into a JSON reply
 */
export interface DispatchTarget {
  dispatch(methodName: string, rawJson: string): Promise<string>;
}

/**
 * Dispatcher configuration
 */
export interface DispatcherConfig {
  /**
   * Log calls slower than this many milliseconds (default: 1000)
   */
  slowCallThreshold?: number;
}

const log = createLogger('Dispatcher');

/**
 * Encode an application-level error as the JSON-string reply
 */
export function errorReply(error: ActorWireError): string {
  return JSON.stringify(error.message);
}

/**
 * Dispatcher bound to one actor instance
 */
export class Dispatcher<TActor> implements DispatchTarget {
  private readonly slowCallThreshold: number;

  constructor(
    private readonly actor: TActor,
    private readonly registry: MethodRegistry<TActor>,
    private readonly lock: ActorLock,
    config: DispatcherConfig = {}
  ) {
    this.slowCallThreshold = config.slowCallThreshold ?? 1000;
  }

  get actorName(): string {
    return this.registry.actorName;
  }

  /**
   * Dispatch one call
   *
   * @param methodName - Registered method name
   * @param rawJson - JSON text of the params object
   * @returns JSON text: the encoded result, or an encoded error message
   */
  async dispatch(methodName: string, rawJson: string): Promise<string> {
    let params: unknown;
    try {
      params = JSON.parse(rawJson);
    } catch (error) {
      return errorReply(new MalformedEnvelopeError(errorMessage(error)));
    }

    const method = this.registry.get(methodName);
    if (!method) {
      log.debug(`Unknown method ${methodName} on ${this.actorName}`);
      return errorReply(new UnknownMethodError(methodName));
    }

    const call = method.prepare(params);
    if (!call.ok) {
      return errorReply(new ParamDeserializationError(methodName, call.reason));
    }

    const startTime = performance.now();
    let result: unknown;
    try {
      const run = () => call.invoke(this.actor);
      result = method.mutates ? await this.lock.exclusive(run) : await this.lock.shared(run);
    } catch (error) {
      const failure = new InvocationError(methodName, error);
      log.error(`${this.actorName}.${methodName} threw: ${errorMessage(error)}`);
      return errorReply(failure);
    }

    const duration = performance.now() - startTime;
    if (duration > this.slowCallThreshold) {
      log.warn(`Slow call: ${this.actorName}.${methodName} took ${duration.toFixed(2)}ms`);
    }

    const encoded = method.encode(result);
    if (!encoded.ok) {
      log.error(`Could not encode result of ${this.actorName}.${methodName}: ${encoded.reason}`);
      return errorReply(new ResultSerializationError(methodName, encoded.reason));
    }

    return encoded.json;
  }
}
