/**
 * Actor definitions and handles
 *
 * An actor is any object holding service state. Its definition lists the
 * methods exposed for dispatch; nothing else on the object is reachable.
 *
 * ```typescript
 * class Counter {
 *   count = 0;
 * }
 *
 * const CounterActor = defineActor<Counter>('Counter')
 *   .expose('increment', { params: { by: z.number().int() }, mutates: true }, (counter, { by }) => {
 *     counter.count += by;
 *     return counter.count;
 *   })
 *   .build();
 *
 * const counter = spawnActor(CounterActor, () => new Counter());
 * await counter.dispatch('increment', '{"by":2}'); // '2'
 *
 * await startServer(counter, { port: 9000, transport: 'http' });
 * await counter.dispatch('increment', '{"by":2}'); // rejects with ActorConsumedError
 * ```
 *
 * The handle is the only path to the instance: the factory's result is
 * never handed back to the caller, and starting a server moves the
 * dispatcher out of the handle.
 */

import type { z } from 'zod';
import { ActorLock } from './ActorLock.js';
import { Dispatcher } from '../Dispatcher.js';
import type { DispatcherConfig } from '../Dispatcher.js';
import { ActorConsumedError } from '../errors.js';
import { MethodRegistry, createMethodDescriptor } from '../registry/MethodRegistry.js';
import type { MethodDescriptor, MethodInvoker, MethodSpec } from '../registry/MethodRegistry.js';
import type { ActorMetadata } from '../types/metadata.js';

/**
 * Actor type: a name plus its immutable method registry
 */
export interface ActorDefinition<TActor> {
  readonly name: string;
  readonly description?: string;
  readonly registry: MethodRegistry<TActor>;
}

/**
 * Builder collecting the exposed methods of one actor type
 */
export class ActorDefinitionBuilder<TActor> {
  private readonly descriptors: MethodDescriptor<TActor>[] = [];
  private built = false;

  constructor(
    private readonly name: string,
    private readonly description?: string
  ) {}

  /**
   * Expose a method for dispatch
   *
   * @param name - Wire name of the method
   * @param spec - Parameter shape, result encoder and flags
   * @param invoke - Runs the method against the actor with decoded params
   */
  expose<TShape extends z.ZodRawShape, TResult>(
    name: string,
    spec: MethodSpec<TShape, TResult>,
    invoke: MethodInvoker<TActor, TShape, TResult>
  ): this {
    this.descriptors.push(createMethodDescriptor(name, spec, invoke));
    return this;
  }

  /**
   * Build the definition and its registry
   *
   * @throws DuplicateMethodError | InvalidMethodNameError
   */
  build(): ActorDefinition<TActor> {
    if (this.built) {
      throw new Error(`Actor definition ${this.name} was already built`);
    }
    this.built = true;

    return Object.freeze({
      name: this.name,
      description: this.description,
      registry: new MethodRegistry(this.name, this.descriptors)
    });
  }
}

/**
 * Start defining an actor type
 */
export function defineActor<TActor>(name: string, description?: string): ActorDefinitionBuilder<TActor> {
  return new ActorDefinitionBuilder<TActor>(name, description);
}

/**
 * Describe an actor type for documentation and discovery
 */
export function describeActor<TActor>(definition: ActorDefinition<TActor>): ActorMetadata {
  return {
    name: definition.name,
    description: definition.description,
    methods: definition.registry.list()
  };
}

/**
 * Sole caller-facing reference to a running actor instance
 */
export class ActorHandle<TActor> {
  private dispatcher: Dispatcher<TActor> | undefined;

  constructor(
    readonly definition: ActorDefinition<TActor>,
    dispatcher: Dispatcher<TActor>
  ) {
    this.dispatcher = dispatcher;
  }

  get name(): string {
    return this.definition.name;
  }

  /**
   * True once the actor has been handed to a server
   */
  get consumed(): boolean {
    return this.dispatcher === undefined;
  }

  /**
   * Call the actor directly, exactly as a transport would
   *
   * @throws ActorConsumedError after the handle was handed to a server
   */
  async dispatch(methodName: string, rawJson: string): Promise<string> {
    if (!this.dispatcher) {
      throw new ActorConsumedError(this.name);
    }
    return this.dispatcher.dispatch(methodName, rawJson);
  }

  describe(): ActorMetadata {
    return describeActor(this.definition);
  }

  /**
   * Move the dispatcher out of this handle
   *
   * Used by the server lifecycle; the handle keeps no reference afterwards.
   *
   * @throws ActorConsumedError if already transferred
   */
  transfer(): Dispatcher<TActor> {
    const dispatcher = this.dispatcher;
    if (!dispatcher) {
      throw new ActorConsumedError(this.name);
    }
    this.dispatcher = undefined;
    return dispatcher;
  }
}

/**
 * Create an actor instance behind a handle
 *
 * @param definition - Actor type
 * @param create - Factory for the instance; its result stays inside the handle
 */
export function spawnActor<TActor>(
  definition: ActorDefinition<TActor>,
  create: () => TActor,
  config?: DispatcherConfig
): ActorHandle<TActor> {
  const instance = create();
  const dispatcher = new Dispatcher(instance, definition.registry, new ActorLock(), config);
  return new ActorHandle(definition, dispatcher);
}
