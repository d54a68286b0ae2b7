/**
 * actorwire
 *
 * Serve an in-process actor over HTTP or WebSocket, optionally behind TLS,
 * with one JSON dispatch contract for both transports.
 */

export { defineActor, describeActor, spawnActor, ActorDefinitionBuilder, ActorHandle } from './actor/Actor.js';
export type { ActorDefinition } from './actor/Actor.js';
export { ActorLock } from './actor/ActorLock.js';
export { Dispatcher, errorReply } from './Dispatcher.js';
export type { DispatchTarget, DispatcherConfig } from './Dispatcher.js';

export * from './registry/index.js';
export * from './transports/index.js';
export * from './client/index.js';
export * from './errors.js';

export { ok, err, resultSchema } from './types/responses.js';
export type { Ok, Err, Result } from './types/responses.js';
export { describeType, exampleValue, exampleParams } from './types/metadata.js';

export { loadTlsIdentity, serverOptions } from './tls/TlsIdentity.js';
export type { TlsIdentity } from './tls/TlsIdentity.js';

export { startServer, serveFromConfig, DEFAULT_HOST } from './server/ActorServer.js';
export type { RunningServer, ServerOptions } from './server/ActorServer.js';

export { loadConfig, parseConfig, defaultConfig, configPaths, serverConfigSchema } from './config.js';
export type { LoadConfigOptions, ServerConfig } from './config.js';

export { createLogger, setLogLevel, getLogLevel, isLogLevel, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

export { generateActorDocumentation, DEFAULT_DOCS_BASE_URL } from './docs/ActorDocumentation.js';
export type { DocumentationOptions } from './docs/ActorDocumentation.js';

export { Calculator, CalculatorActor } from './examples/Calculator.js';
export { Greeter, GreeterActor } from './examples/Greeter.js';
