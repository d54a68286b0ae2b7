#!/usr/bin/env node
/**
 * CLI wrapper for the actorwire example server
 */

import { spawnActor } from './actor/Actor.js';
import { USAGE, parseCliArgs } from './args.js';
import type { CliArgs, ExampleActorName } from './args.js';
import { loadConfig } from './config.js';
import type { ServerConfig } from './config.js';
import { generateActorDocumentation } from './docs/ActorDocumentation.js';
import { ActorWireError, errorMessage } from './errors.js';
import { Calculator, CalculatorActor } from './examples/Calculator.js';
import { Greeter, GreeterActor } from './examples/Greeter.js';
import { createLogger, setLogLevel } from './logger.js';
import { serveFromConfig } from './server/ActorServer.js';
import type { RunningServer } from './server/ActorServer.js';

const log = createLogger('actorwire');

function serveExample(actor: ExampleActorName, config: ServerConfig): Promise<RunningServer> {
  if (actor === 'greeter') {
    return serveFromConfig(spawnActor(GreeterActor, () => new Greeter('actorwire')), config);
  }
  return serveFromConfig(spawnActor(CalculatorActor, () => new Calculator()), config);
}

function fail(error: unknown): never {
  if (error instanceof ActorWireError) {
    log.error(`${error.message} (${error.code})`);
    log.debug(JSON.stringify(error.toJSON(true)));
  } else {
    log.error(`Failed to start server: ${errorMessage(error)}`);
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
  process.exit(1);
}

async function serve(actor: ExampleActorName, env: Record<string, string>): Promise<RunningServer> {
  const config = await loadConfig({ env: { ...process.env, ...env } });
  setLogLevel(config.logging.level);

  log.info(`Starting ${actor} actor...`);
  const server = await serveExample(actor, config);

  log.info(`Transport: ${server.transport}${server.secure ? ' (TLS)' : ''}`);
  log.info(`Listening on ${server.url}`);
  if (server.transport === 'http') {
    log.info(`Try: curl -X POST ${server.url}/info -d '{}'`);
  } else {
    log.info(`Send text frames like {"method": "info", "params": {}} to ${server.url}`);
  }

  return server;
}

function main(): void {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    process.exit(1);
  }

  if (args.command === 'help') {
    console.log(USAGE);
    return;
  }

  if (args.command === 'docs') {
    const options = { baseUrl: args.baseUrl };
    const markdown =
      args.actor === 'greeter'
        ? generateActorDocumentation(GreeterActor, options)
        : generateActorDocumentation(CalculatorActor, options);
    process.stdout.write(markdown);
    return;
  }

  serve(args.actor, args.env)
    .then(server => {
      // Handle graceful shutdown
      const shutdown = () => {
        log.info('Shutting down...');
        server
          .close()
          .then(() => process.exit(0))
          .catch(fail);
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    })
    .catch(fail);
}

main();
