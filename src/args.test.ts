import { USAGE, parseCliArgs } from './args.js';
import { ConfigError } from './errors.js';

describe('parseCliArgs', () => {
  it('should serve the calculator by default', () => {
    expect(parseCliArgs([])).toEqual({ command: 'serve', actor: 'calculator', env: {} });
  });

  it('should map server flags to environment overrides', () => {
    const args = parseCliArgs([
      'serve',
      '--actor',
      'greeter',
      '-p',
      '9000',
      '--host',
      '0.0.0.0',
      '-t',
      'websocket',
      '--cert',
      'cert.pem',
      '--key',
      'key.pem',
      '--envelope',
      'lenient',
      '--body-limit',
      '1mb',
      '--log-level',
      'debug'
    ]);

    expect(args).toEqual({
      command: 'serve',
      actor: 'greeter',
      env: {
        ACTORWIRE_PORT: '9000',
        ACTORWIRE_HOST: '0.0.0.0',
        ACTORWIRE_TRANSPORT: 'websocket',
        ACTORWIRE_TLS_CERT: 'cert.pem',
        ACTORWIRE_TLS_KEY: 'key.pem',
        ACTORWIRE_WS_ENVELOPE: 'lenient',
        ACTORWIRE_BODY_LIMIT: '1mb',
        ACTORWIRE_LOG_LEVEL: 'debug'
      }
    });
  });

  it('should parse the docs command', () => {
    expect(parseCliArgs(['docs', '-a', 'greeter', '--base-url', 'http://localhost:9000'])).toEqual({
      command: 'docs',
      actor: 'greeter',
      env: {},
      baseUrl: 'http://localhost:9000'
    });
  });

  it('should recognize --help anywhere', () => {
    expect(parseCliArgs(['--port', '9000', '--help']).command).toBe('help');
  });

  it('should reject unknown options', () => {
    expect(() => parseCliArgs(['--verbose', 'yes'])).toThrow(ConfigError);
    expect(() => parseCliArgs(['toString', 'x'])).toThrow('Unknown option: toString');
  });

  it('should reject a flag without a value', () => {
    expect(() => parseCliArgs(['--port'])).toThrow('Missing value for --port');
    expect(() => parseCliArgs(['--port', '--host', 'localhost'])).toThrow('Missing value for --port');
  });

  it('should reject an unknown actor', () => {
    expect(() => parseCliArgs(['--actor', 'robot'])).toThrow('Unknown actor: robot (expected calculator or greeter)');
  });
});

describe('USAGE', () => {
  it('should state the default bind address', () => {
    expect(USAGE).toContain('Serves on 127.0.0.1:8080 by default, reachable from this machine only.');
    expect(USAGE).toContain('Pass --host 0.0.0.0 to accept connections on every interface.');
  });
});
