import { ZodError } from 'zod';
import { formatZodError, getConfig, resetConfigCache } from '../src/config';
import { AppConfigSchema } from '../src/config/schema';

describe('getConfig', () => {
  const originalPort = process.env.PORT;

  beforeEach(() => {
    resetConfigCache();
    delete process.env.PORT;
  });

  afterEach(() => {
    if (originalPort === undefined) {
      delete process.env.PORT;
    } else {
      process.env.PORT = originalPort;
    }
    resetConfigCache();
  });

  it('should validate the defaults and derive runtime values', () => {
    const config = getConfig();

    expect(config.server.port).toBe(3001);
    expect(config.sampling.maxPointsPerRequest).toBe(10000);
    expect(config.sampling.maxGraphDepth).toBe(32);
    expect(config.noise.defaultSeed).toBe(0);
    expect(config.derived).toEqual({ port: 3001, debug: false });
  });

  it('should cache and deep-freeze the result', () => {
    const config = getConfig();

    expect(getConfig()).toBe(config);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.sampling)).toBe(true);
    expect(Object.isFrozen(config.derived)).toBe(true);
  });

  it('should let a valid PORT override the configured port', () => {
    process.env.PORT = '8080';
    expect(getConfig().derived.port).toBe(8080);
  });

  it('should ignore an invalid PORT', () => {
    process.env.PORT = 'not-a-port';
    expect(getConfig().derived.port).toBe(3001);
  });
});

describe('formatZodError', () => {
  function parseError(input: unknown): ZodError {
    const result = AppConfigSchema.safeParse(input);
    if (result.success) {
      throw new Error('expected validation to fail');
    }
    return result.error;
  }

  const valid = {
    server: { port: 3001, jsonBodyLimit: '1mb' },
    sampling: { maxPointsPerRequest: 10, maxGraphDepth: 4 },
    noise: { defaultSeed: 0 },
    runtime: { logLevel: 'info' },
  };

  it('should list type mismatches with expected and received types', () => {
    const message = formatZodError(parseError({ ...valid, noise: { defaultSeed: 'zero' } }));

    expect(message.split('\n')).toEqual([
      'Configuration validation failed:',
      '',
      '  ❌ noise.defaultSeed:',
      '     Expected: number',
      '     Received: string',
      '',
    ]);
  });

  it('should name unrecognized keys', () => {
    const message = formatZodError(parseError({ ...valid, runtime: { logLevel: 'info', colour: true } }));

    expect(message).toContain('  ❌ runtime:');
    expect(message).toContain('     Unrecognized keys: colour');
  });

  it('should report range violations with the zod message', () => {
    const message = formatZodError(parseError({ ...valid, server: { port: 0, jsonBodyLimit: '1mb' } }));

    expect(message).toContain('  ❌ server.port:');
    expect(message).toContain('     Number must be greater than or equal to 1');
  });
});
