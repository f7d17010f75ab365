import { config } from './config';
import { AppConfigSchema, type AppConfig, type ValidatedConfig, type DerivedConfig } from './schema';
import { ZodError } from 'zod';

let cachedConfig: ValidatedConfig | null = null;

function computeDerived(validatedConfig: AppConfig, env: NodeJS.ProcessEnv): DerivedConfig {
  const { server, runtime } = validatedConfig;

  const envPort = Number(env.PORT);
  const port = Number.isInteger(envPort) && envPort > 0 && envPort <= 65535 ? envPort : server.port;

  return {
    port,
    debug: runtime.logLevel === 'debug',
  };
}

export function formatZodError(error: ZodError): string {
  const lines = ['Configuration validation failed:', ''];

  for (const issue of error.issues) {
    const path = issue.path.join('.') || 'root';

    if (issue.code === 'invalid_type') {
      lines.push(
        `  ❌ ${path}:`,
        `     Expected: ${issue.expected}`,
        `     Received: ${issue.received}`,
        ''
      );
    } else if (issue.code === 'unrecognized_keys') {
      lines.push(
        `  ❌ ${path}:`,
        `     Unrecognized keys: ${issue.keys.join(', ')}`,
        `     (This may be a typo or unsupported field)`,
        ''
      );
    } else {
      lines.push(
        `  ❌ ${path}:`,
        `     ${issue.message}`,
        ''
      );
    }
  }

  return lines.join('\n');
}

function deepFreeze<T extends object>(obj: T): T {
  Object.freeze(obj);

  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return obj;
}

/**
 * Validate the configuration once and cache the frozen result.
 */
export function getConfig(): ValidatedConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  try {
    const validated = AppConfigSchema.parse(config);

    const derived = computeDerived(validated, process.env);

    const fullConfig: ValidatedConfig = {
      ...validated,
      derived,
    };

    cachedConfig = deepFreeze(fullConfig);

    return cachedConfig;
  } catch (error) {
    if (error instanceof ZodError) {
      console.error(`[Config] ${formatZodError(error)}\nPlease fix the configuration and restart the server.`);
      throw new Error('Configuration validation failed. See error details above.');
    }
    throw error;
  }
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

export type { AppConfig, AppConfigInput, DerivedConfig, ValidatedConfig } from './schema';
