import type { AppConfigInput } from './schema';

export const config: AppConfigInput = {
  server: {
    port: 3001,
    jsonBodyLimit: '1mb',
  },

  sampling: {
    maxPointsPerRequest: 10_000,
    maxGraphDepth: 32,
  },

  noise: {
    defaultSeed: 0,
  },

  runtime: {
    logLevel: 'info',
  },
};
