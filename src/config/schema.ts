import { z } from 'zod';

export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).describe('HTTP port (PORT overrides it)'),
  jsonBodyLimit: z.string().min(1).describe('Largest accepted JSON body, in express.json() notation'),
}).strict();

export const SamplingConfigSchema = z.object({
  maxPointsPerRequest: z.number().int().min(1).max(1_000_000).describe('Points accepted by one sample request'),
  maxGraphDepth: z.number().int().min(1).max(256).describe('Deepest node graph a request may describe'),
}).strict();

export const NoiseConfigSchema = z.object({
  defaultSeed: z.number().int().min(0).max(0xffffffff).describe('Seed for seeded nodes that give none'),
}).strict();

export const RuntimeConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).describe('Logging level'),
}).strict();

export const AppConfigSchema = z.object({
  server: ServerConfigSchema,
  sampling: SamplingConfigSchema,
  noise: NoiseConfigSchema,
  runtime: RuntimeConfigSchema,
}).strict();

export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type AppConfig = z.output<typeof AppConfigSchema>;

export interface DerivedConfig {
  /** Port actually listened on: PORT when set and valid, else server.port */
  port: number;
  debug: boolean;
}

export interface ValidatedConfig {
  server: AppConfig['server'];
  sampling: AppConfig['sampling'];
  noise: AppConfig['noise'];
  runtime: AppConfig['runtime'];
  derived: DerivedConfig;
}
