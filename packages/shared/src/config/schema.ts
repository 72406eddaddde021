import { z } from 'zod';

export const LlmConfigSchema = z.object({
  /** When false the remote generator is never probed. */
  enabled: z.boolean().default(true),
  provider: z.enum(['ollama', 'fake']).default('ollama'),
  baseUrl: z.string().url().default('http://localhost:11434'),
  model: z.string().min(1).default('llama2'),
  temperature: z.number().min(0).max(2).default(0.7),
  topP: z.number().min(0).max(1).default(0.9),
  generateTimeoutMs: z.number().int().positive().default(60_000),
  probeTimeoutMs: z.number().int().positive().default(2_000),
});
export type LlmConfig = z.infer<typeof LlmConfigSchema>;

export const StoreConfigSchema = z.object({
  path: z.string().min(1).default('.taskplanner/tasks.db'),
});

export const ServerConfigSchema = z.object({
  host: z.string().default('0.0.0.0'),
  port: z.number().int().min(0).max(65535).default(5000),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  /** JSONL file receiving structured events; events are not persisted when unset. */
  tracePath: z.string().optional(),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  llm: LlmConfigSchema.default({}),
  store: StoreConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
