/**
 * Schematic Agent - Configuration
 *
 * Centralized configuration management with environment variable support
 */

import { z } from 'zod';

const ConfigSchema = z.object({
  // Server Configuration
  port: z.number().int().positive().default(8080),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  version: z.string().default('1.0.0'),
  serviceName: z.string().default('schematic-agent'),

  // LLM Configuration (OpenAI chat completions)
  llm: z.object({
    apiKey: z.string().default(''),
    model: z.string().default('gpt-4o'),
    baseUrl: z.string().url().default('https://api.openai.com/v1'),
    timeoutMs: z.number().int().positive().default(120000),
    maxRetries: z.number().int().positive().default(3),
  }),

  // KiCad Configuration
  kicad: z.object({
    cliPath: z.string().optional(),
    symbolsDir: z.string().optional(),
    ercTimeoutMs: z.number().int().positive().default(120000),
  }),

  // Pipeline Configuration
  pipeline: z.object({
    maxIterations: z.number().int().positive().default(3),
    outputDir: z.string().default('output'),
  }),

  // Storage Configuration
  storage: z.object({
    uploadDir: z.string().default('/tmp/schematic-agent/uploads'),
    runsDir: z.string().default('/tmp/schematic-agent/runs'),
    maxUploadSize: z.number().int().positive().default(5 * 1024 * 1024), // 5MB
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    port: parseInt(env.PORT || '8080', 10),
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',
    version: env.SCHEMATIC_AGENT_VERSION || '1.0.0',

    llm: {
      apiKey: env.OPENAI_API_KEY || '',
      model: env.OPENAI_MODEL || 'gpt-4o',
      baseUrl: env.OPENAI_BASE_URL || 'https://api.openai.com/v1',
      timeoutMs: parseInt(env.LLM_TIMEOUT_MS || '120000', 10),
      maxRetries: parseInt(env.LLM_MAX_RETRIES || '3', 10),
    },

    kicad: {
      cliPath: env.KICAD_CLI_PATH || undefined,
      symbolsDir: env.KICAD_SYMBOLS_DIR || undefined,
      ercTimeoutMs: parseInt(env.ERC_TIMEOUT_MS || '120000', 10),
    },

    pipeline: {
      maxIterations: parseInt(env.PIPELINE_MAX_ITERATIONS || '3', 10),
      outputDir: env.OUTPUT_DIR || 'output',
    },

    storage: {
      uploadDir: env.UPLOAD_DIR || '/tmp/schematic-agent/uploads',
      runsDir: env.RUNS_DIR || '/tmp/schematic-agent/runs',
      maxUploadSize: parseInt(env.MAX_UPLOAD_SIZE || String(5 * 1024 * 1024), 10),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

export const config = loadConfig();
