// lib/config.ts
// JSON configuration file for LLM credentials, models and reference data

import fs from 'fs';
import path from 'path';
import { z } from 'zod';

export const DEFAULT_CONFIG_FILE = 'config.json';

const ProviderSchema = z.enum(['openai', 'anthropic']);

const SourceSchema = z.object({
  name: z.string().min(1),
  provider: ProviderSchema,
  // Falls back to openai.apiKey for OpenAI-compatible sources
  apiKey: z.string().min(1).optional(),
  baseURL: z.string().url().optional(),
  model: z.string().min(1)
});

const ConfigSchema = z.object({
  openai: z.object({
    apiKey: z.string().min(1, 'openai.apiKey is required'),
    baseURL: z.string().url().optional(),
    model: z.string().min(1).default('gpt-4-turbo-preview')
  }),
  match: z
    .object({
      apiKey: z.string().min(1).optional(),
      baseURL: z.string().url().optional(),
      model: z.string().min(1).default('gpt-4-turbo-preview'),
      temperature: z.number().min(0).max(2).default(0.5),
      maxTokens: z.number().int().positive().default(500),
      referer: z.string().url().optional()
    })
    .default({}),
  sources: z.array(SourceSchema).default([]),
  commodityCodesPath: z.string().min(1).default('data/commodity_codes.json')
});

export type ProviderKind = z.infer<typeof ProviderSchema>;
export type SourceConfig = z.infer<typeof SourceSchema>;
export type AppConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function resolveConfigPath(explicitPath?: string): string {
  return path.resolve(explicitPath ?? process.env.HS_CONFIG_PATH ?? DEFAULT_CONFIG_FILE);
}

/**
 * Validate an already-parsed config object.
 * Relative `commodityCodesPath` values are resolved against `baseDir`.
 */
export function parseConfig(raw: unknown, baseDir: string = process.cwd()): AppConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    console.error('[Config] ❌ Invalid configuration:', parsed.error.flatten().fieldErrors);
    throw new ConfigError(
      `Invalid configuration: ${parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')}`
    );
  }

  const config = parsed.data;
  for (const source of config.sources) {
    if (source.provider === 'anthropic' && !source.apiKey) {
      throw new ConfigError(`Invalid configuration: sources.${source.name}.apiKey is required for anthropic sources`);
    }
  }

  return {
    ...config,
    commodityCodesPath: path.resolve(baseDir, config.commodityCodesPath)
  };
}

/**
 * Load configuration from disk. Throws ConfigError when the file is missing,
 * not valid JSON, or lacks an API key.
 */
export function loadConfig(explicitPath?: string): AppConfig {
  const configPath = resolveConfigPath(explicitPath);

  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf8');
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error('[Config] ❌ Cannot read configuration file:', configPath);
    throw new ConfigError(`Cannot read configuration file ${configPath}: ${reason}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Configuration file ${configPath} is not valid JSON: ${reason}`);
  }

  const config = parseConfig(raw, path.dirname(configPath));
  console.log('[Config] ✅ Loaded', {
    path: configPath,
    matchModel: config.match.model,
    sources: config.sources.map(s => s.name)
  });
  return config;
}
