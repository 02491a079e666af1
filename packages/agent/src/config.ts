import { readFileSync, existsSync, statSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { HttpToolformerOptions } from '@pactwire/core';

const backendSchema = z.object({
  provider: z.enum(['openai', 'gemini']),
  model: z.string().min(1),
  baseUrl: z.string().url().optional(),
  /** Environment variable holding the API key. Keys never live in the file. */
  apiKeyEnv: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
});

const positiveInt = z.number().int().positive();

const configSchema = z
  .object({
    backend: backendSchema.optional(),
    negotiation: z
      .object({ maxRounds: positiveInt.optional(), roundTimeoutMs: positiveInt.optional() })
      .strict()
      .optional(),
    programming: z
      .object({ maxAttempts: positiveInt.optional(), attemptTimeoutMs: positiveInt.optional() })
      .strict()
      .optional(),
    checking: z.object({ timeoutMs: positiveInt.optional() }).strict().optional(),
    /** Where `negotiate` writes protocol documents and adapters. Default: the working directory. */
    outputDir: z.string().min(1).optional(),
  })
  .strict();

export type BackendConfig = z.infer<typeof backendSchema>;
export type PactwireConfig = z.infer<typeof configSchema>;

export const CONFIG_PATH_ENV = 'PACTWIRE_CONFIG_PATH';
const DEFAULT_CONFIG_PATHS = ['pactwire.config.json', '.pactwire.json'];

const DEFAULT_API_KEY_ENV: Record<BackendConfig['provider'], string> = {
  openai: 'OPENAI_API_KEY',
  gemini: 'GEMINI_API_KEY',
};

export type Env = Readonly<Record<string, string | undefined>>;

function candidatePaths(explicitPath: string | undefined, env: Env): string[] {
  if (explicitPath) {
    return [path.resolve(explicitPath)];
  }
  const envPath = env[CONFIG_PATH_ENV];
  if (envPath) {
    const resolved = path.resolve(envPath);
    if (existsSync(resolved) && statSync(resolved).isDirectory()) {
      return DEFAULT_CONFIG_PATHS.map((p) => path.resolve(resolved, p));
    }
    return [resolved];
  }
  return DEFAULT_CONFIG_PATHS.map((p) => path.resolve(process.cwd(), p));
}

/**
 * Load config from file. An explicit path wins; otherwise PACTWIRE_CONFIG_PATH names a file, or a
 * directory searched for pactwire.config.json / .pactwire.json; otherwise the cwd is searched.
 * No file means an empty config.
 */
export function loadConfig(explicitPath?: string, env: Env = process.env): PactwireConfig {
  for (const p of candidatePaths(explicitPath, env)) {
    if (!existsSync(p)) {
      continue;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(p, 'utf8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid JSON in config file ${p}: ${message}`);
    }
    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid config file ${p}: ${detail}`);
    }
    return parsed.data;
  }

  return {};
}

export interface ResolvedBackend {
  provider: BackendConfig['provider'];
  options: HttpToolformerOptions;
}

/** Backend settings with the API key read from the environment. */
export function resolveBackend(config: PactwireConfig, env: Env = process.env): ResolvedBackend {
  const backend = config.backend;
  if (!backend) {
    throw new Error('No backend configured: set backend.provider and backend.model in the config file');
  }
  const keyEnv = backend.apiKeyEnv ?? DEFAULT_API_KEY_ENV[backend.provider];
  const apiKey = env[keyEnv];
  if (!apiKey) {
    throw new Error(`Missing API key: environment variable ${keyEnv} is not set`);
  }
  return {
    provider: backend.provider,
    options: {
      apiKey,
      model: backend.model,
      baseUrl: backend.baseUrl,
      temperature: backend.temperature,
    },
  };
}

/** Resolves relative to the working directory. */
export function resolveOutputDir(config: PactwireConfig): string {
  return path.resolve(config.outputDir ?? '.');
}
