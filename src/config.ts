/**
 * Configuration for the gateway client and the analysis pipeline.
 *
 * The core never reads the environment itself; `loadConfig` output is handed
 * to `createAnalysisRuntime`.
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { ConfigurationError } from './errors.js';

const booleanString = z
  .union([z.boolean(), z.string()])
  .transform((val) => (typeof val === 'boolean' ? val : ['true', '1', 'yes'].includes(val.toLowerCase())));

const configSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  gateway: z.object({
    apiBase: z.string().url().default('https://gigachat.devices.sberbank.ru/api/v1'),
    authUrl: z.string().url().default('https://ngw.devices.sberbank.ru:9443/api/v2/oauth'),
    apiKey: z.string().min(1, 'LLM_GATEWAY_API_KEY is required'),
    scope: z.string().min(1).default('GIGACHAT_API_PERS'),
    model: z.string().min(1).default('GigaChat-Max'),
    maxRetries: z.coerce.number().int().min(1).default(5),
    retryDelayMs: z.coerce.number().int().min(0).default(1000),
    timeoutMs: z.coerce.number().int().positive().default(60_000),
    tokenMarginMs: z.coerce.number().int().min(0).default(300_000),
    temperature: z.coerce.number().min(0).max(2).default(0.7),
    maxTokens: z.coerce.number().int().positive().default(4096),
  }),

  analysis: z.object({
    analyzeSecurity: booleanString.default(true),
  }),
});

export type AuditConfig = z.infer<typeof configSchema>;
export type GatewayConfig = AuditConfig['gateway'];

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

export function buildConfigFromEnv(env: Env): unknown {
  return {
    logLevel: nonEmpty(env.LOG_LEVEL),
    gateway: {
      apiBase: nonEmpty(env.LLM_GATEWAY_API_BASE),
      authUrl: nonEmpty(env.LLM_GATEWAY_AUTH_URL),
      apiKey: env.LLM_GATEWAY_API_KEY ?? '',
      scope: nonEmpty(env.LLM_GATEWAY_SCOPE),
      model: nonEmpty(env.LLM_GATEWAY_MODEL),
      maxRetries: nonEmpty(env.LLM_GATEWAY_MAX_RETRIES),
      retryDelayMs: nonEmpty(env.LLM_GATEWAY_RETRY_DELAY_MS),
      timeoutMs: nonEmpty(env.LLM_GATEWAY_TIMEOUT_MS),
      tokenMarginMs: nonEmpty(env.LLM_GATEWAY_TOKEN_MARGIN_MS),
      temperature: nonEmpty(env.LLM_GATEWAY_TEMPERATURE),
      maxTokens: nonEmpty(env.LLM_GATEWAY_MAX_TOKENS),
    },
    analysis: {
      analyzeSecurity: nonEmpty(env.ANALYZE_SECURITY),
    },
  };
}

export function parseConfig(raw: unknown): AuditConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Load `.env` (when present) and validate the resulting environment.
 * Pass an explicit `env` to skip `.env` loading entirely.
 */
export function loadConfig(env?: Env): AuditConfig {
  if (env === undefined) {
    dotenvConfig();
    return parseConfig(buildConfigFromEnv(process.env));
  }
  return parseConfig(buildConfigFromEnv(env));
}
