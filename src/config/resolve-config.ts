/**
 * Configuration Resolution
 * Single-pass config resolution with explicit precedence
 * CLI flags > real environment > env file > defaults
 */

import { z } from 'zod';
import {
  AppConfig,
  DEFAULT_ENDPOINT,
  DEFAULT_HTTP_PORT,
  DEFAULT_TIMEOUT_SECONDS,
  EffectiveConfig,
  getTimeoutSeconds,
} from '../types/llama-config';
import { EnvRecord, getEnvInt } from './env-values';
import { parseLlamaCliConfig } from './parse-llama-config';

export const DEFAULT_APP_LOG_FILE_NAME = 'llama-completion-mcp.log';

/**
 * Raised when the configuration cannot be used to start the server
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * CLI flags that can override configuration
 */
export interface ConfigOverrides {
  httpPort?: number;
  endpoint?: string;
}

/**
 * Parse "8080", ":8080" or "host:8080" into a port number
 */
export function parseHttpPort(raw: string): number | undefined {
  const portText = raw.slice(raw.lastIndexOf(':') + 1);
  if (!/^\d+$/.test(portText)) {
    return undefined;
  }
  const port = Number(portText);
  return port >= 1 && port <= 65535 ? port : undefined;
}

const appEnvSchema = z.object({
  LLamaCliPath: z
    .string({ required_error: 'LLamaCliPath is required' })
    .min(1, 'LLamaCliPath is required'),
  ModelPath: z.string().default(''),
  PromptCachePath: z.string().default(''),
  AppLogPath: z.string().default(''),
  AppLogFileName: z.string().default(DEFAULT_APP_LOG_FILE_NAME),
  HttpPort: z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) {
        return DEFAULT_HTTP_PORT;
      }
      const port = parseHttpPort(value);
      if (port === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `HttpPort "${value}" is not a valid port`,
        });
        return z.NEVER;
      }
      return port;
    }),
  EndPoint: z
    .string()
    .default(DEFAULT_ENDPOINT)
    .refine((value) => value.startsWith('/'), 'EndPoint must start with "/"'),
});

const APP_ENV_KEYS = [
  'LLamaCliPath',
  'ModelPath',
  'PromptCachePath',
  'AppLogPath',
  'AppLogFileName',
  'HttpPort',
  'EndPoint',
] as const;

/**
 * Pick the app-level variables, treating empty strings as unset
 */
function pickAppEnv(env: EnvRecord): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of APP_ENV_KEYS) {
    const value = env[key];
    if (value !== undefined && value !== '') {
      picked[key] = value;
    }
  }
  return picked;
}

/**
 * Resolve the effective configuration from merged environment variables
 * @throws ConfigError when a required value is missing or malformed
 */
export function resolveConfig(env: EnvRecord, overrides: ConfigOverrides = {}): EffectiveConfig {
  const parsed = appEnvSchema.safeParse(pickAppEnv(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const app: AppConfig = {
    llamaCliPath: parsed.data.LLamaCliPath,
    modelPath: parsed.data.ModelPath,
    promptCachePath: parsed.data.PromptCachePath,
    appLogPath: parsed.data.AppLogPath,
    appLogFileName: parsed.data.AppLogFileName,
    httpPort: overrides.httpPort ?? parsed.data.HttpPort,
    endpoint: overrides.endpoint ?? parsed.data.EndPoint,
    timeoutSeconds: getEnvInt(env, 'TimeOutSeconds', DEFAULT_TIMEOUT_SECONDS),
  };

  return freezeConfig({ app, llama: parseLlamaCliConfig(env) });
}

/**
 * Freeze the config and every option object in it
 */
function freezeConfig(config: EffectiveConfig): EffectiveConfig {
  Object.freeze(config.app);
  for (const option of Object.values(config.llama)) {
    if (typeof option === 'object') {
      Object.freeze(option);
    }
  }
  Object.freeze(config.llama);
  return Object.freeze(config);
}

/**
 * Format the configuration for startup logging
 */
export function formatConfigForDisplay(config: EffectiveConfig): string {
  const { app } = config;
  return [
    `llama-cli: ${app.llamaCliPath}`,
    `listen: :${app.httpPort}${app.endpoint}`,
    `timeout: ${getTimeoutSeconds(app)}s`,
    `model: ${config.llama.model.value || '(per request)'}`,
  ].join(', ');
}
