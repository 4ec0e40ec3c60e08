/**
 * Run configuration
 *
 * Read from environment variables (loaded from .env / .env.local by the
 * scripts) and validated once at start-up. Relative paths resolve against
 * the app directory.
 */

import { isAbsolute, resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { LOG_LEVELS } from './logger';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'], {
    errorMap: () => ({ message: 'Expected true or false' }),
  })
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const positiveInt = z.coerce.number().int('Expected a whole number').positive('Expected a positive number');

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

export const envSchema = z.object({
  INPUT_DIR: z.string().min(1).default('input'),
  OUTPUT_DIR: z.string().min(1).default('output'),
  SKU_MAPPING_PATH: z.string().min(1).default('config/sku-mapping.json'),
  WEBHOOK_URL: z.preprocess(emptyAsUndefined, z.string().url('Expected a URL').optional()),
  WEBHOOK_TIMEOUT_MS: positiveInt.default(60_000),
  FILE_READ_TIMEOUT_MS: positiveInt.default(30_000),
  SAVE_JSON_OUTPUT: booleanFlag.default('true'),
  UNMAPPED_POLICY: z.enum(['report', 'fail']).default('report'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_FILE: z.preprocess(emptyAsUndefined, z.string().optional()),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  inputDir: string;
  outputDir: string;
  skuMappingPath: string;
  webhookUrl: string | undefined;
  webhookTimeoutMs: number;
  fileReadTimeoutMs: number;
  saveJsonOutput: boolean;
  unmappedPolicy: Env['UNMAPPED_POLICY'];
  logLevel: Env['LOG_LEVEL'];
  logFile: string | undefined;
}

function resolvePath(baseDir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

/**
 * Validate the environment and build the run configuration
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv, baseDir: string): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    inputDir: resolvePath(baseDir, parsed.INPUT_DIR),
    outputDir: resolvePath(baseDir, parsed.OUTPUT_DIR),
    skuMappingPath: resolvePath(baseDir, parsed.SKU_MAPPING_PATH),
    webhookUrl: parsed.WEBHOOK_URL,
    webhookTimeoutMs: parsed.WEBHOOK_TIMEOUT_MS,
    fileReadTimeoutMs: parsed.FILE_READ_TIMEOUT_MS,
    saveJsonOutput: parsed.SAVE_JSON_OUTPUT,
    unmappedPolicy: parsed.UNMAPPED_POLICY,
    logLevel: parsed.LOG_LEVEL,
    logFile: parsed.LOG_FILE ? resolvePath(baseDir, parsed.LOG_FILE) : undefined,
  };
}
