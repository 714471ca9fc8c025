// Runtime configuration, read once from the environment at startup

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off', ''])
  .transform(value => value === 'true' || value === '1' || value === 'yes' || value === 'on');

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim().length > 0 ? value.trim() : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3012),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  TASK_MAX_CONCURRENT: z.coerce.number().int().min(1).max(64).default(4),
  TASK_RETENTION_MS: z.coerce.number().int().min(1_000).default(60_000),
  TASK_MAX_AGE_MS: z.coerce.number().int().min(60_000).default(6 * 60 * 60 * 1000),
  TASK_SWEEP_INTERVAL_MS: z.coerce.number().int().min(100).default(15_000),
  TASK_DELETE_BATCH_SIZE: z.coerce.number().int().min(1).max(1000).default(100),
  TASK_LIST_PAGE_SIZE: z.coerce.number().int().min(1).max(1000).default(1000),
  TASK_MAX_DELETE_PASSES: z.coerce.number().int().min(1).max(10).default(3),

  STORAGE_ACCOUNTS_FILE: optionalString,
  S3_ENDPOINT: optionalString,
  S3_REGION: z.string().default('us-east-1'),
  S3_ACCESS_KEY_ID: optionalString,
  S3_SECRET_ACCESS_KEY: optionalString,
  S3_FORCE_PATH_STYLE: booleanFlag.default('true'),

  PERMISSIONS_FILE: optionalString,
  AUTH_USER_HEADER: z.string().default('x-user-id'),
  AUTH_ADMIN_HEADER: z.string().default('x-user-admin'),
});

export interface TaskLimits {
  deleteBatchSize: number;
  listPageSize: number;
  maxDeletePasses: number;
}

export interface AppSettings {
  env: 'development' | 'production' | 'test';
  host: string;
  port: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  tasks: TaskLimits & {
    maxConcurrent: number;
    retentionMs: number;
    maxAgeMs: number;
    sweepIntervalMs: number;
  };
  storage: {
    accountsFile?: string;
    defaultAccount?: {
      endpoint?: string;
      region: string;
      accessKeyId: string;
      secretAccessKey: string;
      forcePathStyle: boolean;
    };
  };
  auth: {
    permissionsFile?: string;
    userHeader: string;
    adminHeader: string;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse settings from environment variables
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }

  const vars = parsed.data;
  const hasDefaultAccount = vars.S3_ACCESS_KEY_ID !== undefined && vars.S3_SECRET_ACCESS_KEY !== undefined;

  return {
    env: vars.NODE_ENV,
    host: vars.HOST,
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    tasks: {
      maxConcurrent: vars.TASK_MAX_CONCURRENT,
      retentionMs: vars.TASK_RETENTION_MS,
      maxAgeMs: vars.TASK_MAX_AGE_MS,
      sweepIntervalMs: vars.TASK_SWEEP_INTERVAL_MS,
      deleteBatchSize: vars.TASK_DELETE_BATCH_SIZE,
      listPageSize: vars.TASK_LIST_PAGE_SIZE,
      maxDeletePasses: vars.TASK_MAX_DELETE_PASSES,
    },
    storage: {
      accountsFile: vars.STORAGE_ACCOUNTS_FILE,
      defaultAccount: hasDefaultAccount
        ? {
            endpoint: vars.S3_ENDPOINT,
            region: vars.S3_REGION,
            accessKeyId: vars.S3_ACCESS_KEY_ID ?? '',
            secretAccessKey: vars.S3_SECRET_ACCESS_KEY ?? '',
            forcePathStyle: vars.S3_FORCE_PATH_STYLE,
          }
        : undefined,
    },
    auth: {
      permissionsFile: vars.PERMISSIONS_FILE,
      userHeader: vars.AUTH_USER_HEADER.toLowerCase(),
      adminHeader: vars.AUTH_ADMIN_HEADER.toLowerCase(),
    },
  };
}
