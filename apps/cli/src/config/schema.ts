/**
 * Configuration Schema
 * 
 * Environment variables for a packaging deployment. Parsed once and
 * handed to the planner and notifier as plain values.
 */

import { z } from 'zod';
import {
  parseDatasetList,
  parsePackagingConfig,
  err,
  ok,
  type PackagingConfig,
  type Result,
} from '@cruise-packager/core';
import type { NotificationConfig } from '@cruise-packager/notification';

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  LOG_FILE: z.string().min(1).default('/var/log/cruise-packager.log'),

  // Upstream cruise lookup
  CRUISE_API_URL: z.string().url().default('http://openvdm.example.org/api/warehouse/getCruiseID'),
  CRUISE_API_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  CRUISE_SOURCE_ROOT: z.string().min(1).default('/mnt/CruiseData'),

  // Packaging
  R2R_OUTPUT_DIR: z.string().min(1).default('/mnt/CruiseData/r2r_packages'),
  R2R_LARGE_DATASETS: z.string().default('em304,em710,ek80,radar'),
  R2R_RESERVED_DIR: z.string().min(1).default('r2r'),

  // Notification
  R2R_EMAIL_TO: z.string().email().default('notify.list@example.org'),
  R2R_EMAIL_FROM: z.string().email().default('packager@example.org'),
  R2R_SMTP_HOST: z.string().min(1).default('localhost'),
  R2R_SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(25),
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
  logFile: string;
  cruiseApi: {
    url: string;
    timeoutMs: number;
  };
  sourceRoot: string;
  packaging: PackagingConfig;
  notification: NotificationConfig;
}

export function loadConfig(source: Record<string, string | undefined>): Result<AppConfig, z.ZodError> {
  const parseResult = envSchema.safeParse(source);
  if (!parseResult.success) {
    return err(parseResult.error);
  }

  const env = parseResult.data;

  return ok({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    logFile: env.LOG_FILE,

    cruiseApi: {
      url: env.CRUISE_API_URL,
      timeoutMs: env.CRUISE_API_TIMEOUT_MS,
    },

    sourceRoot: env.CRUISE_SOURCE_ROOT,

    packaging: parsePackagingConfig({
      outputRoot: env.R2R_OUTPUT_DIR,
      largeDatasets: parseDatasetList(env.R2R_LARGE_DATASETS),
      reservedDirName: env.R2R_RESERVED_DIR,
      checksumAlgorithm: 'md5',
      showProgress: false,
    }),

    notification: {
      to: env.R2R_EMAIL_TO,
      from: env.R2R_EMAIL_FROM,
      smtpHost: env.R2R_SMTP_HOST,
      smtpPort: env.R2R_SMTP_PORT,
    },
  });
}
