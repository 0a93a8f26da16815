/**
 * Run configuration
 *
 * Settings come from the environment (`.env` is loaded by the entry scripts),
 * routes from a JSON file. Both are validated up front so a bad proxy string or
 * a typo in the routes file stops the run before a browser is launched.
 */

import fs from 'fs';
import path from 'path';
import { z, ZodError } from 'zod';
import type { Credentials, CsvWriteMode, Route, ScraperOptions } from './interfaces/types';
import { ProxyRotator } from './services/proxy.service';
import { ConfigError } from './utils/errors';
import { isLogLevel } from './utils/logger';
import type { LogLevel } from './utils/logger';

export interface AppConfig {
  scraper: ScraperOptions;
  elementTimeoutMs: number;
  routesPath: string;
  outputDir: string;
  csvWriteMode: CsvWriteMode;
  rideTypes: string[];
  logLevel: LogLevel;
}

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(v => v === 'true' || v === '1' || v === 'yes');

const envSchema = z.object({
  PROXY_LIST: z.string().default(''),
  PROXY_ROTATION_THRESHOLD: z.coerce.number().int().positive().default(6),
  MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  ELEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  HEADLESS: booleanFromEnv.default('true'),
  VERIFY_PROXY_IP: booleanFromEnv.default('true'),
  COOKIES_PATH: z.string().min(1).default(path.join('cookies', 'uber.json')),
  ROUTES_PATH: z.string().min(1).default('routes.json'),
  OUTPUT_DIR: z.string().min(1).default(path.join('csv', 'uber')),
  CSV_WRITE_MODE: z.enum(['append', 'overwrite']).default('append'),
  RIDE_TYPES: z.string().default(''),
  LOG_LEVEL: z
    .string()
    .default('INFO')
    .transform(v => v.toUpperCase())
    .refine(isLogLevel, 'must be one of DEBUG, INFO, WARN, ERROR'),
});

const geoSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

const routesFileSchema = z.object({
  routes: z
    .array(
      z.object({
        name: z.string().min(1),
        pickup: geoSchema,
        drop: geoSchema,
      }),
    )
    .min(1, 'at least one route is required'),
});

function issuesOf(error: ZodError): string[] {
  return error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`);
}

// Treat empty strings as unset so `FOO=` in .env falls back to the default
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }
  return cleaned;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(withoutBlanks(env));
  if (!result.success) {
    throw new ConfigError('Invalid environment configuration', issuesOf(result.error));
  }
  const e = result.data;

  return {
    scraper: {
      proxies: ProxyRotator.parseList(e.PROXY_LIST),
      proxyRotationThreshold: e.PROXY_ROTATION_THRESHOLD,
      maxAttempts: e.MAX_ATTEMPTS,
      retryDelayMs: e.RETRY_DELAY_MS,
      navigationTimeoutMs: e.NAVIGATION_TIMEOUT_MS,
      cookiesPath: e.COOKIES_PATH,
      headless: e.HEADLESS,
      verifyProxyIp: e.VERIFY_PROXY_IP,
    },
    elementTimeoutMs: e.ELEMENT_TIMEOUT_MS,
    routesPath: e.ROUTES_PATH,
    outputDir: e.OUTPUT_DIR,
    csvWriteMode: e.CSV_WRITE_MODE,
    rideTypes: splitList(e.RIDE_TYPES),
    logLevel: isLogLevel(e.LOG_LEVEL) ? e.LOG_LEVEL : 'INFO',
  };
}

export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  const phoneNumber = (env.UBER_PHONE_NUMBER || '').trim();
  const password = (env.UBER_PASSWORD || '').trim();

  const missing: string[] = [];
  if (!phoneNumber) missing.push('UBER_PHONE_NUMBER is required');
  if (!password) missing.push('UBER_PASSWORD is required');
  if (missing.length > 0) {
    throw new ConfigError('Missing credentials', missing);
  }

  return { phoneNumber, password };
}

export function parseRoutes(raw: unknown): Route[] {
  const result = routesFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError('Invalid routes file', issuesOf(result.error));
  }
  return result.data.routes;
}

export function loadRoutes(routesPath: string): Route[] {
  const absolute = path.resolve(process.cwd(), routesPath);
  if (!fs.existsSync(absolute)) {
    throw new ConfigError(`Routes file not found at ${absolute}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(absolute, 'utf-8'));
  } catch {
    throw new ConfigError(`Routes file ${absolute} is not valid JSON`);
  }
  return parseRoutes(raw);
}
