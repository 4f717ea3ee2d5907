/**
 * Client configuration
 *
 * Reads connection settings from environment variables, optionally
 * layered over a YAML file named by SHOVELS_CONFIG. Environment
 * variables win over file values.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { config as loadDotenv } from 'dotenv';
import { load } from 'js-yaml';
import {
  DEFAULT_BASE_URL,
  LOG_LEVELS,
  isRecord,
  isValidLogLevel,
  type ClientConfiguration,
  type LogLevel,
} from '@shovels-client/shared';

export interface LoadEnvOptions {
  /** Load `.env.{envName}` instead of `.env` */
  envName?: string;

  /** Explicit file path; `envName` is ignored when set */
  envPath?: string;

  /** Directory searched for the env file (default: process.cwd()) */
  cwd?: string;
}

/**
 * Load variables from a dotenv file into process.env.
 * Variables already set are not overwritten.
 * @returns The path that was loaded
 * @throws Error if the file does not exist
 */
export function loadEnv(options: LoadEnvOptions = {}): string {
  const envFile = options.envName ? `.env.${options.envName}` : '.env';
  const path = options.envPath ?? join(options.cwd ?? process.cwd(), envFile);

  if (!existsSync(path)) {
    throw new Error(`Environment file ${path} does not exist`);
  }

  const result = loadDotenv({ path });
  if (result.error) {
    throw result.error;
  }
  return path;
}

function parseLogLevel(value: string, source: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  if (!isValidLogLevel(normalized)) {
    throw new Error(`${source} must be one of: ${LOG_LEVELS.join(', ')}`);
  }
  return normalized;
}

function parseTimeout(value: string, source: string): number {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${source} must be a positive integer`);
  }
  return parsed;
}

/**
 * Read the optional YAML config file
 */
function readConfigFile(path: string): Partial<ClientConfiguration> {
  if (!existsSync(path)) {
    throw new Error(`Config file ${path} does not exist`);
  }

  const parsed: unknown = load(readFileSync(path, 'utf8'));
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${path} must contain a mapping`);
  }

  const fileConfig: Partial<ClientConfiguration> = {};
  const { apiKey, baseUrl, timeoutMs, logLevel } = parsed;

  if (apiKey !== undefined) {
    if (typeof apiKey !== 'string') throw new Error(`apiKey in ${path} must be a string`);
    fileConfig.apiKey = apiKey;
  }
  if (baseUrl !== undefined) {
    if (typeof baseUrl !== 'string') throw new Error(`baseUrl in ${path} must be a string`);
    fileConfig.baseUrl = baseUrl;
  }
  if (timeoutMs !== undefined) {
    fileConfig.timeoutMs = parseTimeout(String(timeoutMs), `timeoutMs in ${path}`);
  }
  if (logLevel !== undefined) {
    fileConfig.logLevel = parseLogLevel(String(logLevel), `logLevel in ${path}`);
  }

  return fileConfig;
}

/**
 * Load client configuration
 *
 * Variables:
 * - SHOVELS_API_KEY (required)
 * - SHOVELS_API_URL (default: public endpoint)
 * - SHOVELS_TIMEOUT_MS (optional, positive integer)
 * - SHOVELS_LOG_LEVEL (default: info)
 * - SHOVELS_CONFIG (optional YAML file with apiKey, baseUrl, timeoutMs, logLevel)
 *
 * @throws Error if the API key is missing or a value is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientConfiguration {
  const fileConfig = env['SHOVELS_CONFIG'] ? readConfigFile(env['SHOVELS_CONFIG']) : {};

  const apiKey = env['SHOVELS_API_KEY'] || fileConfig.apiKey;
  if (!apiKey) {
    throw new Error('SHOVELS_API_KEY is required');
  }

  const baseUrl = (env['SHOVELS_API_URL'] || fileConfig.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, '');

  const config: ClientConfiguration = {
    apiKey,
    baseUrl,
    logLevel: env['SHOVELS_LOG_LEVEL']
      ? parseLogLevel(env['SHOVELS_LOG_LEVEL'], 'SHOVELS_LOG_LEVEL')
      : fileConfig.logLevel ?? 'info',
  };

  const timeoutMs = env['SHOVELS_TIMEOUT_MS']
    ? parseTimeout(env['SHOVELS_TIMEOUT_MS'], 'SHOVELS_TIMEOUT_MS')
    : fileConfig.timeoutMs;
  if (timeoutMs !== undefined) config.timeoutMs = timeoutMs;

  return config;
}
