/**
 * Engine configuration
 *
 * Every option is optional; defaults come from the environment when the
 * corresponding variable is set.
 */

import fs from 'node:fs';
import dotenv from 'dotenv';

import type { GraphControlBinding } from '../storage/dataset/GraphControlSource';

export interface EngineOptions {
  /** Traversal steps one query may spend (path edges, EXISTS checks). */
  maxSteps?: number;
  /** Wall-clock limit per query in milliseconds; 0 disables it. */
  timeoutMs?: number;
  /** Prefix of blank node labels minted by templates. */
  blankNodePrefix?: string;
  graphControl?: GraphControlBinding;
}

export interface LoggingOptions {
  logLevel?: string;
  logFile?: string;
}

export interface ResolvedEngineOptions {
  maxSteps: number;
  timeoutMs: number;
  blankNodePrefix: string;
  graphControl?: GraphControlBinding;
}

export const DEFAULT_MAX_STEPS = 1_000_000;
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_BLANK_NODE_PREFIX = 'b';
export const DEFAULT_LOG_LEVEL = 'info';

function readCount(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got '${raw}'`);
  }
  return value;
}

/**
 * Reads `OWL2SKOS_*` variables. Unset variables are left out so that
 * {@link resolveEngineOptions} applies the defaults.
 */
export function loadEngineOptions(env: NodeJS.ProcessEnv = process.env): EngineOptions & LoggingOptions {
  const options: EngineOptions & LoggingOptions = {};
  const maxSteps = readCount(env, 'OWL2SKOS_MAX_STEPS');
  const timeoutMs = readCount(env, 'OWL2SKOS_TIMEOUT_MS');
  if (maxSteps !== undefined) options.maxSteps = maxSteps;
  if (timeoutMs !== undefined) options.timeoutMs = timeoutMs;
  if (env.OWL2SKOS_LOG_LEVEL) options.logLevel = env.OWL2SKOS_LOG_LEVEL;
  if (env.OWL2SKOS_LOG_FILE) options.logFile = env.OWL2SKOS_LOG_FILE;
  return options;
}

/**
 * Variables of a dotenv file, without touching `process.env`.
 */
export function loadEnvFile(envPath: string): NodeJS.ProcessEnv {
  if (!fs.existsSync(envPath)) {
    throw new Error(`Env file not found: ${envPath}`);
  }
  return dotenv.parse(fs.readFileSync(envPath, 'utf-8'));
}

export function resolveEngineOptions(options: EngineOptions = {}): ResolvedEngineOptions {
  return {
    maxSteps: options.maxSteps ?? DEFAULT_MAX_STEPS,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    blankNodePrefix: options.blankNodePrefix ?? DEFAULT_BLANK_NODE_PREFIX,
    graphControl: options.graphControl,
  };
}
