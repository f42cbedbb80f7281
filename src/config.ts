import {
  DEFAULT_MAX_OUTPUT_BYTES,
  MAX_TIMEOUT_SECONDS,
  OSASCRIPT,
  type Interpreter,
} from './bridge/executor.js';

export interface ServerConfig {
  defaultTimeoutSeconds: number;
  interpreter: Interpreter;
  maxOutputBytes: number;
  debug: boolean;
}

export const DEFAULT_TIMEOUT_SECONDS = 30;

type Env = Record<string, string | undefined>;

function positiveNumber(
  env: Env,
  key: string,
  fallback: number,
  warnings: string[],
  max = Number.POSITIVE_INFINITY
): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    warnings.push(`${key}="${raw}" is not a positive number; using ${fallback}`);
    return fallback;
  }
  if (value > max) {
    warnings.push(`${key}="${raw}" exceeds ${max}; using ${max}`);
    return max;
  }
  return value;
}

export function loadConfig(env: Env = process.env): { config: ServerConfig; warnings: string[] } {
  const warnings: string[] = [];
  const maxOutputMb = positiveNumber(
    env,
    'MAC_AUTOMATION_MAX_OUTPUT_MB',
    DEFAULT_MAX_OUTPUT_BYTES / (1024 * 1024),
    warnings
  );
  const config: ServerConfig = Object.freeze({
    defaultTimeoutSeconds: positiveNumber(
      env,
      'MAC_AUTOMATION_TIMEOUT',
      DEFAULT_TIMEOUT_SECONDS,
      warnings,
      MAX_TIMEOUT_SECONDS
    ),
    interpreter: { command: env.MAC_AUTOMATION_OSASCRIPT || OSASCRIPT.command, args: OSASCRIPT.args },
    maxOutputBytes: Math.floor(maxOutputMb * 1024 * 1024),
    debug: ['1', 'true', 'yes'].includes((env.MAC_AUTOMATION_DEBUG ?? '').toLowerCase()),
  });
  return { config, warnings };
}
