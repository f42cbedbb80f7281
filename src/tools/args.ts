import { runScript } from '../bridge/bridge.js';
import type { RecordSchema } from '../bridge/decoder.js';
import { rejectedEnvelope } from '../bridge/envelope.js';
import { BridgeError } from '../bridge/errors.js';
import { toScriptParams } from '../bridge/injector.js';
import { RETURN_FORMATS, type ResponseEnvelope, type ReturnFormat } from '../bridge/types.js';
import type { ServerConfig } from '../config.js';

export interface ToolContext {
  config: ServerConfig;
  signal?: AbortSignal;
}

export function asString(v: unknown): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

export function asNumber(v: unknown): number | undefined {
  return typeof v === 'number' ? v : undefined;
}

export function asBoolean(v: unknown): boolean | undefined {
  return typeof v === 'boolean' ? v : undefined;
}

export function asStringArray(v: unknown): string[] | undefined {
  if (!Array.isArray(v)) return undefined;
  return v.filter((item): item is string => typeof item === 'string');
}

export function asRecord(v: unknown): Record<string, unknown> | undefined {
  if (typeof v !== 'object' || v === null || Array.isArray(v)) return undefined;
  return Object.fromEntries(Object.entries(v));
}

export function isReturnFormat(v: unknown): v is ReturnFormat {
  return RETURN_FORMATS.some((format) => format === v);
}

/**
 * Convert BridgeErrors thrown while preparing a script (bad dates, bad
 * parameters) into a rejected envelope.
 */
export async function guard(
  build: () => Promise<ResponseEnvelope>
): Promise<ResponseEnvelope> {
  try {
    return await build();
  } catch (err: unknown) {
    if (err instanceof BridgeError) return rejectedEnvelope(err);
    throw err;
  }
}

export interface AppScriptOptions<T> {
  format?: ReturnFormat;
  schema?: RecordSchema<T>;
  timeoutSeconds?: number;
}

export function runAppScript<T>(
  ctx: ToolContext,
  code: string,
  params: Record<string, unknown>,
  options: AppScriptOptions<T> = {}
): Promise<ResponseEnvelope> {
  return guard(() =>
    runScript(
      {
        code,
        params: toScriptParams(params),
        timeoutSeconds: options.timeoutSeconds ?? ctx.config.defaultTimeoutSeconds,
        returnFormat: options.format ?? 'json',
      },
      {
        schema: options.schema,
        interpreter: ctx.config.interpreter,
        maxOutputBytes: ctx.config.maxOutputBytes,
        signal: ctx.signal,
      }
    )
  );
}

/** Collapse a decoded one-record list into the record itself. */
export function singleRecord(envelope: ResponseEnvelope, entity: string): ResponseEnvelope {
  if (!envelope.success || !Array.isArray(envelope.result)) return envelope;
  const [first] = envelope.result;
  if (first !== undefined) return { ...envelope, result: first };
  return { ...envelope, result: null, warning: `No ${entity} record in script output` };
}

export function required(name: string, value: string | undefined): string {
  if (!value) throw new Error(`${name} is required`);
  return value;
}
