import type { RecordSchema } from './decoder.js';
import { buildEnvelope, rejectedEnvelope } from './envelope.js';
import { BridgeError, RequestError } from './errors.js';
import { executeScript, MAX_TIMEOUT_SECONDS, type Interpreter } from './executor.js';
import { injectParams } from './injector.js';
import { screenScript } from './security.js';
import { RETURN_FORMATS, type ResponseEnvelope, type ScriptRequest } from './types.js';

export interface RunOptions<T> {
  schema?: RecordSchema<T>;
  interpreter?: Interpreter;
  maxOutputBytes?: number;
  signal?: AbortSignal;
}

export function validateRequest(request: ScriptRequest): void {
  if (!request.code.trim()) {
    throw new RequestError('Script code cannot be empty');
  }
  if (!Number.isFinite(request.timeoutSeconds) || request.timeoutSeconds <= 0) {
    throw new RequestError(`Timeout must be a positive number of seconds, got ${request.timeoutSeconds}`);
  }
  if (request.timeoutSeconds > MAX_TIMEOUT_SECONDS) {
    throw new RequestError(
      `Timeout must be at most ${MAX_TIMEOUT_SECONDS} seconds, got ${request.timeoutSeconds}`
    );
  }
  if (!RETURN_FORMATS.includes(request.returnFormat)) {
    throw new RequestError(
      `Unknown return format "${String(request.returnFormat)}" (expected ${RETURN_FORMATS.join(', ')})`
    );
  }
}

/**
 * Validate, inject, execute and decode one script. Problems found before the
 * spawn (bad request, blocked pattern, unencodable parameter) and everything
 * after it come back as an envelope; only unexpected faults throw.
 */
export async function runScript<T = unknown>(
  request: ScriptRequest,
  options: RunOptions<T> = {}
): Promise<ResponseEnvelope> {
  let script: string;
  try {
    validateRequest(request);
    // Only the template is screened; injected values are quoted literals.
    screenScript(request.code);
    script = injectParams(request.code, request.params);
  } catch (err: unknown) {
    if (err instanceof BridgeError) return rejectedEnvelope(err);
    throw err;
  }

  const execution = await executeScript(script, {
    timeoutSeconds: request.timeoutSeconds,
    interpreter: options.interpreter,
    maxOutputBytes: options.maxOutputBytes,
    signal: options.signal,
  });
  return buildEnvelope(execution, request.returnFormat, options.schema);
}
