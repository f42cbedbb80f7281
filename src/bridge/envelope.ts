import type { BridgeError } from './errors.js';
import { decodeOutput, type RecordSchema } from './decoder.js';
import type { ExecutionResult, ResponseEnvelope, ReturnFormat } from './types.js';

export const JSON_FALLBACK_WARNING =
  'Output could not be parsed as JSON; returning best-effort output';

/** Envelope for a request rejected before any process was spawned. */
export function rejectedEnvelope(err: BridgeError): ResponseEnvelope {
  return {
    success: false,
    status: 0,
    runtime_seconds: 0,
    parsed: false,
    error: err.message,
    error_kind: err.kind,
  };
}

/**
 * Combine an execution with the decoding of its stdout. A failed execution is
 * never decoded. `raw` carries stdout untouched under `raw_output`.
 */
export function buildEnvelope<T>(
  execution: ExecutionResult,
  format: ReturnFormat,
  schema?: RecordSchema<T>
): ResponseEnvelope {
  const runtime_seconds = execution.elapsedMs / 1000;

  if (!execution.success) {
    return {
      success: false,
      status: 0,
      runtime_seconds,
      parsed: false,
      error: execution.failure?.message ?? 'Script execution failed',
      error_kind: execution.failure?.kind ?? 'process',
    };
  }

  if (format === 'raw') {
    return { success: true, status: 1, runtime_seconds, parsed: false, raw_output: execution.stdout };
  }

  const outcome = decodeOutput(execution.stdout, format, schema);
  const envelope: ResponseEnvelope = {
    success: true,
    status: 1,
    runtime_seconds,
    parsed: outcome.parsed,
    result: outcome.value,
  };
  if (outcome.total !== undefined) envelope.total = outcome.total;
  if (format === 'json' && !outcome.parsed) envelope.warning = JSON_FALLBACK_WARNING;
  if (outcome.diagnostics.length > 0) envelope.diagnostics = outcome.diagnostics;
  return envelope;
}
