import type { BridgeErrorKind } from './errors.js';

// ============================================================================
// Script Parameters
// ============================================================================

/**
 * A parameter value decided at the call boundary. Each variant has exactly one
 * encoding rule in the injector.
 */
export type ScriptValue =
  | { kind: 'string'; value: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'number'; value: number }
  | { kind: 'list'; items: ScriptValue[] }
  | { kind: 'mapping'; value: JsonValue }
  | { kind: 'null' };

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ScriptParams = ReadonlyArray<readonly [string, ScriptValue]>;

export const RETURN_FORMATS = ['json', 'text', 'raw'] as const;

export type ReturnFormat = (typeof RETURN_FORMATS)[number];

export interface ScriptRequest {
  code: string;
  params: ScriptParams;
  timeoutSeconds: number;
  returnFormat: ReturnFormat;
}

// ============================================================================
// Execution
// ============================================================================

export interface ExecutionFailure {
  kind: Extract<BridgeErrorKind, 'timeout' | 'process'>;
  message: string;
}

export interface ExecutionResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  elapsedMs: number;
  success: boolean;
  failure?: ExecutionFailure;
}

// ============================================================================
// Decoding
// ============================================================================

export interface Diagnostic {
  kind: Extract<BridgeErrorKind, 'decode' | 'malformed_record'>;
  message: string;
  recordIndex?: number;
}

export interface DecodedRecords<T> {
  records: T[];
  total?: number;
  diagnostics: Diagnostic[];
}

// ============================================================================
// Response Envelope
// ============================================================================

export interface ResponseEnvelope<T = unknown> {
  success: boolean;
  status: 1 | 0;
  runtime_seconds: number;
  parsed: boolean;
  result?: T;
  raw_output?: string;
  error?: string;
  error_kind?: BridgeErrorKind;
  warning?: string;
  total?: number;
  diagnostics?: Diagnostic[];
}
