import { describe, expect, it } from 'vitest';
import { TOKENS, type RecordSchema } from '../bridge/decoder.js';
import { JSON_FALLBACK_WARNING, buildEnvelope, rejectedEnvelope } from '../bridge/envelope.js';
import { DateFormatError } from '../bridge/errors.js';
import type { ExecutionResult } from '../bridge/types.js';

function execution(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
  return {
    stdout: '',
    stderr: '',
    exitCode: 0,
    signal: null,
    elapsedMs: 1250,
    success: true,
    ...overrides,
  };
}

const idSchema: RecordSchema<{ id: string }> = {
  entity: 'item',
  minFields: 2,
  build: (fields) => ({ id: fields[0].trim() }),
};

describe('buildEnvelope', () => {
  it('returns parsed JSON with runtime in seconds', () => {
    const envelope = buildEnvelope(execution({ stdout: '{"ok":true}\n' }), 'json');

    expect(envelope).toEqual({
      success: true,
      status: 1,
      runtime_seconds: 1.25,
      parsed: true,
      result: { ok: true },
    });
  });

  it('warns when JSON output falls back', () => {
    const envelope = buildEnvelope(execution({ stdout: 'plain words\n' }), 'json');

    expect(envelope.success).toBe(true);
    expect(envelope.parsed).toBe(false);
    expect(envelope.result).toBe('plain words');
    expect(envelope.warning).toBe(JSON_FALLBACK_WARNING);
    expect(envelope.diagnostics?.[0].kind).toBe('decode');
  });

  it('keeps success when some records are dropped', () => {
    const stdout = `3${TOKENS.record}a${TOKENS.field}x${TOKENS.record}b${TOKENS.record}c${TOKENS.field}y`;

    const envelope = buildEnvelope(execution({ stdout }), 'json', idSchema);

    expect(envelope.success).toBe(true);
    expect(envelope.result).toEqual([{ id: 'a' }, { id: 'c' }]);
    expect(envelope.total).toBe(3);
    expect(envelope.diagnostics?.map((d) => d.kind)).toEqual(['decode', 'malformed_record']);
  });

  it('does not warn for text output', () => {
    const envelope = buildEnvelope(execution({ stdout: '  created  \n' }), 'text');

    expect(envelope).toEqual({
      success: true,
      status: 1,
      runtime_seconds: 1.25,
      parsed: false,
      result: 'created',
    });
  });

  it('carries raw output in its own field', () => {
    const envelope = buildEnvelope(execution({ stdout: ' [1, 2]\n' }), 'raw');

    expect(envelope).toEqual({
      success: true,
      status: 1,
      runtime_seconds: 1.25,
      parsed: false,
      raw_output: ' [1, 2]\n',
    });
  });

  it('reports a failed execution without decoding it', () => {
    const envelope = buildEnvelope(
      execution({
        stdout: '{"partial":true}',
        success: false,
        exitCode: null,
        signal: 'SIGKILL',
        failure: { kind: 'timeout', message: 'Script execution timed out after 2 seconds' },
      }),
      'json'
    );

    expect(envelope).toEqual({
      success: false,
      status: 0,
      runtime_seconds: 1.25,
      parsed: false,
      error: 'Script execution timed out after 2 seconds',
      error_kind: 'timeout',
    });
  });
});

describe('rejectedEnvelope', () => {
  it('carries the error kind and zero runtime', () => {
    expect(rejectedEnvelope(new DateFormatError('Date string cannot be empty'))).toEqual({
      success: false,
      status: 0,
      runtime_seconds: 0,
      parsed: false,
      error: 'Date string cannot be empty',
      error_kind: 'date_format',
    });
  });
});
