import { InjectionError } from './errors.js';
import type { JsonValue, ScriptParams, ScriptValue } from './types.js';

const PARAM_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

// A placeholder is `$` followed by the longest identifier run, so `$name` never
// matches inside `$names`.
const PLACEHOLDER = /\$([A-Za-z_][A-Za-z0-9_]*)/g;

// Escape a string for safe interpolation inside an AppleScript double-quoted string.
// Must escape backslashes before quotes to avoid partial escaping.
export function escapeAppleScript(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export function quoteAppleScript(value: string): string {
  return `"${escapeAppleScript(value)}"`;
}

// ============================================================================
// Call Boundary
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function toJsonValue(name: string, value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new InjectionError(name, 'numbers must be finite');
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, i) => toJsonValue(`${name}[${i}]`, item));
  }
  if (isPlainObject(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = toJsonValue(`${name}.${key}`, item);
    }
    return out;
  }
  throw new InjectionError(name, `unsupported value of type ${typeof value}`);
}

/**
 * Classify an untyped value (typically decoded from a tool call's JSON
 * arguments) into a ScriptValue. Anything outside the closed set fails here,
 * before a script is built.
 */
export function toScriptValue(name: string, value: unknown): ScriptValue {
  if (value === null || value === undefined) return { kind: 'null' };
  switch (typeof value) {
    case 'string':
      return { kind: 'string', value };
    case 'boolean':
      return { kind: 'boolean', value };
    case 'number':
      if (!Number.isFinite(value)) throw new InjectionError(name, 'numbers must be finite');
      return { kind: 'number', value };
    default:
      break;
  }
  if (Array.isArray(value)) {
    return {
      kind: 'list',
      items: value.map((item: unknown, i) => toScriptValue(`${name}[${i}]`, item)),
    };
  }
  if (isPlainObject(value)) {
    return { kind: 'mapping', value: toJsonValue(name, value) };
  }
  throw new InjectionError(name, `unsupported value of type ${typeof value}`);
}

export function toScriptParams(raw: Record<string, unknown> | undefined): ScriptParams {
  if (!raw) return [];
  return Object.entries(raw).map(([name, value]) => {
    if (!PARAM_NAME.test(name)) {
      throw new InjectionError(name, 'names must be letters, digits or underscores');
    }
    return [name, toScriptValue(name, value)] as const;
  });
}

// ============================================================================
// Encoding
// ============================================================================

function toPlain(value: ScriptValue): JsonValue {
  switch (value.kind) {
    case 'string':
    case 'boolean':
    case 'number':
    case 'mapping':
      return value.value;
    case 'list':
      return value.items.map(toPlain);
    case 'null':
      return null;
  }
}

function encodeListItem(item: ScriptValue): string {
  if (item.kind === 'list' || item.kind === 'mapping') {
    return quoteAppleScript(JSON.stringify(toPlain(item)));
  }
  return encodeValue(item);
}

/** Render a value as AppleScript literal text. */
export function encodeValue(value: ScriptValue): string {
  switch (value.kind) {
    case 'string':
      return quoteAppleScript(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'number':
      return String(value.value);
    case 'null':
      return 'missing value';
    case 'list':
      return `{${value.items.map(encodeListItem).join(', ')}}`;
    case 'mapping':
      // The receiving script re-parses this JSON itself.
      return quoteAppleScript(JSON.stringify(value.value));
  }
}

/**
 * Replace every `$name` placeholder with its encoded literal in one pass, so
 * text produced by one substitution is never rescanned. Placeholders without a
 * matching parameter are left as written.
 */
export function injectParams(code: string, params: ScriptParams): string {
  if (params.length === 0) return code;
  const encoded = new Map<string, string>();
  for (const [name, value] of params) {
    encoded.set(name, encodeValue(value));
  }
  return code.replace(PLACEHOLDER, (token: string, name: string) => encoded.get(name) ?? token);
}
