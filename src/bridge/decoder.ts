import { errorMessage } from './errors.js';
import type { DecodedRecords, Diagnostic, ReturnFormat } from './types.js';

/**
 * Reserved tokens the automation scripts emit. They are never escaped inside
 * data; a value containing one corrupts its record.
 */
export const TOKENS = {
  record: '<<||>>',
  field: '<<|>>',
  phoneItem: '<<+++>>',
  emailItem: '<<===>>>',
  addressItem: '<<***>>',
  label: ':',
  component: ',',
} as const;

export const PREVIEW_LENGTH = 100;

const COUNT_TOKEN = /^\s*(\d+)\s*,?\s*$/;

export interface RecordSchema<T> {
  entity: string;
  minFields: number;
  /** Throws when a field value is unusable; the record is then dropped. */
  build(fields: string[]): T;
}

export interface LabeledValue {
  label: string;
  value: string;
}

export interface PostalAddress {
  label: string;
  components: Record<string, string>;
}

// ============================================================================
// JSON
// ============================================================================

export type JsonDecodeResult = { ok: true; value: unknown } | { ok: false; error: string };

export function decodeJson(text: string): JsonDecodeResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err: unknown) {
    return { ok: false, error: errorMessage(err) };
  }
}

// ============================================================================
// Delimited Grammar
// ============================================================================

export function decodeRecords<T>(text: string, schema: RecordSchema<T>): DecodedRecords<T> {
  const segments = text.split(TOKENS.record);
  const diagnostics: Diagnostic[] = [];
  const records: T[] = [];
  let total: number | undefined;

  const count = COUNT_TOKEN.exec(segments[0] ?? '');
  if (count) {
    total = Number(count[1]);
    segments.shift();
  }

  segments.forEach((segment, index) => {
    if (!segment.trim()) return;
    const fields = segment.split(TOKENS.field);
    if (fields.length < schema.minFields) {
      diagnostics.push({
        kind: 'malformed_record',
        recordIndex: index,
        message: `Skipping malformed ${schema.entity} entry ${index}: insufficient fields (${fields.length} < ${schema.minFields})`,
      });
      return;
    }
    try {
      records.push(schema.build(fields));
    } catch (err: unknown) {
      diagnostics.push({
        kind: 'malformed_record',
        recordIndex: index,
        message: `Skipping malformed ${schema.entity} entry ${index}: ${errorMessage(err)}`,
      });
    }
  });

  return total === undefined ? { records, diagnostics } : { records, total, diagnostics };
}

// ============================================================================
// Field Helpers
// ============================================================================

export function requiredField(fields: string[], index: number, name: string): string {
  const value = (fields[index] ?? '').trim();
  if (!value) throw new Error(`missing ${name}`);
  return value;
}

export function optionalField(fields: string[], index: number): string | undefined {
  const value = (fields[index] ?? '').trim();
  return value && value !== 'missing value' ? value : undefined;
}

export function flagField(fields: string[], index: number): boolean {
  return (fields[index] ?? '').trim().toLowerCase() === 'true';
}

export function nullableIntegerField(fields: string[], index: number, name: string): number | null {
  const value = (fields[index] ?? '').trim();
  if (!value || value === 'null' || value === 'missing value') return null;
  if (!/^-?\d+$/.test(value)) throw new Error(`${name} is not an integer: ${value}`);
  return Number(value);
}

// Contacts reports built-in labels as `_$!<Mobile>!$_`.
export function cleanLabel(label: string): string {
  const builtin = /^_\$!<(.+)>!\$_$/.exec(label.trim());
  return builtin ? builtin[1].toLowerCase() : label.trim();
}

/** Split `label:value` items; items without a label separator are skipped. */
export function splitLabeled(data: string, itemSeparator: string): LabeledValue[] {
  const out: LabeledValue[] = [];
  for (const item of data.split(itemSeparator)) {
    const at = item.indexOf(TOKENS.label);
    if (!item.trim() || at < 0) continue;
    out.push({ label: cleanLabel(item.slice(0, at)), value: item.slice(at + 1).trim() });
  }
  return out;
}

/** Split `label:key:value,key:value,` items into labelled component maps. */
export function splitAddresses(data: string, itemSeparator: string): PostalAddress[] {
  const out: PostalAddress[] = [];
  for (const item of data.split(itemSeparator)) {
    const at = item.indexOf(TOKENS.label);
    if (!item.trim() || at < 0) continue;
    const components: Record<string, string> = {};
    for (const component of item.slice(at + 1).split(TOKENS.component)) {
      const sep = component.indexOf(TOKENS.label);
      if (sep < 0) continue;
      components[component.slice(0, sep).trim()] = component.slice(sep + 1).trim();
    }
    out.push({ label: cleanLabel(item.slice(0, at)), components });
  }
  return out;
}

export function extractPreview(body: string, maxLength = PREVIEW_LENGTH): string {
  const cleaned = body.replace(/\s+/g, ' ').trim();
  if (cleaned.length <= maxLength) return cleaned;
  return `${cleaned.slice(0, maxLength).trimEnd()}...`;
}

// ============================================================================
// Output Decoding
// ============================================================================

export interface DecodeOutcome {
  parsed: boolean;
  value: unknown;
  total?: number;
  diagnostics: Diagnostic[];
}

/**
 * Decode stdout according to the requested format. `json` tries JSON first and
 * falls back to the delimited grammar when a schema is supplied, or to the
 * trimmed text when not. `text` trims; `raw` leaves the output untouched.
 */
export function decodeOutput<T>(
  stdout: string,
  format: ReturnFormat,
  schema?: RecordSchema<T>
): DecodeOutcome {
  if (format === 'raw') return { parsed: false, value: stdout, diagnostics: [] };

  const text = stdout.trim();
  if (format === 'text') return { parsed: false, value: text, diagnostics: [] };

  const json = decodeJson(text);
  // A list script that found nothing prints only its count.
  const countOnly = json.ok && schema !== undefined && typeof json.value === 'number';
  if (json.ok && !countOnly) return { parsed: true, value: json.value, diagnostics: [] };

  const fallback: Diagnostic[] = json.ok
    ? []
    : [{ kind: 'decode', message: `Output is not JSON (${json.error})` }];
  if (!schema) return { parsed: false, value: text, diagnostics: fallback };

  const decoded = decodeRecords(text, schema);
  return {
    parsed: false,
    value: decoded.records,
    total: decoded.total,
    diagnostics: [...fallback, ...decoded.diagnostics],
  };
}
