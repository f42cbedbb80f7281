import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { rejectedEnvelope } from '../bridge/envelope.js';
import { RequestError } from '../bridge/errors.js';
import type { ResponseEnvelope } from '../bridge/types.js';
import {
  asNumber,
  asRecord,
  asString,
  isReturnFormat,
  runAppScript,
  type ToolContext,
} from './args.js';

export const runCodeTools: Tool[] = [
  {
    name: 'applescript_run_code',
    description:
      'Run AppleScript code. Placeholders written as $name are replaced by the matching entry ' +
      'of params, encoded as AppleScript literals (strings quoted, null as missing value, ' +
      'arrays as lists, objects as JSON strings).',
    inputSchema: {
      type: 'object',
      properties: {
        code: { type: 'string', description: 'AppleScript source' },
        params: { type: 'object', description: 'Values for $name placeholders (optional)' },
        timeout: { type: 'number', description: 'Timeout in seconds (default: 30)' },
        return_format: {
          type: 'string',
          enum: ['json', 'text', 'raw'],
          description: 'json parses the output, text trims it, raw returns it untouched',
        },
      },
      required: ['code'],
    },
  },
];

export async function handleRunCodeTool(
  name: string,
  args: Record<string, unknown>,
  ctx: ToolContext
): Promise<ResponseEnvelope | undefined> {
  if (name !== 'applescript_run_code') return undefined;

  const code = asString(args.code);
  if (code === undefined) throw new Error('code is required');

  const format = args.return_format ?? 'json';
  if (!isReturnFormat(format)) {
    return rejectedEnvelope(
      new RequestError(`Unknown return format "${String(format)}" (expected json, text, raw)`)
    );
  }
  if (args.params !== undefined && args.params !== null && !asRecord(args.params)) {
    return rejectedEnvelope(new RequestError('params must be an object'));
  }

  return runAppScript(ctx, code, asRecord(args.params) ?? {}, {
    format,
    timeoutSeconds: asNumber(args.timeout) ?? ctx.config.defaultTimeoutSeconds,
  });
}
