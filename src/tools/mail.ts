import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ResponseEnvelope } from '../bridge/types.js';
import { guarded } from './applescript.js';
import { asString, asStringArray, required, runAppScript, type ToolContext } from './args.js';

function composeScript(finish: string): string {
  return guarded(`
    tell application "Mail"
      set newMessage to make new outgoing message with properties {subject:$subject, content:$body, visible:$visible}
      tell newMessage
        repeat with addr in $to
          make new to recipient at end of to recipients with properties {address:(contents of addr)}
        end repeat
        repeat with addr in $cc
          make new cc recipient at end of cc recipients with properties {address:(contents of addr)}
        end repeat
        repeat with addr in $bcc
          make new bcc recipient at end of bcc recipients with properties {address:(contents of addr)}
        end repeat
      end tell
${finish}
    end tell`);
}

const SEND_MAIL_SCRIPT = composeScript(`      send newMessage
      return "sent"`);

// Drafts stay open in a visible compose window.
const DRAFT_MAIL_SCRIPT = composeScript(`      return "draft created"`);

const messageProperties = {
  to: {
    type: 'array',
    items: { type: 'string' },
    description: 'Recipient email addresses',
  },
  subject: { type: 'string', description: 'Subject line' },
  body: { type: 'string', description: 'Plain-text body' },
  cc: { type: 'array', items: { type: 'string' }, description: 'CC addresses (optional)' },
  bcc: { type: 'array', items: { type: 'string' }, description: 'BCC addresses (optional)' },
};

export const mailTools: Tool[] = [
  {
    name: 'mail_send_mail',
    description: 'Compose and send an email with Mail.',
    inputSchema: {
      type: 'object',
      properties: messageProperties,
      required: ['to', 'subject', 'body'],
    },
  },
  {
    name: 'mail_draft_mail',
    description: 'Open a pre-filled compose window in Mail without sending.',
    inputSchema: {
      type: 'object',
      properties: messageProperties,
      required: ['to', 'subject', 'body'],
    },
  },
];

export async function handleMailTool(
  name: string,
  args: Record<string, unknown>,
  ctx: ToolContext
): Promise<ResponseEnvelope | undefined> {
  if (name !== 'mail_send_mail' && name !== 'mail_draft_mail') return undefined;

  const to = asStringArray(args.to) ?? [];
  if (to.length === 0) throw new Error('to is required');
  const subject = required('subject', asString(args.subject));
  const body = asString(args.body);
  if (body === undefined) throw new Error('body is required');

  const send = name === 'mail_send_mail';
  return runAppScript(
    ctx,
    send ? SEND_MAIL_SCRIPT : DRAFT_MAIL_SCRIPT,
    {
      to,
      cc: asStringArray(args.cc) ?? [],
      bcc: asStringArray(args.bcc) ?? [],
      subject,
      body,
      visible: !send,
    },
    { format: 'text' }
  );
}
