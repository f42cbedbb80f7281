import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ResponseEnvelope } from '../bridge/types.js';
import type { ToolContext } from './args.js';
import { calendarTools, handleCalendarTool } from './calendar.js';
import { contactTools, handleContactTool } from './contacts.js';
import { handleMailTool, mailTools } from './mail.js';
import { handleMessageTool, messageTools } from './messages.js';
import { handleNoteTool, noteTools } from './notes.js';
import { handleReminderTool, reminderTools } from './reminders.js';
import { handleRunCodeTool, runCodeTools } from './run-code.js';

export type { ToolContext } from './args.js';

type ToolHandler = (
  name: string,
  args: Record<string, unknown>,
  ctx: ToolContext
) => Promise<ResponseEnvelope | undefined>;

export const tools: Tool[] = [
  ...runCodeTools,
  ...contactTools,
  ...noteTools,
  ...reminderTools,
  ...calendarTools,
  ...messageTools,
  ...mailTools,
];

const handlers: ToolHandler[] = [
  handleRunCodeTool,
  handleContactTool,
  handleNoteTool,
  handleReminderTool,
  handleCalendarTool,
  handleMessageTool,
  handleMailTool,
];

export async function handleToolCall(
  name: string,
  args: Record<string, unknown>,
  ctx: ToolContext
): Promise<ResponseEnvelope> {
  for (const handle of handlers) {
    const envelope = await handle(name, args, ctx);
    if (envelope) return envelope;
  }
  throw new Error(`Unknown tool: ${name}`);
}
