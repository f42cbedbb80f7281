import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { conversationSchema, messageSchema } from '../bridge/schemas.js';
import type { ResponseEnvelope } from '../bridge/types.js';
import { DELIMITER_PROPERTIES, TEXT_OR_EMPTY, guarded } from './applescript.js';
import { asNumber, asString, required, runAppScript, type ToolContext } from './args.js';

// id, display name, group flag, participant handles
const LIST_CONVERSATIONS_SCRIPT = `${DELIMITER_PROPERTIES}${guarded(`
    set maxResults to $limit
    tell application "Messages"
      set allChats to chats
      set totalFound to count of allChats
      set resultText to ""
      repeat with i from 1 to totalFound
        if i > maxResults then exit repeat
        set c to item i of allChats
        set handles to ""
        set chatParticipants to participants of c
        repeat with j from 1 to count of chatParticipants
          if j > 1 then set handles to handles & ", "
          set handles to handles & my textOrEmpty(handle of item j of chatParticipants)
        end repeat
        set isGroup to (count of chatParticipants) > 1
        set resultText to resultText & itemDelim & (id of c) & fieldDelim & my textOrEmpty(name of c) & fieldDelim & (isGroup as string) & fieldDelim & handles
      end repeat
    end tell
    return (totalFound as string) & resultText`)}${TEXT_OR_EMPTY}`;

// id, sender handle, date sent, text; newest first
const GET_MESSAGES_SCRIPT = `${DELIMITER_PROPERTIES}${guarded(`
    set maxResults to $limit
    tell application "Messages"
      set chatMessages to messages of chat id $conversation_id
      set totalFound to count of chatMessages
      set resultText to ""
      set taken to 0
      repeat with i from totalFound to 1 by -1
        if taken is greater than or equal to maxResults then exit repeat
        set m to item i of chatMessages
        set senderHandle to ""
        try
          set senderHandle to handle of sender of m
        end try
        set resultText to resultText & itemDelim & (id of m) & fieldDelim & senderHandle & fieldDelim & ((date sent of m) as string) & fieldDelim & my textOrEmpty(content of m)
        set taken to taken + 1
      end repeat
    end tell
    return (totalFound as string) & resultText`)}${TEXT_OR_EMPTY}`;

const SEND_MESSAGE_SCRIPT = guarded(`
    tell application "Messages"
      set targetService to 1st account whose service type = iMessage
      set targetBuddy to participant $recipient of targetService
      send $text to targetBuddy
    end tell
    return "sent"`);

export const messageTools: Tool[] = [
  {
    name: 'messages_list_conversations',
    description: 'List Messages conversations with their participants.',
    inputSchema: {
      type: 'object',
      properties: {
        limit: { type: 'number', description: 'Maximum conversations to return (default: 50)' },
      },
      required: [],
    },
  },
  {
    name: 'messages_get_messages',
    description: 'Get the most recent messages in a conversation, newest first.',
    inputSchema: {
      type: 'object',
      properties: {
        conversation_id: { type: 'string', description: 'Conversation ID' },
        limit: { type: 'number', description: 'Maximum messages to return (default: 50)' },
      },
      required: ['conversation_id'],
    },
  },
  {
    name: 'messages_send_message',
    description: 'Send an iMessage to a phone number or email address.',
    inputSchema: {
      type: 'object',
      properties: {
        recipient: { type: 'string', description: 'Phone number or email address' },
        text: { type: 'string', description: 'Message text' },
      },
      required: ['recipient', 'text'],
    },
  },
];

export async function handleMessageTool(
  name: string,
  args: Record<string, unknown>,
  ctx: ToolContext
): Promise<ResponseEnvelope | undefined> {
  switch (name) {
    case 'messages_list_conversations':
      return runAppScript(
        ctx,
        LIST_CONVERSATIONS_SCRIPT,
        { limit: asNumber(args.limit) ?? 50 },
        { schema: conversationSchema }
      );

    case 'messages_get_messages': {
      const conversationId = required('conversation_id', asString(args.conversation_id));
      return runAppScript(
        ctx,
        GET_MESSAGES_SCRIPT,
        { conversation_id: conversationId, limit: asNumber(args.limit) ?? 50 },
        { schema: messageSchema }
      );
    }

    case 'messages_send_message': {
      const recipient = required('recipient', asString(args.recipient));
      const text = required('text', asString(args.text));
      return runAppScript(ctx, SEND_MESSAGE_SCRIPT, { recipient, text }, { format: 'text' });
    }

    default:
      return undefined;
  }
}
