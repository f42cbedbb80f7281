import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { isoToAppleScriptDate } from '../bridge/dates.js';
import { reminderSchema } from '../bridge/schemas.js';
import type { ResponseEnvelope } from '../bridge/types.js';
import { DELIMITER_PROPERTIES, JSON_STRING, TEXT_OR_EMPTY, guarded } from './applescript.js';
import {
  asBoolean,
  asNumber,
  asString,
  guard,
  required,
  runAppScript,
  singleRecord,
  type ToolContext,
} from './args.js';

// id, title, completed, due date, priority, notes, list
const REMINDER_LINE = `
on reminderLine(r)
  tell application "Reminders"
    set dueText to "null"
    if due date of r is not missing value then set dueText to (due date of r) as string
    set listName to ""
    try
      set listName to name of container of r
    end try
    return (id of r) & fieldDelim & (name of r) & fieldDelim & ((completed of r) as string) & fieldDelim & dueText & fieldDelim & ((priority of r) as string) & fieldDelim & my textOrEmpty(body of r) & fieldDelim & listName
  end tell
end reminderLine
`;

const LIST_LISTS_SCRIPT = `${guarded(`
    tell application "Reminders"
      set output to "["
      set allLists to lists
      repeat with i from 1 to count of allLists
        set theList to item i of allLists
        if i > 1 then set output to output & ","
        set output to output & "{\\"id\\":" & my jsonString(id of theList) & ",\\"name\\":" & my jsonString(name of theList) & ",\\"reminderCount\\":" & (count of reminders of theList) & "}"
      end repeat
      return output & "]"
    end tell`)}${JSON_STRING}`;

const CREATE_LIST_SCRIPT = `${guarded(`
    tell application "Reminders"
      set newList to make new list with properties {name:$name}
      return "{\\"id\\":" & my jsonString(id of newList) & ",\\"name\\":" & my jsonString(name of newList) & "}"
    end tell`)}${JSON_STRING}`;

const LIST_REMINDERS_SCRIPT = `${DELIMITER_PROPERTIES}${guarded(`
    set maxResults to $limit
    set showCompleted to $show_completed
    tell application "Reminders"
      set targetList to list id $list_id
      set listName to name of targetList
      if showCompleted then
        set theReminders to reminders of targetList
      else
        set theReminders to (reminders of targetList whose completed is false)
      end if
      set totalFound to count of theReminders
      set resultText to ""
      repeat with i from 1 to totalFound
        if i > maxResults then exit repeat
        set r to item i of theReminders
        set dueText to "null"
        if due date of r is not missing value then set dueText to (due date of r) as string
        set resultText to resultText & itemDelim & (id of r) & fieldDelim & (name of r) & fieldDelim & ((completed of r) as string) & fieldDelim & dueText & fieldDelim & ((priority of r) as string) & fieldDelim & my textOrEmpty(body of r) & fieldDelim & listName
      end repeat
    end tell
    return (totalFound as string) & resultText`)}${TEXT_OR_EMPTY}`;

const CREATE_REMINDER_SCRIPT = guarded(`
    set reminderNotes to $notes
    set dueText to $due_date
    set reminderPriority to $priority
    tell application "Reminders"
      set targetList to list id $list_id
      set newReminder to make new reminder at end of reminders of targetList with properties {name:$title}
      if reminderNotes is not missing value then set body of newReminder to reminderNotes
      if dueText is not missing value then set due date of newReminder to date dueText
      if reminderPriority is not missing value then set priority of newReminder to reminderPriority
      return id of newReminder
    end tell`);

const COMPLETE_REMINDER_SCRIPT = guarded(`
    tell application "Reminders"
      set theReminder to reminder id $reminder_id
      set completed of theReminder to $completed
      return id of theReminder
    end tell`);

const UPDATE_REMINDER_SCRIPT = `${DELIMITER_PROPERTIES}${guarded(`
    set newTitle to $title
    set newNotes to $notes
    set dueText to $due_date
    set clearDue to $clear_due_date
    set newPriority to $priority
    set newCompleted to $completed
    tell application "Reminders"
      set theReminder to reminder id $reminder_id
      if newTitle is not missing value then set name of theReminder to newTitle
      if newNotes is not missing value then set body of theReminder to newNotes
      if clearDue then
        set due date of theReminder to missing value
      else if dueText is not missing value then
        set due date of theReminder to date dueText
      end if
      if newPriority is not missing value then set priority of theReminder to newPriority
      if newCompleted is not missing value then set completed of theReminder to newCompleted
    end tell
    return my reminderLine(theReminder)`)}${REMINDER_LINE}${TEXT_OR_EMPTY}`;

// Reports the reminder as it was before deletion.
const DELETE_REMINDER_SCRIPT = `${DELIMITER_PROPERTIES}${guarded(`
    tell application "Reminders"
      set theReminder to reminder id $reminder_id
    end tell
    set deletedLine to my reminderLine(theReminder)
    tell application "Reminders"
      delete theReminder
    end tell
    return deletedLine`)}${REMINDER_LINE}${TEXT_OR_EMPTY}`;

const UPDATE_FIELDS = ['title', 'notes', 'due_date', 'priority', 'completed'];

export const reminderTools: Tool[] = [
  {
    name: 'reminders_list_lists',
    description: 'List all reminder lists with their IDs.',
    inputSchema: { type: 'object', properties: {}, required: [] },
  },
  {
    name: 'reminders_create_list',
    description: 'Create a reminder list.',
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'List name' },
      },
      required: ['name'],
    },
  },
  {
    name: 'reminders_list_reminders',
    description: 'List reminders in a reminder list.',
    inputSchema: {
      type: 'object',
      properties: {
        list_id: { type: 'string', description: 'Reminder list ID' },
        limit: { type: 'number', description: 'Maximum reminders to return (default: 50)' },
        show_completed: {
          type: 'boolean',
          description: 'Include completed reminders (default: true)',
        },
      },
      required: ['list_id'],
    },
  },
  {
    name: 'reminders_create_reminder',
    description: 'Create a reminder in a list.',
    inputSchema: {
      type: 'object',
      properties: {
        list_id: { type: 'string', description: 'Reminder list ID' },
        title: { type: 'string', description: 'Reminder title' },
        notes: { type: 'string', description: 'Notes (optional)' },
        due_date: {
          type: 'string',
          description: 'Due date, YYYY-MM-DD or YYYY-MM-DDTHH:MM:SS (optional)',
        },
        priority: { type: 'number', description: 'Priority 0-9 (optional)' },
      },
      required: ['list_id', 'title'],
    },
  },
  {
    name: 'reminders_complete_reminder',
    description: 'Mark a reminder as completed or not completed.',
    inputSchema: {
      type: 'object',
      properties: {
        reminder_id: { type: 'string', description: 'Reminder ID' },
        completed: { type: 'boolean', description: 'Completion state (default: true)' },
      },
      required: ['reminder_id'],
    },
  },
  {
    name: 'reminders_update_reminder',
    description: 'Update fields of an existing reminder.',
    inputSchema: {
      type: 'object',
      properties: {
        reminder_id: { type: 'string', description: 'Reminder ID' },
        title: { type: 'string', description: 'New title' },
        notes: { type: 'string', description: 'New notes' },
        due_date: {
          type: 'string',
          description: 'New due date, YYYY-MM-DD or YYYY-MM-DDTHH:MM:SS; empty string clears it',
        },
        priority: { type: 'number', description: 'New priority 0-9' },
        completed: { type: 'boolean', description: 'Completion state' },
      },
      required: ['reminder_id'],
    },
  },
  {
    name: 'reminders_delete_reminder',
    description: 'Delete a reminder and return what it held.',
    inputSchema: {
      type: 'object',
      properties: {
        reminder_id: { type: 'string', description: 'Reminder ID' },
      },
      required: ['reminder_id'],
    },
  },
];

export async function handleReminderTool(
  name: string,
  args: Record<string, unknown>,
  ctx: ToolContext
): Promise<ResponseEnvelope | undefined> {
  switch (name) {
    case 'reminders_list_lists':
      return runAppScript(ctx, LIST_LISTS_SCRIPT, {});

    case 'reminders_create_list': {
      const listName = required('name', asString(args.name));
      return runAppScript(ctx, CREATE_LIST_SCRIPT, { name: listName });
    }

    case 'reminders_list_reminders': {
      const listId = required('list_id', asString(args.list_id));
      return runAppScript(
        ctx,
        LIST_REMINDERS_SCRIPT,
        {
          list_id: listId,
          limit: asNumber(args.limit) ?? 50,
          show_completed: asBoolean(args.show_completed) ?? true,
        },
        { schema: reminderSchema, timeoutSeconds: Math.max(ctx.config.defaultTimeoutSeconds, 60) }
      );
    }

    case 'reminders_create_reminder': {
      const listId = required('list_id', asString(args.list_id));
      const title = required('title', asString(args.title));
      const dueDate = asString(args.due_date);
      return guard(() =>
        runAppScript(
          ctx,
          CREATE_REMINDER_SCRIPT,
          {
            list_id: listId,
            title,
            notes: asString(args.notes),
            due_date: dueDate === undefined ? null : isoToAppleScriptDate(dueDate),
            priority: asNumber(args.priority),
          },
          { format: 'text' }
        )
      );
    }

    case 'reminders_complete_reminder': {
      const reminderId = required('reminder_id', asString(args.reminder_id));
      return runAppScript(
        ctx,
        COMPLETE_REMINDER_SCRIPT,
        { reminder_id: reminderId, completed: asBoolean(args.completed) ?? true },
        { format: 'text' }
      );
    }

    case 'reminders_update_reminder': {
      const reminderId = required('reminder_id', asString(args.reminder_id));
      if (UPDATE_FIELDS.every((field) => args[field] === undefined)) {
        throw new Error(`At least one of ${UPDATE_FIELDS.join(', ')} is required`);
      }
      const dueDate = asString(args.due_date);
      return guard(async () => {
        const envelope = await runAppScript(
          ctx,
          UPDATE_REMINDER_SCRIPT,
          {
            reminder_id: reminderId,
            title: asString(args.title),
            notes: asString(args.notes),
            due_date: dueDate ? isoToAppleScriptDate(dueDate) : null,
            clear_due_date: dueDate === '',
            priority: asNumber(args.priority),
            completed: asBoolean(args.completed),
          },
          { schema: reminderSchema }
        );
        return singleRecord(envelope, 'reminder');
      });
    }

    case 'reminders_delete_reminder': {
      const reminderId = required('reminder_id', asString(args.reminder_id));
      const envelope = await runAppScript(
        ctx,
        DELETE_REMINDER_SCRIPT,
        { reminder_id: reminderId },
        { schema: reminderSchema }
      );
      return singleRecord(envelope, 'reminder');
    }

    default:
      return undefined;
  }
}
