import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { noteSchema } from '../bridge/schemas.js';
import type { ResponseEnvelope } from '../bridge/types.js';
import { DELIMITER_PROPERTIES, TEXT_OR_EMPTY, guarded } from './applescript.js';
import {
  asNumber,
  asString,
  required,
  runAppScript,
  singleRecord,
  type ToolContext,
} from './args.js';

// id, name, body, modification date, folder, creation date
const NOTE_LINE = `
on noteLine(n)
  tell application "Notes"
    set folderName to ""
    try
      set folderName to name of container of n
    end try
    return (id of n) & fieldDelim & (name of n) & fieldDelim & my textOrEmpty(plaintext of n) & fieldDelim & ((modification date of n) as string) & fieldDelim & folderName & fieldDelim & ((creation date of n) as string)
  end tell
end noteLine
`;

const LIST_NOTES_SCRIPT = `${DELIMITER_PROPERTIES}${guarded(`
    set maxResults to $limit
    set folderFilter to $folder
    tell application "Notes"
      if folderFilter is missing value then
        set theNotes to notes
      else
        set theNotes to notes of folder folderFilter
      end if
    end tell
    set totalFound to count of theNotes
    set resultText to ""
    repeat with i from 1 to totalFound
      if i > maxResults then exit repeat
      set resultText to resultText & itemDelim & my noteLine(item i of theNotes)
    end repeat
    return (totalFound as string) & resultText`)}${NOTE_LINE}${TEXT_OR_EMPTY}`;

const GET_NOTE_SCRIPT = `${DELIMITER_PROPERTIES}${guarded(`
    tell application "Notes"
      set theNote to note id $note_id
    end tell
    return my noteLine(theNote)`)}${NOTE_LINE}${TEXT_OR_EMPTY}`;

const CREATE_NOTE_SCRIPT = `${DELIMITER_PROPERTIES}${guarded(`
    set folderName to $folder
    tell application "Notes"
      if folderName is missing value then
        set newNote to make new note with properties {name:$name, body:$body}
      else
        set newNote to make new note at folder folderName with properties {name:$name, body:$body}
      end if
    end tell
    return my noteLine(newNote)`)}${NOTE_LINE}${TEXT_OR_EMPTY}`;

const UPDATE_NOTE_SCRIPT = `${DELIMITER_PROPERTIES}${guarded(`
    set newName to $name
    set newBody to $body
    tell application "Notes"
      set theNote to note id $note_id
      if newBody is not missing value then set body of theNote to newBody
      if newName is not missing value then set name of theNote to newName
    end tell
    return my noteLine(theNote)`)}${NOTE_LINE}${TEXT_OR_EMPTY}`;

export const noteTools: Tool[] = [
  {
    name: 'notes_list_notes',
    description: 'List notes, optionally limited to one folder.',
    inputSchema: {
      type: 'object',
      properties: {
        limit: { type: 'number', description: 'Maximum notes to return (default: 20)' },
        folder: { type: 'string', description: 'Folder name (optional)' },
      },
      required: [],
    },
  },
  {
    name: 'notes_get_note',
    description: 'Get a note by ID.',
    inputSchema: {
      type: 'object',
      properties: {
        note_id: { type: 'string', description: 'The note ID' },
      },
      required: ['note_id'],
    },
  },
  {
    name: 'notes_create_note',
    description: 'Create a note.',
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Note title' },
        body: { type: 'string', description: 'Note body' },
        folder: { type: 'string', description: 'Folder name (optional)' },
      },
      required: ['name', 'body'],
    },
  },
  {
    name: 'notes_update_note',
    description: "Update a note's title and/or body.",
    inputSchema: {
      type: 'object',
      properties: {
        note_id: { type: 'string', description: 'The note ID to update' },
        name: { type: 'string', description: 'New title' },
        body: { type: 'string', description: 'New body' },
      },
      required: ['note_id'],
    },
  },
];

export async function handleNoteTool(
  name: string,
  args: Record<string, unknown>,
  ctx: ToolContext
): Promise<ResponseEnvelope | undefined> {
  switch (name) {
    case 'notes_list_notes':
      return runAppScript(
        ctx,
        LIST_NOTES_SCRIPT,
        { limit: asNumber(args.limit) ?? 20, folder: asString(args.folder) },
        { schema: noteSchema }
      );

    case 'notes_get_note': {
      const noteId = required('note_id', asString(args.note_id));
      const envelope = await runAppScript(
        ctx,
        GET_NOTE_SCRIPT,
        { note_id: noteId },
        { schema: noteSchema }
      );
      return singleRecord(envelope, 'note');
    }

    case 'notes_create_note': {
      const title = required('name', asString(args.name));
      const body = asString(args.body);
      if (body === undefined) throw new Error('body is required');
      const envelope = await runAppScript(
        ctx,
        CREATE_NOTE_SCRIPT,
        { name: title, body, folder: asString(args.folder) },
        { schema: noteSchema }
      );
      return singleRecord(envelope, 'note');
    }

    case 'notes_update_note': {
      const noteId = required('note_id', asString(args.note_id));
      const title = asString(args.name);
      const body = asString(args.body);
      if (title === undefined && body === undefined) {
        throw new Error('name or body is required');
      }
      const envelope = await runAppScript(
        ctx,
        UPDATE_NOTE_SCRIPT,
        { note_id: noteId, name: title, body },
        { schema: noteSchema }
      );
      return singleRecord(envelope, 'note');
    }

    default:
      return undefined;
  }
}
